import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type {
  ActionKind,
  Intent,
  IntentEntities,
  LlmIntentFields,
  ParseContext,
  SiteId,
  VoiceCartConfig,
} from '../types.js';
import { isActionKind, isSiteId } from '../types.js';
import { IntentParser } from '../nlp/parser.js';
import { SITE_CATALOG, siteFromText } from '../sites/catalog.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage, sleep as realSleep } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// IntentAnalyzer — LLM-first intent extraction, rule parser as the floor
//
//   provider (retried with backoff) → validate → map to Intent
//   any failure, unknown action or low confidence → rule-based parse
//
// Provider errors never reach the caller.
// ─────────────────────────────────────────────────────────────────────────────

export interface IntentProvider {
  readonly name: string;
  extract(text: string, context: ParseContext): Promise<LlmIntentFields>;
}

export const LlmIntentSchema = z.object({
  action: z.string().min(1),
  site: z.string().nullish(),
  item: z.string().nullish(),
  qty: z.number().int().min(1).default(1),
  verify_price: z.boolean().default(false),
  confidence: z.number().min(0).max(1).default(0.7),
  reasoning: z.string().nullish(),
});

const siteNames = SITE_CATALOG.map((s) => s.hostnames[0]?.split('.')[0] ?? s.id).join('|');

const buildPrompt = (text: string, context: ParseContext) => `Parse this voice command for shopping-site automation.

Voice: "${text}"
Context: ${JSON.stringify(context)}

Return ONLY valid JSON with:
- action: navigate|search|login_only|add_to_cart|checkout|place_order|click|full_checkout_flow|add_to_cart_flow|unknown
- site: ${siteNames} (if mentioned)
- item: product name (if mentioned)
- qty: quantity (default 1)
- verify_price: boolean
- confidence: 0.0-1.0
- reasoning: why you chose this interpretation`;

export class AnthropicIntentProvider implements IntentProvider {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(config: Pick<VoiceCartConfig, 'anthropic_api_key' | 'llm_model'>, maxTokens = 500) {
    this.client = new Anthropic({ apiKey: config.anthropic_api_key });
    this.model = config.llm_model;
    this.maxTokens = maxTokens;
  }

  async extract(text: string, context: ParseContext): Promise<LlmIntentFields> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0.1,
      messages: [{ role: 'user', content: buildPrompt(text, context) }],
    });

    const content = response.content[0];
    if (content?.type !== 'text') throw new Error('Provider reply had no text block');

    const parsed: unknown = JSON.parse(extractJSON(content.text));
    return LlmIntentSchema.parse(parsed);
  }
}

export function extractJSON(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(text);
  if (fenced?.[1]) return fenced[1];
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) return text.slice(start, end + 1);
  return text;
}

// ─── Hybrid parser ──────────────────────────────────────────────────────────

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 500 };

export interface IntentAnalyzerOptions {
  /** Without a provider every utterance goes to the rule parser */
  provider?: IntentProvider | null;
  rules?: IntentParser;
  fallbackSite?: SiteId;
  minConfidence?: number;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class IntentAnalyzer {
  private provider: IntentProvider | null;
  private rules: IntentParser;
  private fallbackSite: SiteId;
  private minConfidence: number;
  private retry: RetryPolicy;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(options: IntentAnalyzerOptions = {}) {
    this.fallbackSite = options.fallbackSite ?? 'demo';
    this.provider = options.provider ?? null;
    this.rules = options.rules ?? new IntentParser({ fallbackSite: this.fallbackSite });
    this.minConfidence = options.minConfidence ?? 0.5;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.sleep = options.sleep ?? realSleep;
    this.logger = (options.logger ?? rootLogger).child({ name: 'intent' });
  }

  get context(): ParseContext {
    return this.rules.context;
  }

  reset(): void {
    this.rules.reset();
  }

  async parse(text: string): Promise<Intent> {
    if (!this.provider || !text.trim()) return this.rules.parse(text);

    const fields = await this.extractWithRetry(this.provider, text);
    if (!fields) return this.rules.parse(text);

    const intent = this.toIntent(fields);
    if (!intent) {
      this.logger.info('Provider intent not usable, using rules', { action: fields.action });
      return this.rules.parse(text);
    }
    if (fields.confidence < this.minConfidence) {
      this.logger.info('Provider confidence below threshold, using rules', {
        confidence: fields.confidence,
        threshold: this.minConfidence,
      });
      return this.rules.parse(text);
    }

    const update: ParseContext = {};
    if (intent.entities.site) update.site = intent.entities.site;
    const product = intent.entities.product ?? intent.entities.query;
    if (product) update.product = product;
    this.rules.remember(update);

    return intent;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async extractWithRetry(provider: IntentProvider, text: string): Promise<LlmIntentFields | null> {
    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      try {
        return await provider.extract(text, this.rules.context);
      } catch (err) {
        this.logger.warn('Intent provider failed', {
          provider: provider.name,
          attempt,
          error: errorMessage(err),
        });
        // A reply that fails validation would fail the same way again
        if (err instanceof z.ZodError) break;
        if (attempt < this.retry.attempts) {
          await this.sleep(this.retry.baseDelayMs * 2 ** (attempt - 1));
        }
      }
    }
    this.logger.info('Falling back to rule-based parsing', { provider: provider.name });
    return null;
  }

  private toIntent(fields: LlmIntentFields): Intent | null {
    const name = actionName(fields.action);
    if (!name || name === 'unknown') return null;

    const ctx = this.rules.context;
    const site = fields.site ? siteFromName(fields.site) : null;
    const item = fields.item?.trim() || undefined;

    const entities: IntentEntities = {
      source: 'llm',
      qty: fields.qty,
      verify_price: fields.verify_price,
      confidence: fields.confidence,
    };
    if (fields.reasoning) entities.reasoning = fields.reasoning;

    switch (name) {
      case 'navigate': {
        const resolved = site ?? ctx.site;
        if (resolved) entities.site = resolved;
        break;
      }
      case 'search': {
        const query = item ?? ctx.product;
        if (query) entities.query = query;
        break;
      }
      case 'add_to_cart': {
        const product = item ?? ctx.product;
        if (product) entities.product = product;
        break;
      }
      case 'click':
        if (item) entities.target = item;
        break;
      case 'login':
        entities.use_saved = true;
        break;
      case 'full_checkout_flow':
      case 'add_to_cart_flow': {
        entities.site = site ?? this.fallbackSite;
        const product = item ?? ctx.product;
        if (product) entities.product = product;
        entities.steps = name === 'full_checkout_flow'
          ? ['login', 'add_to_cart', 'checkout', 'place_order']
          : ['login', 'add_to_cart'];
        break;
      }
      default:
        break;
    }
    return { name, entities };
  }
}

function actionName(action: string): ActionKind | null {
  const normalized = action.trim().toLowerCase();
  if (normalized === 'login_only') return 'login';
  return isActionKind(normalized) ? normalized : null;
}

/** "saucedemo", "Amazon", "marketplace" → site id */
export function siteFromName(name: string): SiteId | null {
  const lower = name.trim().toLowerCase();
  if (isSiteId(lower)) return lower;
  return siteFromText(lower);
}
