import type {
  FlowStepName,
  Intent,
  IntentEntities,
  ParseContext,
  ParseOutcome,
  SiteId,
} from '../types.js';
import { siteFromText } from '../sites/catalog.js';

// ─────────────────────────────────────────────────────────────────────────────
// Intent Parser — ordered keyword rules, first match wins
//
//   multi-step → navigate → search → add to cart → checkout / login /
//   place order → click → unknown
//
// Keywords are matched on the lower-cased text. Captures (query, product,
// target) come from the original text so "search for Widget" keeps its case.
// The context is an explicit value: callers hand it in and get the updated
// copy back.
// ─────────────────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /** Site used by multi-step commands that name none */
  fallbackSite?: SiteId;
}

const MULTI_STEP_PATTERNS: readonly RegExp[] = [
  /open.*login.*add.*cart.*place.*order/,
  /login.*add.*cart.*place.*order/,
  /add.*cart.*place.*order/,
  /open.*login.*add.*cart/,
  /open.*\badd\b.*cart/,
  /.*verify.*price/,
  /.*and verify/,
];

const FULL_CHECKOUT_STEPS: readonly FlowStepName[] = ['login', 'add_to_cart', 'checkout', 'place_order'];
const ADD_TO_CART_STEPS: readonly FlowStepName[] = ['login', 'add_to_cart'];

const FLOW_PRODUCT_PATTERNS: readonly RegExp[] = [
  /\badd\s+(?:a\s+)?([\w-]+)\s+to\b/i,
  /\badd\s+(?:a\s+)?([\w-]+)/i,
  /\b(?:get|buy)\s+(?:a\s+)?([\w-]+)/i,
];

const ADD_TO_CART_PATTERNS: readonly RegExp[] = [
  /\badd\s+(?:a\s+)?([\w-]+)\s+to\s+cart/i,
  /\badd\s+to\s+cart\s+(?:a\s+)?([\w-]+)/i,
  /\badd\s+(?:a\s+)?([\w-]+)/i,
];

/** Words the product patterns catch that are never products */
const NOT_PRODUCTS = new Set(['to', 'it', 'cart', 'the', 'this', 'that', 'them', 'one']);

const PRODUCT_SYNONYMS: ReadonlyArray<[readonly string[], string]> = [
  [['backpack', 'bag', 'rucksack'], 'backpack'],
  [['shirt', 'tshirt', 't-shirt'], 't-shirt'],
];

const URL_PATTERN = /https?:\/\/\S+/i;
const SEARCH_CAPTURE = /(?:search(?:\s+for)?|find|look\s+for)\s+(.+)$/i;
const QUOTED = /'([^']+)'|"([^"]+)"/g;
const CLICK_CAPTURE = /\b(?:click|press)\s+(?:on\s+)?(.*)$/i;

export function parseIntent(
  text: string,
  context: ParseContext = {},
  options: ParseOptions = {},
): ParseOutcome {
  const original = text.trim();
  const t = original.toLowerCase();
  const next: ParseContext = { ...context };
  const done = (intent: Intent): ParseOutcome => ({ intent, context: next });

  if (!t) return done({ name: 'unknown', entities: { raw: text } });

  // ── 1. Multi-step ─────────────────────────────────────────────────────────
  if (MULTI_STEP_PATTERNS.some((p) => p.test(t))) {
    const site = extractSite(original, t) ?? options.fallbackSite ?? 'demo';
    next.site = site;

    const product = captureProduct(original, FLOW_PRODUCT_PATTERNS, true) ?? context.product;
    if (product) next.product = product;

    const verify_price = t.includes('verify');
    const entities: IntentEntities = { site, verify_price };
    if (product) entities.product = product;

    if (t.includes('place order') || t.includes('place the order')) {
      return done({ name: 'full_checkout_flow', entities: { ...entities, steps: [...FULL_CHECKOUT_STEPS] } });
    }
    if (t.includes('add') && t.includes('cart')) {
      return done({ name: 'add_to_cart_flow', entities: { ...entities, steps: [...ADD_TO_CART_STEPS] } });
    }
    return done({ name: 'unknown', entities: { raw: text } });
  }

  // ── 2. Navigation ─────────────────────────────────────────────────────────
  if (['go to', 'open', 'navigate'].some((w) => t.includes(w))) {
    const site = extractSite(original, t);
    if (site) next.site = site;
    const entities: IntentEntities = {};
    const resolved = site ?? context.site;
    if (resolved) entities.site = resolved;
    return done({ name: 'navigate', entities });
  }

  // ── 3. Search ─────────────────────────────────────────────────────────────
  if (['search for', 'find', 'look for', 'search'].some((w) => t.includes(w))) {
    const query = extractQuery(original);
    if (query) next.product = query;
    const resolved = query ?? context.product;
    return done({ name: 'search', entities: resolved ? { query: resolved } : {} });
  }

  // ── 4. Add to cart ────────────────────────────────────────────────────────
  if (t.includes('add to cart') || t.includes('add it to cart') || t.includes('add a')) {
    const product = captureProduct(original, ADD_TO_CART_PATTERNS, false);
    if (product) next.product = product;
    const resolved = product ?? context.product;
    return done({ name: 'add_to_cart', entities: resolved ? { product: resolved } : {} });
  }

  // ── 5. Fixed keywords ─────────────────────────────────────────────────────
  if (t.includes('checkout') || t.includes('proceed to checkout')) {
    return done({ name: 'checkout', entities: {} });
  }
  if (t.includes('login') || t.includes('sign in')) {
    return done({ name: 'login', entities: { use_saved: true } });
  }
  if (t.includes('place order') || t.includes('buy now')) {
    return done({ name: 'place_order', entities: {} });
  }

  // ── 6. Click ──────────────────────────────────────────────────────────────
  if (t.includes('click') || t.includes('press')) {
    const target = CLICK_CAPTURE.exec(original)?.[1]?.trim();
    return done({ name: 'click', entities: target ? { target } : {} });
  }

  return done({ name: 'unknown', entities: { raw: text } });
}

/** One conversation's parser; holds the context between utterances */
export class IntentParser {
  private ctx: ParseContext = {};

  constructor(private readonly options: ParseOptions = {}) {}

  parse(text: string): Intent {
    const { intent, context } = parseIntent(text, this.ctx, this.options);
    this.ctx = context;
    return intent;
  }

  get context(): ParseContext {
    return { ...this.ctx };
  }

  /** Context for callers that resolve intents elsewhere (the LLM path) */
  remember(update: ParseContext): void {
    this.ctx = { ...this.ctx, ...update };
  }

  reset(): void {
    this.ctx = {};
  }
}

// ─── Extraction ─────────────────────────────────────────────────────────────

/** An explicit URL wins over site keywords */
function extractSite(original: string, lower: string): string | null {
  const url = URL_PATTERN.exec(original);
  if (url) return url[0];
  return siteFromText(lower);
}

function extractQuery(original: string): string | null {
  const captured = SEARCH_CAPTURE.exec(original)?.[1]?.trim();
  if (captured) return captured;

  let quoted: string | null = null;
  for (const m of original.matchAll(QUOTED)) {
    quoted = m[1] ?? m[2] ?? quoted;
  }
  if (quoted) return quoted;

  const parts = original.split(/\s+/).filter(Boolean);
  return parts.length >= 2 ? parts.slice(-2).join(' ') : null;
}

function captureProduct(original: string, patterns: readonly RegExp[], normalize: boolean): string | null {
  for (const pattern of patterns) {
    const word = pattern.exec(original)?.[1]?.trim();
    if (!word || NOT_PRODUCTS.has(word.toLowerCase())) continue;
    return normalize ? canonicalProduct(word) : word;
  }
  return null;
}

function canonicalProduct(word: string): string {
  const lower = word.toLowerCase();
  for (const [names, canonical] of PRODUCT_SYNONYMS) {
    if (names.includes(lower)) return canonical;
  }
  return word;
}
