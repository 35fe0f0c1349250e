// ─────────────────────────────────────────────────────────────────────────────
// VoiceCart — Public API
// Spoken or typed shopping commands, carried out in a real browser.
// ─────────────────────────────────────────────────────────────────────────────

export { BrowserEngine } from './engine/browser.js';
export { SelectorResolver } from './selectors/resolver.js';
export { generateAlternatives } from './selectors/alternatives.js';
export { SelectorCache } from './selectors/cache.js';
export { SiteRegistry } from './sites/registry.js';
export { DemoSitePage } from './sites/demo.js';
export { MarketplaceSitePage } from './sites/marketplace.js';
export { RetailSitePage } from './sites/retail.js';
export { IntentParser, parseIntent } from './nlp/parser.js';
export { AnthropicIntentProvider, IntentAnalyzer } from './semantic/intent-analyzer.js';
export { ActionRunner } from './runtime/runner.js';
export { compileFlow } from './runtime/flow.js';
export { BatchExecutor } from './runtime/batch.js';
export { analyzePage } from './runtime/inspect.js';
export { loadPlan, parsePlan, PlanError } from './runtime/plan.js';
export { TraceStore } from './trace/store.js';
export { buildTraceRecord, redact } from './trace/redact.js';
export { loadConfig, configureLogger, ConfigError } from './config.js';
export { Logger, logger } from './utils/logger.js';
export { SessionError } from './utils/errors.js';

export type { PageHandle, LocatorHandle } from './engine/page.js';
export type { SitePageModel, PriceReader } from './sites/base.js';
export type { IntentProvider } from './semantic/intent-analyzer.js';
export type { PageAnalysis, FoundElement } from './runtime/inspect.js';
export type {
  ActionKind,
  ActionResult,
  BatchAction,
  Intent,
  IntentEntities,
  ParseContext,
  Plan,
  SiteId,
  TraceRecord,
  VoiceCartConfig,
} from './types.js';

// ─── High-level convenience API ────────────────────────────────────────────

import { BrowserEngine } from './engine/browser.js';
import type { PageHandle } from './engine/page.js';
import { SelectorResolver } from './selectors/resolver.js';
import { SiteRegistry } from './sites/registry.js';
import { AnthropicIntentProvider, IntentAnalyzer, type IntentProvider } from './semantic/intent-analyzer.js';
import { ActionRunner, type RunOptions } from './runtime/runner.js';
import { BatchExecutor } from './runtime/batch.js';
import { loadPlan } from './runtime/plan.js';
import { analyzePage, type PageAnalysis } from './runtime/inspect.js';
import { TraceStore } from './trace/store.js';
import { buildTraceRecord } from './trace/redact.js';
import { configuredSecrets, loadConfig } from './config.js';
import { Logger, logger as rootLogger } from './utils/logger.js';
import { SessionError, errorMessage } from './utils/errors.js';
import type { ActionResult, Intent, Plan, TraceRecord, VoiceCartConfig } from './types.js';

export interface VoiceCartOptions {
  config?: VoiceCartConfig;
  /** `null` disables the LLM path; default is Anthropic when a key is configured */
  provider?: IntentProvider | null;
  /** `null` disables persistence; default opens `trace_db_path` when set */
  traces?: TraceStore | null;
  logger?: Logger;
}

export interface CommandResult {
  intent: Intent;
  results: ActionResult[];
}

/**
 * VoiceCart — the main class.
 *
 * Usage:
 * ```typescript
 * const cart = new VoiceCart();
 * await cart.launch();
 *
 * await cart.command('open demo site');
 * const { intent, results } = await cart.command('add backpack to cart and verify price');
 * console.log(intent.name);              // 'add_to_cart_flow'
 * console.log(results.map((r) => r.ok)); // [true, true, true, true, true]
 *
 * await cart.close();
 * ```
 */
export class VoiceCart {
  readonly config: VoiceCartConfig;
  private analyzer: IntentAnalyzer;
  private traceStore: TraceStore | null;
  private engine: BrowserEngine;
  private logger: Logger;
  private secrets: string[];
  private sessionId: string | null = null;
  private runner: ActionRunner | null = null;
  private batch: BatchExecutor | null = null;

  constructor(options: VoiceCartOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? rootLogger;
    this.secrets = configuredSecrets(this.config);

    const provider = options.provider !== undefined
      ? options.provider
      : this.config.anthropic_api_key
        ? new AnthropicIntentProvider(this.config)
        : null;
    this.analyzer = new IntentAnalyzer({
      provider,
      fallbackSite: this.config.default_site,
      logger: this.logger,
    });

    this.traceStore = options.traces !== undefined
      ? options.traces
      : this.config.trace_db_path
        ? new TraceStore(this.config.trace_db_path)
        : null;

    this.engine = new BrowserEngine(this.config, this.logger);
  }

  /** Start Chromium and open one session */
  async launch(): Promise<void> {
    await this.engine.launch();
    this.sessionId = await this.engine.createSession();
    this.attach(this.engine.getPage(this.sessionId));
    this.record(() => this.traceStore?.audit('session_started', { session: this.sessionId }));
  }

  /** Drive an existing page instead of launching a browser */
  attach(page: PageHandle): void {
    const resolver = new SelectorResolver({ ttlMs: this.config.selector_cache_ttl_ms, logger: this.logger });
    const runner = new ActionRunner(page, {
      registry: new SiteRegistry(this.config.base_urls),
      resolver,
      credentials: this.config.credentials,
      customer: this.config.customer,
      defaultSite: this.config.default_site,
      logger: this.logger,
    });
    this.runner = runner;
    this.batch = new BatchExecutor(() => runner.page, { resolver, logger: this.logger });
  }

  async close(): Promise<void> {
    if (this.sessionId) {
      await this.engine.destroySession(this.sessionId);
      this.record(() => this.traceStore?.audit('session_closed', { session: this.sessionId }));
      this.sessionId = null;
    }
    await this.engine.close();
    this.traceStore?.close();
    this.runner = null;
    this.batch = null;
  }

  /** Text → intent; every call leaves one redacted trace record */
  async parse(text: string): Promise<Intent> {
    const intent = await this.analyzer.parse(text);
    this.record(() => this.traceStore?.append(buildTraceRecord(text, intent, this.secrets)));
    return intent;
  }

  async command(text: string, options: RunOptions = {}): Promise<CommandResult> {
    const intent = await this.parse(text);
    const results = await this.run(intent, options);
    return { intent, results };
  }

  async run(intent: Intent, options: RunOptions = {}): Promise<ActionResult[]> {
    const results = await this.requireRunner().run(intent, options);
    this.record(() =>
      this.traceStore?.audit('intent_run', {
        intent: intent.name,
        ok: results.every((r) => r.ok),
        steps: results.map((r) => r.action),
      }),
    );
    return results;
  }

  async runActions(records: readonly unknown[], options: RunOptions = {}): Promise<ActionResult[]> {
    if (!this.batch) throw new SessionError('No page attached. Call launch() or attach() first.');
    return this.batch.execute(records, options);
  }

  /**
   * Run a plan file or a loaded plan. Intent plans stop after the first
   * intent that reports a failure.
   */
  async runPlan(plan: string | Plan, options: RunOptions = {}): Promise<ActionResult[]> {
    const loaded = typeof plan === 'string' ? await loadPlan(plan) : plan;
    if (loaded.kind === 'actions') return this.runActions(loaded.actions, options);

    const results: ActionResult[] = [];
    for (const step of loaded.steps) {
      if (options.signal?.aborted) break;
      const stepResults = await this.run({ name: step.intent, entities: step.entities }, options);
      results.push(...stepResults);
      if (stepResults.some((r) => !r.ok)) break;
    }
    return results;
  }

  /** Login, shopping, search and navigation elements visible on the current page */
  async analyzePage(actionContext?: string): Promise<PageAnalysis> {
    return analyzePage(this.requireRunner().page, actionContext, this.logger);
  }

  traces(limit = 20): TraceRecord[] {
    return this.traceStore?.recent(limit) ?? [];
  }

  /** Trace sink failures are logged, never raised into a command */
  private record(write: () => void): void {
    try {
      write();
    } catch (err) {
      this.logger.warn('Trace write failed', { error: errorMessage(err) });
    }
  }

  private requireRunner(): ActionRunner {
    if (!this.runner) throw new SessionError('No page attached. Call launch() or attach() first.');
    return this.runner;
  }
}
