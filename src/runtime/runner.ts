import type { PageHandle } from '../engine/page.js';
import type {
  ActionResult,
  CustomerInfo,
  FlowState,
  Intent,
  OperationOutcome,
  SiteCredentials,
  SiteId,
} from '../types.js';
import { canReadPrices, type SitePageModel, type Timings } from '../sites/base.js';
import { SiteRegistry } from '../sites/registry.js';
import { siteLabel } from '../sites/catalog.js';
import { SelectorResolver } from '../selectors/resolver.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { compileFlow, openAndDismiss } from './flow.js';

// ─────────────────────────────────────────────────────────────────────────────
// ActionRunner — Intent → page-model operations → ActionResult[]
//
// Every operation is timed and converted to a result; nothing thrown by a
// page model escapes run(). Dependent sequences (add to cart, flows) stop
// at their first failure. The abort signal is checked between operations.
// ─────────────────────────────────────────────────────────────────────────────

export interface ActionRunnerOptions {
  registry?: SiteRegistry;
  resolver?: SelectorResolver;
  credentials?: Partial<Record<SiteId, SiteCredentials>>;
  customer?: CustomerInfo;
  defaultSite?: SiteId;
  timings?: Partial<Timings>;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface Operation {
  action: string;
  run: () => Promise<OperationOutcome>;
  reaches?: FlowState;
}

export class ActionRunner {
  private readonly rootPage: PageHandle;
  private readonly registry: SiteRegistry;
  private readonly resolver: SelectorResolver;
  private readonly credentials: Partial<Record<SiteId, SiteCredentials>>;
  private readonly customer?: CustomerInfo;
  private readonly defaultSite: SiteId;
  private readonly timings?: Partial<Timings>;
  private readonly logger: Logger;
  private model: SitePageModel | null = null;
  private flowState: FlowState = 'start';

  constructor(page: PageHandle, options: ActionRunnerOptions = {}) {
    this.rootPage = page;
    this.logger = (options.logger ?? rootLogger).child({ name: 'runner' });
    this.registry = options.registry ?? new SiteRegistry();
    this.resolver = options.resolver ?? new SelectorResolver({ logger: this.logger });
    this.credentials = options.credentials ?? {};
    this.customer = options.customer;
    this.defaultSite = options.defaultSite ?? 'demo';
    this.timings = options.timings;
  }

  /** The page later operations act on: the tab a result opened in, if any */
  get page(): PageHandle {
    return this.model?.page ?? this.rootPage;
  }

  get currentSite(): SiteId | null {
    return this.model?.site ?? null;
  }

  /** Last checkout state an operation reached */
  get state(): FlowState {
    return this.flowState;
  }

  get selectorResolver(): SelectorResolver {
    return this.resolver;
  }

  async run(intent: Intent, options: RunOptions = {}): Promise<ActionResult[]> {
    const { entities } = intent;
    this.logger.debug('Running intent', { intent: intent.name });

    switch (intent.name) {
      case 'navigate': {
        if (!entities.site) {
          this.logger.info('Navigate without a site, nothing to do');
          return [];
        }
        const site = this.registry.resolveSite(entities.site);
        if (!site) return [failure('navigate', `No page model for ${entities.site}`)];
        const model = this.useSite(site);
        const url = isUrl(entities.site) ? entities.site : undefined;
        return this.sequence([{ action: 'navigate', reaches: 'popup_dismissed', run: () => openAndDismiss(model, url) }], options);
      }

      case 'search': {
        const query = entities.query;
        if (!query) return [failure('search', 'No query to search for')];
        const model = this.current();
        return this.sequence([{ action: 'search', reaches: 'searched', run: () => model.search(query) }], options);
      }

      case 'add_to_cart': {
        const model = this.current();
        return this.sequence([
          { action: 'open_first_result', reaches: 'result_opened', run: () => model.openFirstResult() },
          { action: 'add_selected_to_cart', reaches: 'added_to_cart', run: () => model.addSelectedToCart(entities.product) },
          { action: 'go_to_cart', reaches: 'cart_viewed', run: () => model.goToCart() },
        ], options);
      }

      case 'checkout':
      case 'place_order': {
        const model = this.current();
        return this.sequence([{ action: 'place_order', reaches: 'order_placed', run: () => model.placeOrder() }], options);
      }

      case 'click': {
        const target = entities.target;
        if (!target) return [failure('click', 'No click target')];
        const model = this.current();
        const [result] = await this.sequence([{ action: 'click', run: () => model.clickText(target) }], options);
        if (result && !result.ok) this.logger.warn('Failed to click target', { target });
        return result ? [result] : [];
      }

      case 'fill_form':
        return this.fillForm(entities.fields ?? {}, options);

      case 'login':
        this.logger.info('Login intent received; login runs as part of checkout flows');
        return [];

      case 'full_checkout_flow':
      case 'add_to_cart_flow':
        return this.runFlow(intent, options);

      case 'unknown':
        this.logger.warn('Unknown intent, no action taken', { raw: entities.raw });
        return [];
    }
  }

  /** Bind (or keep) the page model for a site */
  useSite(site: SiteId): SitePageModel {
    if (this.model?.site === site) return this.model;
    this.model = this.registry.create(site, this.rootPage, {
      resolver: this.resolver,
      customer: this.customer,
      logger: this.logger,
      timings: this.timings,
    });
    this.logger.info('Using page model', { site, label: siteLabel(site) });
    return this.model;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private current(): SitePageModel {
    return this.model ?? this.useSite(this.defaultSite);
  }

  private async runFlow(intent: Intent, options: RunOptions): Promise<ActionResult[]> {
    const raw = intent.entities.site;
    const named = raw ? this.registry.resolveSite(raw) : null;
    if (raw && !named) return [failure('open', `No page model for ${raw}`)];
    const site = named ?? this.defaultSite;
    const model = this.useSite(site);

    const flow = compileFlow(intent, {
      credentials: this.credentials[site],
      url: raw && isUrl(raw) ? raw : undefined,
      pricesReadable: canReadPrices(model),
    });
    for (const skip of flow.skipped) {
      this.logger.info('Flow step skipped', { site, step: skip.step, reason: skip.reason });
    }

    this.flowState = 'start';
    return this.sequence(
      flow.steps.map((step) => ({ action: step.id, reaches: step.reaches, run: () => step.run(model) })),
      options,
    );
  }

  private async fillForm(fields: Record<string, string>, options: RunOptions): Promise<ActionResult[]> {
    const ops: Operation[] = Object.entries(fields).map(([selector, value]) => ({
      action: 'fill',
      run: async () => {
        const page = this.page;
        const working = await this.resolver.resolve(selector, page);
        const field = page.locator(working).first();
        await field.waitFor({ state: 'visible', timeout: 20_000 });
        await field.fill(value, { timeout: 20_000 });
        return { selector: working, data: { field: selector } };
      },
    }));
    // Fields are independent of each other
    const results: ActionResult[] = [];
    for (const op of ops) {
      if (options.signal?.aborted) {
        results.push(cancelled(op.action));
        break;
      }
      results.push(await this.execute(op));
    }
    return results;
  }

  /** Run in order, stopping at the first failure or at cancellation */
  private async sequence(ops: readonly Operation[], options: RunOptions): Promise<ActionResult[]> {
    const results: ActionResult[] = [];
    for (const op of ops) {
      if (options.signal?.aborted) {
        this.logger.info('Run cancelled', { before: op.action });
        results.push(cancelled(op.action));
        break;
      }
      const result = await this.execute(op);
      results.push(result);
      if (!result.ok) break;
      if (op.reaches) {
        this.logger.debug('Flow state', { from: this.flowState, to: op.reaches });
        this.flowState = op.reaches;
      }
    }
    return results;
  }

  private async execute(op: Operation): Promise<ActionResult> {
    const started = Date.now();
    try {
      const outcome = await op.run();
      const result: ActionResult = { action: op.action, ok: true, elapsed_ms: Date.now() - started };
      if (outcome.selector) result.selector_used = outcome.selector;
      if (outcome.data) result.data = outcome.data;
      return result;
    } catch (err) {
      const error = errorMessage(err);
      this.logger.warn('Operation failed', { action: op.action, error });
      return { action: op.action, ok: false, error, elapsed_ms: Date.now() - started };
    }
  }
}

function failure(action: string, error: string): ActionResult {
  return { action, ok: false, error, elapsed_ms: 0 };
}

function cancelled(action: string): ActionResult {
  return failure(action, 'Cancelled before start');
}

function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}
