import type { LocatorHandle, PageHandle } from '../engine/page.js';
import type { SelectorResolver } from '../selectors/resolver.js';
import type {
  CustomerInfo,
  OperationOutcome,
  SelectorChain,
  SiteCredentials,
  SiteId,
} from '../types.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// SitePageModel — one semantic surface, one strategy per site
//
// Operations may throw; the runner turns a throw into a failed ActionResult.
// Everything marked best-effort in here swallows its own failures.
// ─────────────────────────────────────────────────────────────────────────────

export interface SitePageModel {
  readonly site: SiteId;
  readonly baseUrl: string;
  /** Whichever page is current: the session page, or the tab a result opened in */
  readonly page: PageHandle;

  open(url?: string): Promise<OperationOutcome>;
  dismissPopup(): Promise<OperationOutcome>;
  openLogin(): Promise<OperationOutcome>;
  loginWithPassword(credentials: SiteCredentials): Promise<OperationOutcome>;
  search(query: string): Promise<OperationOutcome>;
  openFirstResult(): Promise<OperationOutcome>;
  addSelectedToCart(product?: string): Promise<OperationOutcome>;
  goToCart(): Promise<OperationOutcome>;
  placeOrder(): Promise<OperationOutcome>;
  clickText(text: string): Promise<OperationOutcome>;
}

/** Sites whose markup exposes prices on both the product and the cart page */
export interface PriceReader {
  productPrice(product?: string): Promise<string | null>;
  cartPrice(product?: string): Promise<string | null>;
}

export function canReadPrices(model: SitePageModel): model is SitePageModel & PriceReader {
  return 'productPrice' in model && 'cartPrice' in model;
}

export interface Timings {
  navigation: number;
  element: number;
  short: number;
  popup: number;
  pollInterval: number;
  pollTimeout: number;
}

export const DEFAULT_TIMINGS: Timings = {
  navigation: 60_000,
  element: 20_000,
  short: 5_000,
  popup: 5_000,
  pollInterval: 250,
  pollTimeout: 10_000,
};

export interface PageModelDeps {
  resolver: SelectorResolver;
  baseUrl: string;
  customer?: CustomerInfo;
  logger?: Logger;
  timings?: Partial<Timings>;
}

/** One optional step in a swallow-and-continue chain */
export interface OptionalStep {
  label: string;
  run: () => Promise<unknown>;
  /** Stop the chain once this step succeeds */
  final?: boolean;
}

export abstract class BasePageModel implements SitePageModel {
  abstract readonly site: SiteId;
  readonly baseUrl: string;

  protected readonly root: PageHandle;
  protected active: PageHandle;
  protected readonly resolver: SelectorResolver;
  protected readonly timings: Timings;
  protected readonly logger: Logger;

  constructor(page: PageHandle, deps: PageModelDeps) {
    this.root = page;
    this.active = page;
    this.resolver = deps.resolver;
    this.baseUrl = deps.baseUrl;
    this.timings = { ...DEFAULT_TIMINGS, ...deps.timings };
    this.logger = (deps.logger ?? rootLogger).child({ name: 'sites' });
  }

  get page(): PageHandle {
    return this.active;
  }

  async open(url: string = this.baseUrl): Promise<OperationOutcome> {
    await this.root.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timings.navigation });
    this.active = this.root;
    this.resolver.noteNavigation(url);
    this.logger.info('Navigated', { site: this.site, url });
    return { data: { url } };
  }

  async dismissPopup(): Promise<OperationOutcome> {
    return { data: { dismissed: false } };
  }

  async clickText(text: string): Promise<OperationOutcome> {
    await this.active.getByText(text, { exact: false }).first().click({ timeout: 10_000 });
    return { selector: `text=${text}` };
  }

  abstract openLogin(): Promise<OperationOutcome>;
  abstract loginWithPassword(credentials: SiteCredentials): Promise<OperationOutcome>;
  abstract search(query: string): Promise<OperationOutcome>;
  abstract openFirstResult(): Promise<OperationOutcome>;
  abstract addSelectedToCart(product?: string): Promise<OperationOutcome>;
  abstract goToCart(): Promise<OperationOutcome>;
  abstract placeOrder(): Promise<OperationOutcome>;

  // ─── Shared mechanics ─────────────────────────────────────────────────────

  /** Visible candidate if any, else the resolver's pick for the first candidate */
  protected async locate(chain: SelectorChain, page: PageHandle = this.active): Promise<string> {
    const visible = await this.resolver.firstVisible(chain, page);
    if (visible) return visible;
    return this.resolver.resolve(chain[0], page);
  }

  protected async click(
    chain: SelectorChain,
    timeout: number = this.timings.element,
    page: PageHandle = this.active,
  ): Promise<string> {
    const selector = await this.locate(chain, page);
    await page.locator(selector).first().click({ timeout });
    return selector;
  }

  protected async fill(
    chain: SelectorChain,
    value: string,
    timeout: number = this.timings.element,
    page: PageHandle = this.active,
  ): Promise<string> {
    const selector = await this.locate(chain, page);
    const field = page.locator(selector).first();
    await field.waitFor({ state: 'visible', timeout });
    await field.fill(value, { timeout });
    return selector;
  }

  /** Click the declared element; if that fails, the first element containing `text` */
  protected async clickWithTextFallback(
    chain: SelectorChain,
    text: string,
    timeout: number = this.timings.element,
    page: PageHandle = this.active,
  ): Promise<string> {
    try {
      return await this.click(chain, timeout, page);
    } catch (err) {
      this.logger.debug('Declared selector failed, matching by text', {
        site: this.site,
        text,
        error: errorMessage(err),
      });
      await page.getByText(text, { exact: false }).first().click({ timeout: this.timings.short });
      return `text=${text}`;
    }
  }

  /** Wait on each candidate in turn until one shows; `null` if none does */
  protected async waitForFirst(
    chain: SelectorChain,
    timeoutEach: number,
    page: PageHandle = this.active,
  ): Promise<string | null> {
    const visible = await this.resolver.firstVisible(chain, page);
    if (visible) return visible;

    for (const selector of chain) {
      try {
        await page.locator(selector).first().waitFor({ state: 'visible', timeout: timeoutEach });
        return selector;
      } catch {
        this.logger.debug('Candidate never became visible', { site: this.site, selector });
      }
    }
    return null;
  }

  /** Runs every step, ignoring failures. Returns the labels that succeeded. */
  protected async bestEffort(steps: readonly OptionalStep[]): Promise<string[]> {
    const done: string[] = [];
    for (const step of steps) {
      try {
        await step.run();
        done.push(step.label);
        if (step.final) break;
      } catch (err) {
        this.logger.debug('Optional step skipped', {
          site: this.site,
          step: step.label,
          error: errorMessage(err),
        });
      }
    }
    return done;
  }

  /** Fill the first candidate that accepts the value */
  protected async fillAny(
    candidates: readonly string[],
    value: string,
    timeout: number = this.timings.short,
  ): Promise<string | null> {
    for (const selector of candidates) {
      try {
        await this.active.locator(selector).first().fill(value, { timeout });
        return selector;
      } catch {
        continue;
      }
    }
    return null;
  }

  /** Click the first candidate that accepts the click */
  protected async clickAny(
    candidates: readonly string[],
    timeout: number = this.timings.short,
  ): Promise<string | null> {
    for (const selector of candidates) {
      try {
        await this.active.locator(selector).first().click({ timeout });
        return selector;
      } catch {
        continue;
      }
    }
    return null;
  }

  /**
   * Click a link that may open a new tab. The popup wait is armed before the
   * click; whichever page ends up showing the result becomes current.
   */
  protected async clickMaybePopup(link: LocatorHandle): Promise<'popup' | 'same_tab'> {
    const popup = this.active
      .waitForEvent('popup', { timeout: this.timings.popup })
      .then((page): PageHandle | null => page, () => null);

    await link.click({ timeout: this.timings.element });
    const opened = await popup;

    if (opened) {
      this.active = opened;
      await opened.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
      return 'popup';
    }
    await this.active.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
    return 'same_tab';
  }

  /** Fixed-interval poll; elapsed time is counted in intervals so stub pages finish instantly */
  protected async poll(
    check: () => Promise<boolean>,
    timeout: number = this.timings.pollTimeout,
    interval: number = this.timings.pollInterval,
  ): Promise<boolean> {
    let elapsed = 0;
    while (elapsed < timeout) {
      try {
        if (await check()) return true;
      } catch (err) {
        this.logger.debug('Poll check failed', { site: this.site, error: errorMessage(err) });
      }
      await this.active.waitForTimeout(interval);
      elapsed += interval;
    }
    return false;
  }

  protected async textOf(locator: LocatorHandle, timeout = 1_000): Promise<string | null> {
    try {
      if ((await locator.count()) === 0) return null;
      return (await locator.first().innerText({ timeout })).trim();
    } catch {
      return null;
    }
  }
}
