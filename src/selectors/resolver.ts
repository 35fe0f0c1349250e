import type { PageHandle } from '../engine/page.js';
import type { Clock } from '../types.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { generateAlternatives } from './alternatives.js';
import { DEFAULT_SELECTOR_TTL_MS, SelectorCache } from './cache.js';

// ─────────────────────────────────────────────────────────────────────────────
// SelectorResolver — declared selector in, workable selector out
//
//   cache (fresh) → verbatim probe → generated alternatives → original
//
// Never fails: a miss hands back the declared selector and the click or fill
// that follows reports "not found" with its own timeout.
// ─────────────────────────────────────────────────────────────────────────────

export interface SelectorResolverOptions {
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class SelectorResolver {
  private cache: SelectorCache;
  private logger: Logger;
  private origin: string | null = null;

  constructor(options: SelectorResolverOptions = {}) {
    this.cache = new SelectorCache(options.ttlMs ?? DEFAULT_SELECTOR_TTL_MS, options.clock ?? Date.now);
    this.logger = (options.logger ?? rootLogger).child({ name: 'selectors' });
  }

  async resolve(selector: string, page: PageHandle): Promise<string> {
    const cached = this.cache.get(selector);
    if (cached) return cached;

    if (await this.matches(page, selector)) {
      this.cache.set(selector, selector);
      return selector;
    }

    for (const alternative of generateAlternatives([selector])) {
      if (await this.matches(page, alternative)) {
        this.cache.set(selector, alternative);
        this.logger.info('Alternative selector worked', { original: selector, working: alternative });
        return alternative;
      }
    }

    this.logger.debug('No working selector found, keeping original', { selector });
    return selector;
  }

  /** First selector whose top match is visible, then the same over alternatives. `null` when nothing shows. */
  async firstVisible(selectors: readonly string[], page: PageHandle): Promise<string | null> {
    for (const selector of selectors) {
      if (await this.visible(page, selector)) return selector;
    }

    for (const alternative of generateAlternatives(selectors)) {
      if (await this.visible(page, alternative)) {
        this.logger.info('Generated selector is visible', { working: alternative });
        return alternative;
      }
    }

    return null;
  }

  /** Selectors are not assumed valid across origins. */
  noteNavigation(url: string): void {
    const origin = originOf(url);
    if (this.origin !== null && origin !== this.origin) {
      this.logger.debug('Origin changed, dropping selector cache', { from: this.origin, to: origin });
      this.cache.clear();
    }
    this.origin = origin;
  }

  clear(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async matches(page: PageHandle, selector: string): Promise<boolean> {
    try {
      return (await page.locator(selector).count()) > 0;
    } catch (err) {
      this.logger.debug('Selector probe failed', { selector, error: errorMessage(err) });
      return false;
    }
  }

  private async visible(page: PageHandle, selector: string): Promise<boolean> {
    try {
      return await page.locator(selector).first().isVisible();
    } catch (err) {
      this.logger.debug('Visibility probe failed', { selector, error: errorMessage(err) });
      return false;
    }
  }
}

function originOf(url: string): string {
  try { return new URL(url).origin; }
  catch { return url; }
}
