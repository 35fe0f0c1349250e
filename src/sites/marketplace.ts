import type { OperationOutcome, SelectorChain, SiteCredentials } from '../types.js';
import { BasePageModel } from './base.js';

// Marketplace (flipkart markup). Class names are build hashes and rotate, so
// every element carries text or attribute fallbacks.

const SELECTORS = {
  closeLoginPopup: ['button._2KpZ6l._2doB4z', 'span._30XB9F', 'button:has-text("✕")'],
  searchInput: ['input[title="Search for Products, Brands and More"]', 'input[name="q"]'],
  searchSubmit: ['button[type="submit"]'],
  firstResult: ['a[href*="/p/"]', 'a._1fQZEK', 'a.s1Q9rs'],
  addToCart: ['button._2KpZ6l._2U9uOA._3v1-ww', 'button:has-text("Add to cart")'],
  goToCart: ['a._3SkBxJ', 'a[href*="/viewcart"]'],
  placeOrder: ['button._2KpZ6l._2ObVJD._3AWRsL', 'button:has-text("Place Order")'],
  usePassword: ['span:has-text("Use Password")'],
} as const satisfies Record<string, SelectorChain>;

const USERNAME_CANDIDATES = [
  'input[class*="_2IX_2-"][type="text"]',
  'input[autocomplete="username"]',
  'input[placeholder*="Enter Email"], input[placeholder*="Mobile"]',
];

const PASSWORD_CANDIDATES = [
  'input[class*="_2IX_2-"][type="password"]',
  'input[autocomplete="current-password"]',
  'input[type="password"]',
];

const SUBMIT_CANDIDATES = [
  'button._2KpZ6l._2HKlqd._3AWRsL',
  'button:has-text("Login")',
  'button:has-text("Request OTP")',
  'button[type="submit"]',
];

export class MarketplaceSitePage extends BasePageModel {
  readonly site = 'marketplace' as const;

  /** The first-visit login modal covers everything until closed */
  async dismissPopup(): Promise<OperationOutcome> {
    const done = await this.bestEffort([
      {
        label: 'close-login-modal',
        run: () => this.click(SELECTORS.closeLoginPopup, this.timings.short),
        final: true,
      },
      { label: 'escape', run: () => this.active.keyboard.press('Escape') },
    ]);
    const dismissed = done.includes('close-login-modal');
    if (dismissed) this.logger.info('Closed initial login popup');
    return { data: { dismissed } };
  }

  async openLogin(): Promise<OperationOutcome> {
    const done = await this.bestEffort([
      { label: 'login-link', run: () => this.clickText('Login') },
    ]);
    // The modal may already be up
    return { data: { opened: done.length > 0 } };
  }

  async loginWithPassword(credentials: SiteCredentials): Promise<OperationOutcome> {
    // Some layouts default to OTP
    await this.bestEffort([
      { label: 'use-password', run: () => this.click(SELECTORS.usePassword, 4_000) },
    ]);

    const user = await this.fillAny(USERNAME_CANDIDATES, credentials.username);
    if (!user) this.logger.warn('Username field not found; continuing');

    const pass = await this.fillAny(PASSWORD_CANDIDATES, credentials.password);
    if (!pass) this.logger.warn('Password field not found; continuing');

    const submit = await this.clickAny(SUBMIT_CANDIDATES);
    if (!submit) throw new Error('No login submit control accepted a click');

    return { selector: submit, data: { username_filled: user !== null, password_filled: pass !== null } };
  }

  async search(query: string): Promise<OperationOutcome> {
    const selector = await this.fill(SELECTORS.searchInput, query, 30_000);
    await this.click(SELECTORS.searchSubmit);
    await this.active.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
    return { selector, data: { query } };
  }

  async openFirstResult(): Promise<OperationOutcome> {
    const found = await this.waitForFirst(SELECTORS.firstResult, 15_000);
    // Last resort: the first link on the page
    const selector = found ?? 'a';
    const openedIn = await this.clickMaybePopup(this.active.locator(selector).first());
    return { selector, data: { opened_in: openedIn, url: this.active.url() } };
  }

  async addSelectedToCart(product?: string): Promise<OperationOutcome> {
    await this.active.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
    const selector = await this.clickWithTextFallback(SELECTORS.addToCart, 'Add to cart', 45_000);
    return { selector, data: { product: product ?? null } };
  }

  async goToCart(): Promise<OperationOutcome> {
    const selector = await this.clickWithTextFallback(SELECTORS.goToCart, 'Cart', 15_000);
    return { selector };
  }

  async placeOrder(): Promise<OperationOutcome> {
    const selector = await this.clickWithTextFallback(SELECTORS.placeOrder, 'Place Order');
    return { selector, data: { submitted: true } };
  }
}
