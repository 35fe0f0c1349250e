import type { LocatorHandle, PageHandle } from '../engine/page.js';
import type { CustomerInfo, OperationOutcome, SelectorChain, SiteCredentials } from '../types.js';
import { BasePageModel, type PageModelDeps, type PriceReader } from './base.js';

// ─────────────────────────────────────────────────────────────────────────────
// Demo shop (saucedemo markup)
//
// No search box: "search" waits for the inventory and remembers the query,
// "first result" is the product whose name best matches it. Add-to-cart is
// verified by the button flipping to Remove and the cart badge counting up.
// ─────────────────────────────────────────────────────────────────────────────

const SELECTORS = {
  username: ['#user-name', '[data-test="username"]'],
  password: ['#password', '[data-test="password"]'],
  loginButton: ['#login-button', '[data-test="login-button"]'],
  inventoryItem: '.inventory_item',
  itemName: '.inventory_item_name',
  itemPrice: ['.inventory_details_price', '.inventory_item_price'],
  addToCart: ['[data-test^="add-to-cart"]', '#add-to-cart', 'button.btn_inventory'],
  cartLink: ['.shopping_cart_link', '[data-test="shopping-cart-link"]'],
  cartBadge: '.shopping_cart_badge',
  cartItem: '.cart_item',
  checkout: ['#checkout', '[data-test="checkout"]'],
  firstName: ['#first-name', '[data-test="firstName"]'],
  lastName: ['#last-name', '[data-test="lastName"]'],
  postalCode: ['#postal-code', '[data-test="postalCode"]'],
  continue: ['#continue', '[data-test="continue"]'],
  finish: ['#finish', '[data-test="finish"]'],
  completeHeader: '.complete-header',
} as const satisfies Record<string, SelectorChain | string>;

const DEFAULT_CUSTOMER: CustomerInfo = { first_name: 'Test', last_name: 'Shopper', postal_code: '00000' };

export class DemoSitePage extends BasePageModel implements PriceReader {
  readonly site = 'demo' as const;

  private readonly customer: CustomerInfo;
  private query: string | null = null;
  private selected: string | null = null;

  constructor(page: PageHandle, deps: PageModelDeps) {
    super(page, deps);
    this.customer = deps.customer ?? DEFAULT_CUSTOMER;
  }

  async openLogin(): Promise<OperationOutcome> {
    // The landing page is the login form
    if (!this.root.url().startsWith(this.baseUrl)) {
      await this.open();
    }
    return { data: { url: this.root.url() } };
  }

  async loginWithPassword(credentials: SiteCredentials): Promise<OperationOutcome> {
    await this.fill(SELECTORS.username, credentials.username);
    await this.fill(SELECTORS.password, credentials.password);
    const selector = await this.click(SELECTORS.loginButton, 15_000);
    await this.waitForInventory();
    return { selector, data: { logged_in: true } };
  }

  async search(query: string): Promise<OperationOutcome> {
    await this.waitForInventory();
    this.query = query;
    const names = await this.productNames();
    return { selector: SELECTORS.inventoryItem, data: { query, products: names.length } };
  }

  async openFirstResult(): Promise<OperationOutcome> {
    const names = await this.productNames();
    let link: LocatorHandle = this.active.locator(SELECTORS.itemName).first();
    let product: string | null = null;

    if (names.length > 0) {
      product = this.query ? bestMatch(this.query, names) : (names[0] ?? null);
      if (product) {
        link = this.active.locator(SELECTORS.itemName).filter({ hasText: product }).first();
      }
    }

    await link.click({ timeout: this.timings.element });
    await this.active.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
    this.selected = product;
    return { selector: SELECTORS.itemName, data: { product, opened_in: 'same_tab' } };
  }

  async addSelectedToCart(product?: string): Promise<OperationOutcome> {
    const before = await this.cartCount();
    const selector = await this.clickWithTextFallback(SELECTORS.addToCart, 'Add to cart', 15_000);

    let flipped = true;
    try {
      await this.active
        .getByRole('button', { name: /^Remove$/i })
        .first()
        .waitFor({ state: 'visible', timeout: 8_000 });
    } catch {
      flipped = false;
    }

    const expected = before + 1;
    const counted = await this.poll(async () => (await this.cartCount()) >= expected);
    if (!flipped || !counted) {
      this.logger.warn('Add to cart not confirmed, continuing', { flipped, counted, expected });
    }

    return {
      selector,
      data: {
        product: product ?? this.selected,
        verified: flipped && counted,
        expected_cart_count: expected,
      },
    };
  }

  async goToCart(): Promise<OperationOutcome> {
    const selector = await this.click(SELECTORS.cartLink, 10_000);
    try {
      await this.active.locator(SELECTORS.checkout[0]).first().waitFor({ state: 'visible', timeout: 10_000 });
    } catch {
      this.logger.debug('Checkout button not visible after opening cart');
    }
    return { selector, data: { items: await this.active.locator(SELECTORS.cartItem).count() } };
  }

  async placeOrder(): Promise<OperationOutcome> {
    await this.click(SELECTORS.checkout, 15_000);
    await this.fill(SELECTORS.firstName, this.customer.first_name, 15_000);
    await this.fill(SELECTORS.lastName, this.customer.last_name, 10_000);
    await this.fill(SELECTORS.postalCode, this.customer.postal_code, 10_000);
    await this.click(SELECTORS.continue, 15_000);
    const selector = await this.click(SELECTORS.finish, 15_000);

    await this.active
      .locator(SELECTORS.completeHeader)
      .first()
      .waitFor({ state: 'visible', timeout: this.timings.element });
    const confirmation = await this.textOf(this.active.locator(SELECTORS.completeHeader));
    return { selector, data: { completed: true, confirmation } };
  }

  // ─── Prices ───────────────────────────────────────────────────────────────

  async productPrice(): Promise<string | null> {
    for (const selector of SELECTORS.itemPrice) {
      const text = await this.textOf(this.active.locator(selector), 5_000);
      if (text) return text;
    }
    return null;
  }

  async cartPrice(product?: string): Promise<string | null> {
    const name = product ?? this.selected;
    let item = this.active.locator(SELECTORS.cartItem);
    if (name) item = item.filter({ hasText: name });
    return this.textOf(item.first().locator('.inventory_item_price'), 5_000);
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async waitForInventory(): Promise<void> {
    await this.active
      .locator(SELECTORS.inventoryItem)
      .first()
      .waitFor({ state: 'visible', timeout: this.timings.element });
  }

  private async productNames(): Promise<string[]> {
    const items = this.active.locator(SELECTORS.itemName);
    const names: string[] = [];
    const count = await items.count();
    for (let i = 0; i < count; i++) {
      try {
        const name = (await items.nth(i).innerText({ timeout: 1_000 })).trim();
        if (name) names.push(name);
      } catch {
        continue;
      }
    }
    return names;
  }

  private async cartCount(): Promise<number> {
    const text = await this.textOf(this.active.locator(SELECTORS.cartBadge));
    const n = text ? Number.parseInt(text, 10) : 0;
    return Number.isNaN(n) ? 0 : n;
  }
}

// ─── Fuzzy product matching ─────────────────────────────────────────────────

/** 1 for containment either way, else Dice similarity over character bigrams */
export function matchScore(query: string, name: string): number {
  const a = query.toLowerCase().trim();
  const b = name.toLowerCase().trim();
  if (!a || !b) return 0;
  if (a.includes(b) || b.includes(a)) return 1;

  const bigrams = (s: string) => {
    const out = new Map<string, number>();
    for (let i = 0; i < s.length - 1; i++) {
      const g = s.slice(i, i + 2);
      out.set(g, (out.get(g) ?? 0) + 1);
    }
    return out;
  };

  const ga = bigrams(a);
  const gb = bigrams(b);
  let overlap = 0;
  for (const [g, n] of ga) overlap += Math.min(n, gb.get(g) ?? 0);
  const total = Math.max(a.length - 1, 0) + Math.max(b.length - 1, 0);
  return total === 0 ? 0 : (2 * overlap) / total;
}

export function bestMatch(query: string, names: readonly string[]): string | null {
  let best: string | null = null;
  let bestScore = -1;
  for (const name of names) {
    const score = matchScore(query, name);
    if (score > bestScore) {
      best = name;
      bestScore = score;
    }
  }
  return best;
}
