import { describe, it, expect } from 'vitest';
import { SelectorResolver } from '../src/selectors/resolver.js';
import { bestMatch, matchScore, DemoSitePage } from '../src/sites/demo.js';
import { MarketplaceSitePage } from '../src/sites/marketplace.js';
import { RetailSitePage } from '../src/sites/retail.js';
import { SiteRegistry } from '../src/sites/registry.js';
import { siteFromText, siteFromUrl } from '../src/sites/catalog.js';
import type { PageModelDeps } from '../src/sites/base.js';
import { StubPage } from './helpers/stub-page.js';
import { quietLogger } from './helpers/quiet-logger.js';

const deps = (baseUrl: string): PageModelDeps => ({
  resolver: new SelectorResolver({ logger: quietLogger() }),
  baseUrl,
  logger: quietLogger(),
});

const credentials = { username: 'shopper@example.com', password: 'test-secret' };

describe('Site catalog and registry', () => {
  it('finds sites by keyword', () => {
    expect(siteFromText('go to flipkart')).toBe('marketplace');
    expect(siteFromText('open the demo site')).toBe('demo');
    expect(siteFromText('open amazon')).toBe('retail');
    expect(siteFromText('open the shop')).toBeNull();
  });

  it('finds sites by hostname, subdomains included', () => {
    expect(siteFromUrl('https://www.amazon.in/s?k=lamp')).toBe('retail');
    expect(siteFromUrl('https://saucedemo.com/')).toBe('demo');
    expect(siteFromUrl('https://example.com/')).toBeNull();
    expect(siteFromUrl('not a url')).toBeNull();
  });

  it('resolves ids, keywords and URLs', () => {
    const registry = new SiteRegistry();
    expect(registry.resolveSite('demo')).toBe('demo');
    expect(registry.resolveSite('Flipkart')).toBe('marketplace');
    expect(registry.resolveSite('https://www.flipkart.com/search?q=bag')).toBe('marketplace');
    expect(registry.resolveSite('https://example.com')).toBeNull();
    expect(registry.resolveSite(undefined)).toBeNull();
  });

  it('builds page models bound to the configured base URL', () => {
    const registry = new SiteRegistry({ demo: 'http://localhost:8080' });
    const model = registry.create('demo', new StubPage(), { resolver: new SelectorResolver(), logger: quietLogger() });
    expect(model).toBeInstanceOf(DemoSitePage);
    expect(model.baseUrl).toBe('http://localhost:8080');
    expect(registry.urlFor('retail')).toBe('https://www.amazon.com');
  });
});

describe('DemoSitePage', () => {
  const products = { '.inventory_item_name': ['Sauce Labs Backpack', 'Sauce Labs Bike Light'] };

  it('opens its base URL', async () => {
    const page = new StubPage();
    const model = new DemoSitePage(page, deps('https://www.saucedemo.com'));
    const outcome = await model.open();
    expect(outcome).toEqual({ data: { url: 'https://www.saucedemo.com' } });
    expect(page.of('goto')).toEqual(['https://www.saucedemo.com']);
  });

  it('logs in with the configured credentials', async () => {
    const page = new StubPage();
    const model = new DemoSitePage(page, deps('https://www.saucedemo.com'));
    const outcome = await model.loginWithPassword(credentials);
    expect(outcome).toEqual({ selector: '#login-button', data: { logged_in: true } });
    expect(page.of('fill')).toEqual(['#user-name=shopper@example.com', '#password=test-secret']);
  });

  it('opens the product that best matches the search', async () => {
    const page = new StubPage({ texts: products });
    const model = new DemoSitePage(page, deps('https://www.saucedemo.com'));

    const searched = await model.search('bike light');
    expect(searched).toEqual({ selector: '.inventory_item', data: { query: 'bike light', products: 2 } });

    const opened = await model.openFirstResult();
    expect(opened.data).toEqual({ product: 'Sauce Labs Bike Light', opened_in: 'same_tab' });
  });

  it('reports an unconfirmed add to cart without failing', async () => {
    const page = new StubPage({ texts: { ...products, '.shopping_cart_badge': ['1'] } });
    const model = new DemoSitePage(page, deps('https://www.saucedemo.com'));

    const outcome = await model.addSelectedToCart('Sauce Labs Backpack');
    expect(outcome).toEqual({
      selector: '[data-test^="add-to-cart"]',
      data: { product: 'Sauce Labs Backpack', verified: false, expected_cart_count: 2 },
    });
  });

  it('fills customer details and finishes the order', async () => {
    const page = new StubPage({ texts: { '.complete-header': ['Thank you for your order!'] } });
    const model = new DemoSitePage(page, deps('https://www.saucedemo.com'));

    const outcome = await model.placeOrder();
    expect(outcome).toEqual({
      selector: '#finish',
      data: { completed: true, confirmation: 'Thank you for your order!' },
    });
    expect(page.of('fill')).toEqual(['#first-name=Test', '#last-name=Shopper', '#postal-code=00000']);
  });

  it('reads product and cart prices', async () => {
    const page = new StubPage({
      texts: {
        '.inventory_details_price': ['$29.99'],
        '.cart_item >> .inventory_item_price': ['$29.99'],
      },
    });
    const model = new DemoSitePage(page, deps('https://www.saucedemo.com'));
    expect(await model.productPrice()).toBe('$29.99');
    expect(await model.cartPrice('Sauce Labs Backpack')).toBe('$29.99');
  });
});

describe('Fuzzy product matching', () => {
  it('scores containment as a full match', () => {
    expect(matchScore('backpack', 'Sauce Labs Backpack')).toBe(1);
    expect(matchScore('', 'Sauce Labs Backpack')).toBe(0);
  });

  it('picks the closest name', () => {
    expect(bestMatch('fleece jacket', ['Sauce Labs Onesie', 'Sauce Labs Fleece Jacket'])).toBe('Sauce Labs Fleece Jacket');
    expect(bestMatch('anything', [])).toBeNull();
  });
});

describe('MarketplaceSitePage', () => {
  it('closes the first-visit login modal', async () => {
    const page = new StubPage();
    const model = new MarketplaceSitePage(page, deps('https://www.flipkart.com'));
    expect(await model.dismissPopup()).toEqual({ data: { dismissed: true } });
    expect(page.of('click')).toEqual(['button._2KpZ6l._2doB4z']);
  });

  it('falls back to Escape when no close control exists', async () => {
    const page = new StubPage({
      missing: ['button._2KpZ6l._2doB4z', 'span._30XB9F', 'button:has-text("✕")'],
    });
    const model = new MarketplaceSitePage(page, deps('https://www.flipkart.com'));
    expect(await model.dismissPopup()).toEqual({ data: { dismissed: false } });
    expect(page.of('press')).toEqual(['Escape']);
  });

  it('opens the first result in the same tab when no popup appears', async () => {
    const page = new StubPage({ url: 'https://www.flipkart.com/search?q=bag' });
    const model = new MarketplaceSitePage(page, deps('https://www.flipkart.com'));
    const outcome = await model.openFirstResult();
    expect(outcome).toEqual({
      selector: 'a[href*="/p/"]',
      data: { opened_in: 'same_tab', url: 'https://www.flipkart.com/search?q=bag' },
    });
  });

  it('follows a result that opens in a new tab', async () => {
    const popup = new StubPage({ url: 'https://www.flipkart.com/desk-lamp/p/itm123' });
    const page = new StubPage({ url: 'https://www.flipkart.com/search?q=lamp', popup });
    const model = new MarketplaceSitePage(page, deps('https://www.flipkart.com'));

    expect(await model.openFirstResult()).toEqual({
      selector: 'a[href*="/p/"]',
      data: { opened_in: 'popup', url: 'https://www.flipkart.com/desk-lamp/p/itm123' },
    });
    expect(model.page).toBe(popup);

    await model.addSelectedToCart('lamp');
    expect(page.of('click')).toEqual(['a[href*="/p/"]']);
    expect(popup.of('click')).toEqual(['button._2KpZ6l._2U9uOA._3v1-ww']);
  });
});

describe('RetailSitePage', () => {
  it('signs in through the password route', async () => {
    const page = new StubPage();
    const model = new RetailSitePage(page, deps('https://www.amazon.com'));

    const outcome = await model.loginWithPassword(credentials);
    expect(outcome).toEqual({
      selector: 'input#signInSubmit',
      data: {
        email_filled: true,
        password_filled: true,
        passkey_dismissals: ['use-password-instead'],
        submitted_via: 'sign-in-button',
      },
    });
    expect(page.of('fill')).toEqual(['input#ap_email=shopper@example.com', 'input#ap_password=test-secret']);
  });

  it('works through the passkey prompts when no password link shows', async () => {
    const page = new StubPage({
      missing: ['text=Use a password instead', 'text=Use your password instead'],
    });
    const model = new RetailSitePage(page, deps('https://www.amazon.com'));

    const outcome = await model.loginWithPassword(credentials);
    expect(outcome.data?.passkey_dismissals).toEqual(['other-options', 'not-now', 'passkey-dialog-cancel']);
  });

  it('fails to open a result when none becomes visible', async () => {
    const page = new StubPage({
      missing: ['div[data-asin][data-component-type="s-search-result"] h2 a', 'h2 a.a-link-normal'],
    });
    const model = new RetailSitePage(page, deps('https://www.amazon.com'));
    await expect(model.openFirstResult()).rejects.toThrow('No search result link became visible');
  });
});
