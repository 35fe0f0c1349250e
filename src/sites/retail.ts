import type { OperationOutcome, SelectorChain, SiteCredentials } from '../types.js';
import { BasePageModel, type OptionalStep } from './base.js';
import { errorMessage } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Retail site (amazon markup)
//
// Sign-in is two-step (email, then password) and may route through passkey
// or WebAuthn prompts first. Those are dismissed with a chain of optional
// text clicks, each of which may or may not find anything.
// ─────────────────────────────────────────────────────────────────────────────

const SELECTORS = {
  accountLink: ['#nav-link-accountList', 'a[data-nav-role="signin"]'],
  searchBox: ['#twotabsearchtextbox', 'input[name="field-keywords"]'],
  searchSubmit: ['#nav-search-submit-button', 'input[type="submit"][value="Go"]'],
  email: [
    'input#ap_email',
    'input#ap_email_login',
    'input[name="email"]',
    'input[type="email"]',
    'input[id^="ap_email"]',
  ],
  continue: ['input#continue', '#continue', 'input[name="continue"]'],
  password: ['input#ap_password', 'input[name="password"]', 'input[type="password"]'],
  signIn: ['input#signInSubmit', 'input[name="signInSubmit"]'],
  firstResult: ['div[data-asin][data-component-type="s-search-result"] h2 a', 'h2 a.a-link-normal'],
  addToCart: ['#add-to-cart-button', 'input#add-to-cart-button', 'input[name="submit.add-to-cart"]'],
  cart: ['#nav-cart', 'a[href*="/gp/cart/view.html"]'],
  proceedToCheckout: [
    'input[name="proceedToRetailCheckout"]',
    'input[name="proceedToALMCheckout"]',
    'span#sc-buy-box-ptc-button input',
  ],
} as const satisfies Record<string, SelectorChain>;

export class RetailSitePage extends BasePageModel {
  readonly site = 'retail' as const;

  async openLogin(): Promise<OperationOutcome> {
    try {
      const selector = await this.click(SELECTORS.accountLink, 15_000);
      return { selector };
    } catch (err) {
      this.logger.debug('Account link failed, trying greeting text', { error: errorMessage(err) });
      return this.clickText('Hello, sign in');
    }
  }

  async loginWithPassword(credentials: SiteCredentials): Promise<OperationOutcome> {
    const emailFilled = await this.enterEmail(credentials.username);

    await this.bestEffort([
      { label: 'continue', run: () => this.click(SELECTORS.continue, 12_000), final: true },
      { label: 'enter', run: () => this.active.keyboard.press('Enter') },
    ]);

    const dismissed = await this.bestEffort(this.passkeyDismissals());

    let passwordFilled = true;
    try {
      await this.fill(SELECTORS.password, credentials.password);
    } catch {
      try {
        await this.active.getByText('Password', { exact: false }).first().click({ timeout: 2_000 });
        await this.active.keyboard.press('End');
        passwordFilled = (await this.fillAny(SELECTORS.password, credentials.password, 8_000)) !== null;
      } catch {
        passwordFilled = false;
      }
    }
    if (!passwordFilled) this.logger.warn('Could not locate password field');

    const submitted = await this.bestEffort([
      { label: 'sign-in-button', run: () => this.click(SELECTORS.signIn, 12_000), final: true },
      { label: 'sign-in-text', run: () => this.clickText('Sign in'), final: true },
      { label: 'enter', run: () => this.active.keyboard.press('Enter') },
    ]);

    return {
      selector: SELECTORS.signIn[0],
      data: {
        email_filled: emailFilled,
        password_filled: passwordFilled,
        passkey_dismissals: dismissed,
        submitted_via: submitted[0] ?? null,
      },
    };
  }

  async search(query: string): Promise<OperationOutcome> {
    const selector = await this.fill(SELECTORS.searchBox, query);
    await this.click(SELECTORS.searchSubmit);
    await this.active.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
    return { selector, data: { query } };
  }

  async openFirstResult(): Promise<OperationOutcome> {
    const found = await this.waitForFirst(SELECTORS.firstResult, 45_000);
    if (!found) throw new Error('No search result link became visible');
    const openedIn = await this.clickMaybePopup(this.active.locator(found).first());
    return { selector: found, data: { opened_in: openedIn, url: this.active.url() } };
  }

  async addSelectedToCart(product?: string): Promise<OperationOutcome> {
    await this.active.waitForLoadState('domcontentloaded', { timeout: this.timings.navigation });
    const selector = await this.clickWithTextFallback(SELECTORS.addToCart, 'Add to Cart', 45_000);
    return { selector, data: { product: product ?? null } };
  }

  async goToCart(): Promise<OperationOutcome> {
    const selector = await this.clickWithTextFallback(SELECTORS.cart, 'Cart', 15_000);
    return { selector };
  }

  async placeOrder(): Promise<OperationOutcome> {
    const selector = await this.clickWithTextFallback(SELECTORS.proceedToCheckout, 'Proceed to Buy');
    return { selector, data: { submitted: true } };
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async enterEmail(email: string): Promise<boolean> {
    try {
      await this.fill(SELECTORS.email, email);
      return true;
    } catch {
      const byLabel = await this.bestEffort([
        {
          label: 'email-by-placeholder',
          run: () => this.fillAny(['input[placeholder*="mobile" i]', 'input[placeholder*="email" i]'], email, 8_000)
            .then((s) => { if (!s) throw new Error('no placeholder match'); }),
          final: true,
        },
      ]);
      if (byLabel.length === 0) {
        this.logger.warn('Could not locate email field; the flow may already be past it');
      }
      return byLabel.length > 0;
    }
  }

  /** Optional passkey-route escapes, tried in order */
  private passkeyDismissals(): OptionalStep[] {
    const short = 3_000;
    return [
      {
        label: 'use-password-instead',
        run: () => this.firstText(['Use a password instead', 'Use your password instead'], short),
        final: true,
      },
      { label: 'other-options', run: () => this.firstText(['Other options', 'Try another way'], short) },
      { label: 'not-now', run: () => this.firstText(['Not now'], short) },
      {
        label: 'passkey-dialog-cancel',
        run: () =>
          this.active
            .getByRole('dialog')
            .filter({ hasText: /passkeys?/i })
            .first()
            .getByRole('button', { name: /cancel|not now|close/i })
            .first()
            .click({ timeout: 2_000 }),
        final: true,
      },
    ];
  }

  private async firstText(texts: readonly string[], timeout: number): Promise<void> {
    let lastError: unknown = new Error('no text candidates');
    for (const text of texts) {
      try {
        await this.active.getByText(text, { exact: false }).first().click({ timeout });
        return;
      } catch (err) {
        lastError = err;
      }
    }
    throw lastError;
  }
}
