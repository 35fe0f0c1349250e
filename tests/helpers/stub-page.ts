import type { AriaRole, LocatorHandle, PageHandle, TimeoutOption, WaitState } from '../../src/engine/page.js';

// In-process stand-in for a browser page. Every locator exists and is
// visible unless listed as missing; every call is recorded in order.

export interface StubPageOptions {
  url?: string;
  title?: string;
  /** Selectors that match nothing: count 0, hidden, and every action times out */
  missing?: string[];
  /** Per-selector match counts (default 1) */
  counts?: Record<string, number>;
  /** Per-selector innerText, indexed by nth() */
  texts?: Record<string, string[]>;
  /** Page handed out by the next `waitForEvent('popup')`; without one the wait times out */
  popup?: StubPage;
}

export class StubPage implements PageHandle {
  readonly calls: string[] = [];
  private current: string;
  private pageTitle: string;
  private missing: Set<string>;
  private counts: Record<string, number>;
  private texts: Record<string, string[]>;
  private popup: StubPage | undefined;

  readonly keyboard = {
    press: async (key: string): Promise<void> => {
      this.calls.push(`press:${key}`);
    },
  };

  constructor(options: StubPageOptions = {}) {
    this.current = options.url ?? 'about:blank';
    this.pageTitle = options.title ?? '';
    this.missing = new Set(options.missing ?? []);
    this.counts = options.counts ?? {};
    this.texts = options.texts ?? {};
    this.popup = options.popup;
  }

  url(): string {
    return this.current;
  }

  async title(): Promise<string> {
    return this.pageTitle;
  }

  async goto(url: string): Promise<unknown> {
    this.calls.push(`goto:${url}`);
    this.current = url;
    return null;
  }

  locator(selector: string): LocatorHandle {
    return new StubLocator(this, selector, 0);
  }

  getByText(text: string | RegExp): LocatorHandle {
    return new StubLocator(this, `text=${String(text)}`, 0);
  }

  getByRole(role: AriaRole, options: { name?: string | RegExp } = {}): LocatorHandle {
    return new StubLocator(this, `role=${role}[name=${String(options.name ?? '')}]`, 0);
  }

  async waitForLoadState(): Promise<void> {}

  async waitForEvent(event: 'popup'): Promise<PageHandle> {
    const popup = this.popup;
    if (!popup) throw new Error(`Timeout waiting for ${event}`);
    this.popup = undefined;
    return popup;
  }

  async waitForTimeout(): Promise<void> {}

  async screenshot(options: { path?: string } = {}): Promise<unknown> {
    this.calls.push(`screenshot:${options.path ?? ''}`);
    return null;
  }

  /** Calls of one kind, e.g. `of('click')` → the selectors clicked */
  of(kind: string): string[] {
    const prefix = `${kind}:`;
    return this.calls.filter((c) => c.startsWith(prefix)).map((c) => c.slice(prefix.length));
  }

  // ─── Lookups for StubLocator ────────────────────────────────────────────────

  isMissing(selector: string): boolean {
    return this.missing.has(selector);
  }

  countOf(selector: string): number {
    if (this.missing.has(selector)) return 0;
    return this.counts[selector] ?? this.texts[selector]?.length ?? 1;
  }

  textOf(selector: string, index: number): string {
    return this.texts[selector]?.[index] ?? '';
  }
}

class StubLocator implements LocatorHandle {
  constructor(
    private readonly page: StubPage,
    private readonly selector: string,
    private readonly index: number,
  ) {}

  async count(): Promise<number> {
    this.page.calls.push(`count:${this.selector}`);
    return this.page.countOf(this.selector);
  }

  first(): LocatorHandle {
    return new StubLocator(this.page, this.selector, 0);
  }

  nth(index: number): LocatorHandle {
    return new StubLocator(this.page, this.selector, index);
  }

  locator(selector: string): LocatorHandle {
    return new StubLocator(this.page, `${this.selector} >> ${selector}`, 0);
  }

  filter(): LocatorHandle {
    return this;
  }

  getByRole(role: AriaRole, options: { name?: string | RegExp } = {}): LocatorHandle {
    return new StubLocator(this.page, `${this.selector} >> role=${role}[name=${String(options.name ?? '')}]`, 0);
  }

  async isVisible(): Promise<boolean> {
    return !this.page.isMissing(this.selector);
  }

  async click(_options?: TimeoutOption): Promise<void> {
    this.ensure();
    this.page.calls.push(`click:${this.selector}`);
  }

  async fill(value: string): Promise<void> {
    this.ensure();
    this.page.calls.push(`fill:${this.selector}=${value}`);
  }

  async waitFor(options: { state?: WaitState; timeout?: number } = {}): Promise<void> {
    if (options.state !== 'hidden' && options.state !== 'detached') this.ensure();
  }

  async innerText(): Promise<string> {
    this.ensure();
    return this.page.textOf(this.selector, this.index);
  }

  private ensure(): void {
    if (this.page.isMissing(this.selector)) {
      throw new Error(`Timeout exceeded waiting for ${this.selector}`);
    }
  }
}
