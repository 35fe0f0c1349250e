// ─────────────────────────────────────────────────────────────────────────────
// PageHandle — the slice of the driver the pipeline is allowed to touch
//
// A Playwright Page satisfies these interfaces structurally, so the engine
// hands its pages straight in while tests pass a recording stub.
// ─────────────────────────────────────────────────────────────────────────────

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';
export type WaitState = 'attached' | 'detached' | 'visible' | 'hidden';
export type AriaRole = 'button' | 'dialog' | 'link' | 'textbox';

export interface TimeoutOption {
  timeout?: number;
}

export interface LocatorHandle {
  count(): Promise<number>;
  first(): LocatorHandle;
  nth(index: number): LocatorHandle;
  locator(selector: string): LocatorHandle;
  filter(options: { hasText?: string | RegExp }): LocatorHandle;
  getByRole(role: AriaRole, options?: { name?: string | RegExp }): LocatorHandle;
  isVisible(options?: TimeoutOption): Promise<boolean>;
  click(options?: TimeoutOption): Promise<void>;
  fill(value: string, options?: TimeoutOption): Promise<void>;
  waitFor(options?: { state?: WaitState; timeout?: number }): Promise<void>;
  innerText(options?: TimeoutOption): Promise<string>;
}

export interface PageHandle {
  url(): string;
  title(): Promise<string>;
  goto(
    url: string,
    options?: { waitUntil?: LoadState | 'commit'; timeout?: number },
  ): Promise<unknown>;
  locator(selector: string): LocatorHandle;
  getByText(text: string | RegExp, options?: { exact?: boolean }): LocatorHandle;
  getByRole(role: AriaRole, options?: { name?: string | RegExp }): LocatorHandle;
  waitForLoadState(state?: LoadState, options?: TimeoutOption): Promise<void>;
  waitForEvent(event: 'popup', options?: TimeoutOption): Promise<PageHandle>;
  waitForTimeout(ms: number): Promise<void>;
  screenshot(options?: { path?: string }): Promise<unknown>;
  keyboard: { press(key: string): Promise<void> };
}
