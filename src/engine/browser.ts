import { chromium as chromiumExtra } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { randomUUID } from 'node:crypto';
import type { VoiceCartConfig } from '../types.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { SessionError, errorMessage } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// BrowserEngine — Playwright lifecycle: browser, contexts, pages
//
// The pipeline never touches this directly; it is handed a page per session.
// Failures here are the only ones that surface as exceptions (SessionError).
// ─────────────────────────────────────────────────────────────────────────────

type ExtraBrowser = Awaited<ReturnType<typeof chromiumExtra.launch>>;
type ExtraContext = Awaited<ReturnType<ExtraBrowser['newContext']>>;
export type SessionPage = Awaited<ReturnType<ExtraContext['newPage']>>;

export type BrowserEngineOptions = Pick<VoiceCartConfig, 'headless' | 'stealth' | 'slow_mo'>;

let stealthRegistered = false;

export class BrowserEngine {
  private browser: ExtraBrowser | null = null;
  private contexts: Map<string, ExtraContext> = new Map();
  private pages: Map<string, SessionPage> = new Map();
  private options: BrowserEngineOptions;
  private logger: Logger;

  constructor(options: BrowserEngineOptions, logger: Logger = rootLogger) {
    this.options = options;
    this.logger = logger.child({ name: 'engine' });
  }

  get launched(): boolean {
    return this.browser !== null;
  }

  async launch(): Promise<void> {
    if (this.browser) return;
    const launchArgs: string[] = [];

    if (this.options.stealth) {
      if (!stealthRegistered) {
        chromiumExtra.use(StealthPlugin());
        stealthRegistered = true;
      }
      launchArgs.push(
        '--disable-blink-features=AutomationControlled',
        '--no-sandbox',
        '--disable-setuid-sandbox',
      );
    }

    try {
      this.browser = await chromiumExtra.launch({
        headless: this.options.headless,
        slowMo: this.options.slow_mo || undefined,
        args: launchArgs,
      });
    } catch (err) {
      throw new SessionError(`Could not launch Chromium: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info('Browser launched', { headless: this.options.headless, stealth: this.options.stealth });
  }

  async close(): Promise<void> {
    for (const ctx of this.contexts.values()) {
      await ctx.close();
    }
    this.contexts.clear();
    this.pages.clear();
    await this.browser?.close();
    this.browser = null;
  }

  // ─── Session Management ────────────────────────────────────────────────────

  async createSession(sessionId: string = randomUUID()): Promise<string> {
    if (!this.browser) throw new SessionError('Browser not launched');

    try {
      const context = await this.browser.newContext({
        userAgent: this.options.stealth ? getRandomUserAgent() : undefined,
        viewport: { width: 1440, height: 900 },
        deviceScaleFactor: 1,
        hasTouch: false,
        extraHTTPHeaders: this.options.stealth
          ? {
              'Accept-Language': 'en-US,en;q=0.9',
              'sec-ch-ua-mobile': '?0',
              'sec-ch-ua-platform': '"Windows"',
            }
          : undefined,
      });

      const page = await context.newPage();
      this.contexts.set(sessionId, context);
      this.pages.set(sessionId, page);
    } catch (err) {
      throw new SessionError(`Could not open a browser session: ${errorMessage(err)}`, { cause: err });
    }

    this.logger.debug('Session created', { session: sessionId });
    return sessionId;
  }

  async destroySession(sessionId: string): Promise<void> {
    const ctx = this.contexts.get(sessionId);
    if (ctx) await ctx.close();
    this.contexts.delete(sessionId);
    this.pages.delete(sessionId);
  }

  getPage(sessionId: string): SessionPage {
    const page = this.pages.get(sessionId);
    if (!page) throw new SessionError(`Session ${sessionId} not found or not initialized`);
    return page;
  }
}

// ─── Utilities ─────────────────────────────────────────────────────────────

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

function getRandomUserAgent(): string | undefined {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}
