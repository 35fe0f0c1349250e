import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { PageHandle } from '../engine/page.js';
import type { ActionResult, BatchAction } from '../types.js';
import { SelectorResolver } from '../selectors/resolver.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// BatchExecutor — scripted action lists, strictly in order
//
// One result per record. A record that fails and is marked critical stops
// the batch; everything already done stays done.
// ─────────────────────────────────────────────────────────────────────────────

const critical = z.boolean().optional();

export const BatchActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('navigate'), url: z.string().min(1), critical }),
  z.object({ action: z.literal('click'), selector: z.string().min(1), critical }),
  z.object({ action: z.literal('fill'), selector: z.string().min(1), text: z.string(), critical }),
  z.object({ action: z.literal('exists'), selector: z.string().min(1), critical }),
  z.object({ action: z.literal('first_visible'), selectors: z.array(z.string().min(1)).min(1), critical }),
  z.object({ action: z.literal('wait'), timeout: z.number().int().nonnegative().optional(), critical }),
  z.object({ action: z.literal('screenshot'), path: z.string().min(1).optional(), critical }),
  z.object({ action: z.literal('smart_click'), description: z.string().min(1), critical }),
]);

export const BATCH_ACTIONS = BatchActionSchema.options.map((o) => o.shape.action.value);

export interface BatchTimeouts {
  navigation: number;
  element: number;
}

export interface BatchExecutorOptions {
  resolver?: SelectorResolver;
  logger?: Logger;
  timeouts?: Partial<BatchTimeouts>;
  /** Where screenshots without a path go */
  screenshotDir?: string;
}

export interface BatchRunOptions {
  signal?: AbortSignal;
}

export class BatchExecutor {
  private resolver: SelectorResolver;
  private logger: Logger;
  private timeouts: BatchTimeouts;
  private screenshotDir: string;

  /** `pageOf` is asked for the page before every record, so tab switches are followed */
  constructor(private readonly pageOf: () => PageHandle, options: BatchExecutorOptions = {}) {
    this.logger = (options.logger ?? rootLogger).child({ name: 'batch' });
    this.resolver = options.resolver ?? new SelectorResolver({ logger: this.logger });
    this.timeouts = { navigation: 60_000, element: 20_000, ...options.timeouts };
    this.screenshotDir = options.screenshotDir ?? tmpdir();
  }

  async execute(records: readonly unknown[], options: BatchRunOptions = {}): Promise<ActionResult[]> {
    const results: ActionResult[] = [];

    for (const [index, record] of records.entries()) {
      if (options.signal?.aborted) {
        this.logger.info('Batch cancelled', { remaining: records.length - index });
        break;
      }

      const started = Date.now();
      const parsed = parseRecord(record);
      const result: ActionResult = parsed.ok
        ? await this.executeOne(parsed.action, started)
        : { action: parsed.name, ok: false, error: parsed.error, elapsed_ms: Date.now() - started };
      results.push(result);

      if (!result.ok && isCritical(record)) {
        this.logger.error('Critical action failed, stopping batch', { index, action: result.action, error: result.error });
        break;
      }
    }

    return results;
  }

  // ─── Actions ──────────────────────────────────────────────────────────────

  private async executeOne(action: BatchAction, started: number): Promise<ActionResult> {
    const page = this.pageOf();
    const done = (fields: Pick<ActionResult, 'data' | 'selector_used'> = {}): ActionResult => ({
      action: action.action,
      ok: true,
      ...fields,
      elapsed_ms: Date.now() - started,
    });

    try {
      switch (action.action) {
        case 'navigate': {
          await page.goto(action.url, { waitUntil: 'domcontentloaded', timeout: this.timeouts.navigation });
          this.resolver.noteNavigation(action.url);
          return done({ data: { url: action.url } });
        }
        case 'click': {
          const selector = await this.resolver.resolve(action.selector, page);
          await page.locator(selector).first().click({ timeout: this.timeouts.element });
          return done({ selector_used: selector });
        }
        case 'fill': {
          const selector = await this.resolver.resolve(action.selector, page);
          const field = page.locator(selector).first();
          await field.waitFor({ state: 'visible', timeout: this.timeouts.element });
          await field.fill(action.text, { timeout: this.timeouts.element });
          return done({ selector_used: selector });
        }
        case 'exists': {
          const selector = await this.resolver.resolve(action.selector, page);
          const count = await page.locator(selector).count();
          return done({ selector_used: selector, data: { selector, count } });
        }
        case 'first_visible': {
          const selector = await this.resolver.firstVisible(action.selectors, page);
          return done({ data: { selector } });
        }
        case 'wait': {
          const ms = action.timeout ?? 1_000;
          await page.waitForTimeout(ms);
          return done({ data: { waited_ms: ms } });
        }
        case 'screenshot': {
          const path = action.path ?? join(this.screenshotDir, `voicecart-screenshot-${Date.now()}.png`);
          await page.screenshot({ path });
          return done({ data: { screenshot_path: path } });
        }
        case 'smart_click': {
          const selector = await this.resolver.firstVisible(smartClickCandidates(action.description), page);
          if (!selector) throw new Error(`Could not find element: ${action.description}`);
          await page.locator(selector).first().click({ timeout: this.timeouts.element });
          return done({ selector_used: selector });
        }
      }
    } catch (err) {
      const error = errorMessage(err);
      this.logger.warn('Batch action failed', { action: action.action, error });
      return { action: action.action, ok: false, error, elapsed_ms: Date.now() - started };
    }
  }
}

/** Button text, then aria-label, then any element containing the text */
export function smartClickCandidates(description: string): [string, ...string[]] {
  const text = description.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return [
    `button:has-text("${text}")`,
    `[aria-label*="${text}"]`,
    `*:has-text("${text}")`,
  ];
}

// ─── Validation ─────────────────────────────────────────────────────────────

type ParsedRecord =
  | { ok: true; action: BatchAction }
  | { ok: false; name: string; error: string };

function parseRecord(record: unknown): ParsedRecord {
  const name = actionNameOf(record);
  if (name === null) return { ok: false, name: 'invalid', error: 'Record has no action field' };
  if (!BATCH_ACTIONS.some((a) => a === name)) return { ok: false, name, error: `Unknown action: ${name}` };

  const parsed = BatchActionSchema.safeParse(record);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    return { ok: false, name, error };
  }
  return { ok: true, action: parsed.data };
}

function actionNameOf(record: unknown): string | null {
  if (typeof record !== 'object' || record === null || !('action' in record)) return null;
  return typeof record.action === 'string' ? record.action : null;
}

function isCritical(record: unknown): boolean {
  return typeof record === 'object' && record !== null && 'critical' in record && record.critical === true;
}
