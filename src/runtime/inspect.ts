import type { PageHandle } from '../engine/page.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Page analysis — what an automation script could act on right now
//
// Probes a fixed set of login, shopping, search and navigation selectors and
// counts the page's structural elements. Read-only: nothing is clicked.
// ─────────────────────────────────────────────────────────────────────────────

export type ElementGroup = 'login' | 'shopping' | 'search' | 'navigation';

export const ELEMENT_GROUPS: Readonly<Record<ElementGroup, readonly string[]>> = {
  login: [
    "input[type='email']",
    "input[type='text'][name*='email']",
    "input[id*='email']",
    "input[type='password']",
    "input[id*='password']",
    "input[name*='password']",
    "button[type='submit']",
    "input[type='submit']",
    "button:has-text('login')",
    "button:has-text('sign in')",
    "a:has-text('login')",
    "a:has-text('sign in')",
  ],
  shopping: [
    "button:has-text('add to cart')",
    "button:has-text('buy now')",
    "input[name*='quantity']",
    "select[name*='quantity']",
    '.price',
    '.product-price',
    '[data-price]',
    '.cost',
    '.product-title',
    '.product-name',
    'h1',
    'h2',
  ],
  search: [
    "input[type='search']",
    "input[name*='search']",
    "input[id*='search']",
    "input[placeholder*='search']",
    "button:has-text('search')",
    '.search-box',
    '#search',
    '.searchbox',
  ],
  navigation: [
    'nav a',
    '.menu a',
    '.navigation a',
    'header a',
    "button:has-text('menu')",
    '.hamburger',
    '.nav-toggle',
  ],
};

const STRUCTURE = { forms: 'form', buttons: 'button', inputs: 'input', links: 'a', images: 'img' } as const;

const TEXT_LIMIT = 100;

export interface FoundElement {
  selector: string;
  count: number;
  /** innerText of the first match, cut to 100 characters */
  text: string;
}

export interface PageAnalysis {
  page_info: { url: string; title: string; action_context: string };
  interactive_elements: Record<ElementGroup, FoundElement[]>;
  page_structure: Record<keyof typeof STRUCTURE, number>;
  /** At least one group found a visible element */
  automation_ready: boolean;
}

export async function analyzePage(
  page: PageHandle,
  actionContext = 'general',
  logger: Logger = rootLogger,
): Promise<PageAnalysis> {
  const log = logger.child({ name: 'inspect' });

  const interactive: Record<ElementGroup, FoundElement[]> = {
    login: await probeGroup(page, ELEMENT_GROUPS.login, log),
    shopping: await probeGroup(page, ELEMENT_GROUPS.shopping, log),
    search: await probeGroup(page, ELEMENT_GROUPS.search, log),
    navigation: await probeGroup(page, ELEMENT_GROUPS.navigation, log),
  };

  const analysis: PageAnalysis = {
    page_info: { url: page.url(), title: await page.title(), action_context: actionContext },
    interactive_elements: interactive,
    page_structure: {
      forms: await page.locator(STRUCTURE.forms).count(),
      buttons: await page.locator(STRUCTURE.buttons).count(),
      inputs: await page.locator(STRUCTURE.inputs).count(),
      links: await page.locator(STRUCTURE.links).count(),
      images: await page.locator(STRUCTURE.images).count(),
    },
    automation_ready: Object.values(interactive).some((found) => found.length > 0),
  };

  log.info('Page analysed', {
    url: analysis.page_info.url,
    found: Object.values(interactive).reduce((n, found) => n + found.length, 0),
  });
  return analysis;
}

async function probeGroup(page: PageHandle, selectors: readonly string[], log: Logger): Promise<FoundElement[]> {
  const found: FoundElement[] = [];
  for (const selector of selectors) {
    try {
      const matches = page.locator(selector);
      const count = await matches.count();
      if (count === 0) continue;
      const first = matches.first();
      if (!(await first.isVisible())) continue;
      const text = (await first.innerText({ timeout: 2_000 })).trim().slice(0, TEXT_LIMIT);
      found.push({ selector, count, text });
    } catch (err) {
      log.debug('Selector probe failed', { selector, error: errorMessage(err) });
    }
  }
  return found;
}
