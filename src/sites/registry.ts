import type { PageHandle } from '../engine/page.js';
import type { SiteId } from '../types.js';
import { isSiteId } from '../types.js';
import type { PageModelDeps, SitePageModel } from './base.js';
import { defaultBaseUrls, siteFromText, siteFromUrl } from './catalog.js';
import { DemoSitePage } from './demo.js';
import { MarketplaceSitePage } from './marketplace.js';
import { RetailSitePage } from './retail.js';

// ─────────────────────────────────────────────────────────────────────────────
// SiteRegistry — site id, keyword or URL → page model
// ─────────────────────────────────────────────────────────────────────────────

export type PageModelFactory = (page: PageHandle, deps: PageModelDeps) => SitePageModel;

const FACTORIES: Record<SiteId, PageModelFactory> = {
  demo: (page, deps) => new DemoSitePage(page, deps),
  marketplace: (page, deps) => new MarketplaceSitePage(page, deps),
  retail: (page, deps) => new RetailSitePage(page, deps),
};

export class SiteRegistry {
  private readonly baseUrls: Record<SiteId, string>;

  constructor(baseUrls: Partial<Record<SiteId, string>> = {}) {
    this.baseUrls = { ...defaultBaseUrls(), ...baseUrls };
  }

  /** Accepts a site id, a keyword ("flipkart", "demo site") or a URL */
  resolveSite(value: string | undefined): SiteId | null {
    if (!value) return null;
    const trimmed = value.trim();
    if (isSiteId(trimmed)) return trimmed;
    if (/^https?:\/\//i.test(trimmed)) return siteFromUrl(trimmed);
    return siteFromText(trimmed.toLowerCase());
  }

  urlFor(site: SiteId): string {
    return this.baseUrls[site];
  }

  create(site: SiteId, page: PageHandle, deps: Omit<PageModelDeps, 'baseUrl'>): SitePageModel {
    return FACTORIES[site](page, { ...deps, baseUrl: this.urlFor(site) });
  }
}
