import type { SiteId } from '../types.js';

// Site identities the pipeline knows how to drive. Adding a site means a new
// entry here, a new page model and a registry factory.

export interface SiteCatalogEntry {
  id: SiteId;
  label: string;
  defaultUrl: string;
  hostnames: string[];
  /** Matched against lower-cased utterances, first entry wins */
  keywords: RegExp[];
}

const ENTRIES: Record<SiteId, SiteCatalogEntry> = {
  marketplace: {
    id: 'marketplace',
    label: 'marketplace',
    defaultUrl: 'https://www.flipkart.com',
    hostnames: ['flipkart.com'],
    keywords: [/flipkart/, /\bmarketplace\b/],
  },
  retail: {
    id: 'retail',
    label: 'retail site',
    defaultUrl: 'https://www.amazon.com',
    hostnames: ['amazon.com', 'amazon.in', 'amazon.co.uk'],
    keywords: [/amazon/, /\bretail(?:[- ]site)?\b/],
  },
  demo: {
    id: 'demo',
    label: 'demo site',
    defaultUrl: 'https://www.saucedemo.com',
    hostnames: ['saucedemo.com'],
    keywords: [/saucedemo/, /\bdemo(?:[- ]?site)?\b/],
  },
};

/** Keyword match order */
export const SITE_CATALOG: readonly SiteCatalogEntry[] = [ENTRIES.marketplace, ENTRIES.retail, ENTRIES.demo];

/** Site id for a keyword in free text, or null */
export function siteFromText(lowerText: string): SiteId | null {
  for (const entry of SITE_CATALOG) {
    if (entry.keywords.some((k) => k.test(lowerText))) return entry.id;
  }
  return null;
}

/** Site id owning a URL's hostname (subdomains included), or null */
export function siteFromUrl(url: string): SiteId | null {
  let host: string;
  try { host = new URL(url).hostname.toLowerCase(); }
  catch { return null; }

  for (const entry of SITE_CATALOG) {
    if (entry.hostnames.some((h) => host === h || host.endsWith(`.${h}`))) return entry.id;
  }
  return null;
}

export function defaultBaseUrls(): Record<SiteId, string> {
  return {
    demo: ENTRIES.demo.defaultUrl,
    marketplace: ENTRIES.marketplace.defaultUrl,
    retail: ENTRIES.retail.defaultUrl,
  };
}

export function siteLabel(site: SiteId): string {
  return ENTRIES[site].label;
}
