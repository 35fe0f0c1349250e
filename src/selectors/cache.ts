import type { Clock, SelectorCacheEntry } from '../types.js';

export const DEFAULT_SELECTOR_TTL_MS = 1000 * 60 * 5; // 5 minutes

/**
 * Remembers which selector actually worked for a declared one.
 * Single-owner: one resolver per page session, no locking.
 */
export class SelectorCache {
  private entries: Map<string, SelectorCacheEntry> = new Map();

  constructor(
    private ttlMs: number = DEFAULT_SELECTOR_TTL_MS,
    private now: Clock = Date.now,
  ) {}

  get(original: string): string | null {
    const entry = this.entries.get(original);
    if (!entry) return null;

    if (this.now() - entry.resolved_at >= this.ttlMs) {
      this.entries.delete(original);
      return null;
    }
    return entry.working_selector;
  }

  set(original: string, working: string): void {
    this.entries.set(original, {
      original_selector: original,
      working_selector: working,
      resolved_at: this.now(),
    });
  }

  entry(original: string): SelectorCacheEntry | undefined {
    return this.entries.get(original);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
