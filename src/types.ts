// ─────────────────────────────────────────────────────────────────────────────
// VoiceCart — Core Types
// An utterance becomes an intent, an intent becomes page operations.
// ─────────────────────────────────────────────────────────────────────────────

export const ACTION_KINDS = [
  'navigate',
  'search',
  'click',
  'add_to_cart',
  'checkout',
  'login',
  'fill_form',
  'place_order',
  'full_checkout_flow',
  'add_to_cart_flow',
  'unknown',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export function isActionKind(value: string): value is ActionKind {
  return (ACTION_KINDS as readonly string[]).includes(value);
}

/** What the parser hands the runner: closed action set, open entity bag */
export interface Intent {
  name: ActionKind;
  entities: IntentEntities;
}

export interface IntentEntities {
  site?: string;
  query?: string;
  product?: string;
  target?: string;
  steps?: FlowStepName[];
  verify_price?: boolean;
  fields?: Record<string, string>;
  use_saved?: boolean;
  raw?: string;
  qty?: number;
  source?: 'rules' | 'llm';
  confidence?: number;
  reasoning?: string;
  [key: string]: unknown;
}

export type FlowStepName = 'login' | 'add_to_cart' | 'checkout' | 'place_order';

/** Carried across utterances so follow-ups ("add to cart") can omit the product */
export interface ParseContext {
  site?: string;
  product?: string;
}

export interface ParseOutcome {
  intent: Intent;
  context: ParseContext;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sites
// ─────────────────────────────────────────────────────────────────────────────

export const SITE_IDS = ['demo', 'marketplace', 'retail'] as const;

export type SiteId = (typeof SITE_IDS)[number];

export function isSiteId(value: string): value is SiteId {
  return (SITE_IDS as readonly string[]).includes(value);
}

/** Ordered fallback candidates for one semantic element. Never empty. */
export type SelectorChain = readonly [string, ...string[]];

export interface SiteCredentials {
  username: string;
  password: string;
}

export interface CustomerInfo {
  first_name: string;
  last_name: string;
  postal_code: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Results — one per executed operation, failures are values
// ─────────────────────────────────────────────────────────────────────────────

export interface ActionResult {
  /** Operation or batch action that produced this result */
  action: string;
  ok: boolean;
  data?: Record<string, unknown>;
  /** Human-readable explanation if failed */
  error?: string;
  selector_used?: string;
  elapsed_ms: number;
}

/** What a page-model operation reports back to the runner */
export interface OperationOutcome {
  selector?: string;
  data?: Record<string, unknown>;
}

export type FlowState =
  | 'start'
  | 'popup_dismissed'
  | 'logged_in'
  | 'searched'
  | 'result_opened'
  | 'added_to_cart'
  | 'cart_viewed'
  | 'price_verified'
  | 'order_placed';

export interface SelectorCacheEntry {
  original_selector: string;
  working_selector: string;
  resolved_at: number;
}

export type Clock = () => number;

// ─────────────────────────────────────────────────────────────────────────────
// Batch actions — scripted, plan-driven runs
// ─────────────────────────────────────────────────────────────────────────────

export type BatchAction =
  | { action: 'navigate'; url: string; critical?: boolean }
  | { action: 'click'; selector: string; critical?: boolean }
  | { action: 'fill'; selector: string; text: string; critical?: boolean }
  | { action: 'exists'; selector: string; critical?: boolean }
  | { action: 'first_visible'; selectors: string[]; critical?: boolean }
  | { action: 'wait'; timeout?: number; critical?: boolean }
  | { action: 'screenshot'; path?: string; critical?: boolean }
  | { action: 'smart_click'; description: string; critical?: boolean };

export interface IntentPlanStep {
  intent: ActionKind;
  entities: IntentEntities;
}

export type Plan =
  | { kind: 'actions'; actions: BatchAction[] }
  | { kind: 'intents'; steps: IntentPlanStep[] };

// ─────────────────────────────────────────────────────────────────────────────
// LLM structured output
// ─────────────────────────────────────────────────────────────────────────────

export interface LlmIntentFields {
  action: string;
  site?: string | null;
  item?: string | null;
  qty: number;
  verify_price: boolean;
  confidence: number;
  reasoning?: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Trace
// ─────────────────────────────────────────────────────────────────────────────

export interface TraceRecord {
  ts: string;
  raw: string;
  intent: ActionKind;
  entities: Record<string, unknown>;
}

export interface TraceSink {
  append(record: TraceRecord): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config
// ─────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface VoiceCartConfig {
  /** Anthropic API key; without it parsing is rule-based only */
  anthropic_api_key?: string;
  llm_model: string;
  headless: boolean;
  /** Enable stealth mode (anti-bot) */
  stealth: boolean;
  /** Playwright slowMo in ms */
  slow_mo: number;
  default_site: SiteId;
  selector_cache_ttl_ms: number;
  /** Path to SQLite DB for traces; omit to skip persistence */
  trace_db_path?: string;
  log_level: LogLevel;
  base_urls: Record<SiteId, string>;
  credentials: Partial<Record<SiteId, SiteCredentials>>;
  customer: CustomerInfo;
}
