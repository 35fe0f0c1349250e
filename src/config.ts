import { z } from 'zod';
import type { SiteCredentials, SiteId, VoiceCartConfig } from './types.js';
import { SITE_IDS } from './types.js';
import { defaultBaseUrls } from './sites/catalog.js';
import { DEFAULT_SELECTOR_TTL_MS } from './selectors/cache.js';
import { Logger, logger as rootLogger } from './utils/logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration — environment variables, validated once at startup
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_LLM_MODEL = 'claude-haiku-4-5-20251001';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      const v = value?.trim().toLowerCase();
      if (!v) return fallback;
      if (['true', '1', 'yes', 'on'].includes(v)) return true;
      if (['false', '0', 'no', 'off'].includes(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const count = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && !value.trim() ? undefined : value),
    z.coerce.number().int().nonnegative().default(fallback),
  );

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v?.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalText,
  VOICECART_LLM_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
  VOICECART_HEADLESS: flag(true),
  VOICECART_STEALTH: flag(false),
  VOICECART_SLOW_MO: count(0),
  VOICECART_DEFAULT_SITE: z.enum(SITE_IDS).default('demo'),
  VOICECART_SELECTOR_TTL_MS: count(DEFAULT_SELECTOR_TTL_MS),
  VOICECART_TRACE_DB: optionalText,
  VOICECART_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  VOICECART_CUSTOMER_FIRST_NAME: z.string().min(1).default('Test'),
  VOICECART_CUSTOMER_LAST_NAME: z.string().min(1).default('Shopper'),
  VOICECART_CUSTOMER_POSTAL_CODE: z.string().min(1).default('00000'),
});

/** VOICECART_<SITE>_URL, _USER, _PASSWORD */
const SiteEnvSchema = z.object({
  url: z.string().url().optional(),
  user: optionalText,
  password: z.string().optional().transform((v) => v || undefined),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): VoiceCartConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(describe(parsed.error));
  const e = parsed.data;

  const base_urls = defaultBaseUrls();
  const credentials: Partial<Record<SiteId, SiteCredentials>> = {};

  for (const site of SITE_IDS) {
    const prefix = `VOICECART_${site.toUpperCase()}`;
    const site_env = SiteEnvSchema.safeParse({
      url: env[`${prefix}_URL`],
      user: env[`${prefix}_USER`],
      password: env[`${prefix}_PASSWORD`],
    });
    if (!site_env.success) throw new ConfigError(describe(site_env.error, prefix));

    const { url, user, password } = site_env.data;
    if (url) base_urls[site] = url;
    if (user && password) {
      credentials[site] = { username: user, password };
    } else if (user || password) {
      throw new ConfigError(`${prefix}_USER and ${prefix}_PASSWORD must be set together`);
    }
  }

  return {
    anthropic_api_key: e.ANTHROPIC_API_KEY,
    llm_model: e.VOICECART_LLM_MODEL,
    headless: e.VOICECART_HEADLESS,
    stealth: e.VOICECART_STEALTH,
    slow_mo: e.VOICECART_SLOW_MO,
    default_site: e.VOICECART_DEFAULT_SITE,
    selector_cache_ttl_ms: e.VOICECART_SELECTOR_TTL_MS,
    trace_db_path: e.VOICECART_TRACE_DB,
    log_level: e.VOICECART_LOG_LEVEL,
    base_urls,
    credentials,
    customer: {
      first_name: e.VOICECART_CUSTOMER_FIRST_NAME,
      last_name: e.VOICECART_CUSTOMER_LAST_NAME,
      postal_code: e.VOICECART_CUSTOMER_POSTAL_CODE,
    },
  };
}

/** Level from config; every configured secret masked in log lines */
export function configureLogger(config: VoiceCartConfig, target: Logger = rootLogger): Logger {
  target.setLevel(config.log_level);
  const secrets = configuredSecrets(config);
  if (config.anthropic_api_key) secrets.push(config.anthropic_api_key);
  target.addSecrets(secrets);
  return target;
}

/** Every password in the config, for masking */
export function configuredSecrets(config: VoiceCartConfig): string[] {
  return Object.values(config.credentials).flatMap((c) => (c ? [c.password] : []));
}

function describe(error: z.ZodError, prefix?: string): string {
  return error.issues
    .map((i) => {
      const key = i.path.join('.');
      const name = prefix ? `${prefix}_${key.toUpperCase()}` : key;
      return `${name}: ${i.message}`;
    })
    .join('; ');
}
