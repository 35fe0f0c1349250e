import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_LLM_MODEL, configureLogger, configuredSecrets, loadConfig } from '../src/config.js';
import { quietLogger } from './helpers/quiet-logger.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      anthropic_api_key: undefined,
      llm_model: DEFAULT_LLM_MODEL,
      headless: true,
      stealth: false,
      slow_mo: 0,
      default_site: 'demo',
      selector_cache_ttl_ms: 300_000,
      trace_db_path: undefined,
      log_level: 'info',
      base_urls: {
        demo: 'https://www.saucedemo.com',
        marketplace: 'https://www.flipkart.com',
        retail: 'https://www.amazon.com',
      },
      credentials: {},
      customer: { first_name: 'Test', last_name: 'Shopper', postal_code: '00000' },
    });
  });

  it('reads flags, numbers and per-site settings', () => {
    const config = loadConfig({
      VOICECART_HEADLESS: 'off',
      VOICECART_STEALTH: 'yes',
      VOICECART_SLOW_MO: '150',
      VOICECART_DEFAULT_SITE: 'retail',
      VOICECART_RETAIL_URL: 'https://www.amazon.in',
      VOICECART_DEMO_USER: 'standard_user',
      VOICECART_DEMO_PASSWORD: 'test-secret',
    });

    expect(config.headless).toBe(false);
    expect(config.stealth).toBe(true);
    expect(config.slow_mo).toBe(150);
    expect(config.default_site).toBe('retail');
    expect(config.base_urls.retail).toBe('https://www.amazon.in');
    expect(config.credentials).toEqual({ demo: { username: 'standard_user', password: 'test-secret' } });
  });

  it('treats empty numeric settings as unset', () => {
    const config = loadConfig({ VOICECART_SELECTOR_TTL_MS: '', VOICECART_SLOW_MO: '  ' });
    expect(config.selector_cache_ttl_ms).toBe(300_000);
    expect(config.slow_mo).toBe(0);
  });

  it('rejects values it cannot read', () => {
    expect(() => loadConfig({ VOICECART_HEADLESS: 'maybe' })).toThrow(
      'VOICECART_HEADLESS: expected a boolean, got "maybe"',
    );
    expect(() => loadConfig({ VOICECART_DEFAULT_SITE: 'ebay' })).toThrow(ConfigError);
    expect(() => loadConfig({ VOICECART_DEMO_URL: 'nope' })).toThrow(/^VOICECART_DEMO_URL: /);
  });

  it('requires a site user and password together', () => {
    expect(() => loadConfig({ VOICECART_MARKETPLACE_USER: 'someone' })).toThrow(
      'VOICECART_MARKETPLACE_USER and VOICECART_MARKETPLACE_PASSWORD must be set together',
    );
  });
});

describe('configureLogger', () => {
  it('masks passwords and the API key in every logger sharing the secrets', () => {
    const lines: string[] = [];
    const target = quietLogger(lines);
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-key',
      VOICECART_DEMO_USER: 'standard_user',
      VOICECART_DEMO_PASSWORD: 'test-secret',
    });

    configureLogger(config, target);
    target.child({ name: 'child' }).info('signing in with test-secret', { key: 'test-key' });

    const entry: unknown = JSON.parse(lines[0] ?? '{}');
    expect(entry).toMatchObject({ level: 'info', name: 'child', msg: 'signing in with ***', meta: { key: '***' } });
    expect(configuredSecrets(config)).toEqual(['test-secret']);
  });

  it('applies the configured level', () => {
    const lines: string[] = [];
    const target = quietLogger(lines);
    configureLogger(loadConfig({ VOICECART_LOG_LEVEL: 'warn' }), target);

    target.info('hidden');
    target.warn('shown');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('"msg":"shown"');
  });
});
