import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  AnthropicIntentProvider,
  IntentAnalyzer,
  extractJSON,
  siteFromName,
  type IntentProvider,
} from '../src/semantic/intent-analyzer.js';
import type { LlmIntentFields, ParseContext } from '../src/types.js';
import { quietLogger } from './helpers/quiet-logger.js';

// Mock the Anthropic SDK so tests run without a real API key
const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class MockAnthropic {
    messages = { create };
  },
}));

const fields = (partial: Partial<LlmIntentFields> & { action: string }): LlmIntentFields => ({
  qty: 1,
  verify_price: false,
  confidence: 0.9,
  ...partial,
});

/** Replies (or failures) handed out in order */
class ScriptedProvider implements IntentProvider {
  readonly name = 'scripted';
  readonly seen: { text: string; context: ParseContext }[] = [];

  constructor(private replies: (LlmIntentFields | Error)[]) {}

  async extract(text: string, context: ParseContext): Promise<LlmIntentFields> {
    this.seen.push({ text, context });
    const next = this.replies.shift() ?? new Error('no scripted reply');
    if (next instanceof Error) throw next;
    return next;
  }
}

function analyzer(provider: IntentProvider | null, sleeps: number[] = []) {
  return new IntentAnalyzer({
    provider,
    logger: quietLogger(),
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

describe('AnthropicIntentProvider', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('parses a fenced JSON reply and fills defaults', async () => {
    create.mockResolvedValueOnce({
      content: [
        {
          type: 'text',
          text: 'Here you go:\n```json\n{"action": "add_to_cart", "item": "backpack", "confidence": 0.8}\n```',
        },
      ],
    });

    const provider = new AnthropicIntentProvider({ anthropic_api_key: 'test-secret', llm_model: 'test-model' });
    const result = await provider.extract('add backpack to cart', {});

    expect(result).toEqual({ action: 'add_to_cart', item: 'backpack', qty: 1, verify_price: false, confidence: 0.8 });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'test-model', max_tokens: 500, temperature: 0.1 }),
    );
  });

  it('falls back to rules at once when the reply fails validation', async () => {
    create.mockResolvedValue({
      content: [{ type: 'text', text: '{"action": "search", "item": "lamp", "confidence": 1.5}' }],
    });
    const sleeps: number[] = [];
    const provider = new AnthropicIntentProvider({ anthropic_api_key: 'test-secret', llm_model: 'test-model' });

    const intent = await analyzer(provider, sleeps).parse('search for Lamp');
    expect(intent).toEqual({ name: 'search', entities: { query: 'Lamp' } });
    expect(create).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('rejects a reply without text', async () => {
    create.mockResolvedValueOnce({ content: [] });
    const provider = new AnthropicIntentProvider({ anthropic_api_key: 'test-secret', llm_model: 'test-model' });
    await expect(provider.extract('hello', {})).rejects.toThrow('Provider reply had no text block');
  });
});

describe('extractJSON', () => {
  it('finds the object in surrounding prose', () => {
    expect(extractJSON('Result: {"action": "search"} done')).toBe('{"action": "search"}');
    expect(extractJSON('no json here')).toBe('no json here');
  });
});

describe('siteFromName', () => {
  it('maps site names the model may use', () => {
    expect(siteFromName('saucedemo')).toBe('demo');
    expect(siteFromName('Amazon')).toBe('retail');
    expect(siteFromName('marketplace')).toBe('marketplace');
    expect(siteFromName('ebay')).toBeNull();
  });
});

describe('IntentAnalyzer', () => {
  it('uses the rule parser without a provider', async () => {
    const intent = await analyzer(null).parse('search for Widget');
    expect(intent).toEqual({ name: 'search', entities: { query: 'Widget' } });
  });

  it('maps provider output to an intent and remembers the product', async () => {
    const provider = new ScriptedProvider([fields({ action: 'add_to_cart', item: 'backpack', reasoning: 'asked to add' })]);
    const hybrid = analyzer(provider);

    const intent = await hybrid.parse('put the backpack in my cart');
    expect(intent).toEqual({
      name: 'add_to_cart',
      entities: {
        source: 'llm',
        qty: 1,
        verify_price: false,
        confidence: 0.9,
        reasoning: 'asked to add',
        product: 'backpack',
      },
    });
    expect(hybrid.context).toEqual({ product: 'backpack' });
  });

  it('maps login_only and flow site names', async () => {
    const provider = new ScriptedProvider([
      fields({ action: 'login_only' }),
      fields({ action: 'full_checkout_flow', site: 'saucedemo', item: 'onesie' }),
    ]);
    const hybrid = analyzer(provider);

    expect((await hybrid.parse('sign me in')).entities.use_saved).toBe(true);

    const flow = await hybrid.parse('buy a onesie on saucedemo');
    expect(flow.name).toBe('full_checkout_flow');
    expect(flow.entities).toMatchObject({
      site: 'demo',
      product: 'onesie',
      steps: ['login', 'add_to_cart', 'checkout', 'place_order'],
    });
  });

  it('retries with exponential backoff, then falls back to rules', async () => {
    const sleeps: number[] = [];
    const provider = new ScriptedProvider([new Error('overloaded'), new Error('overloaded'), new Error('overloaded')]);

    const intent = await analyzer(provider, sleeps).parse('search for Widget');
    expect(provider.seen).toHaveLength(3);
    expect(sleeps).toEqual([500, 1000]);
    expect(intent).toEqual({ name: 'search', entities: { query: 'Widget' } });
  });

  it('recovers when a retry succeeds', async () => {
    const sleeps: number[] = [];
    const provider = new ScriptedProvider([new Error('timeout'), fields({ action: 'checkout' })]);

    const intent = await analyzer(provider, sleeps).parse('go to the checkout');
    expect(sleeps).toEqual([500]);
    expect(intent.name).toBe('checkout');
    expect(intent.entities.source).toBe('llm');
  });

  it('falls back to rules on low confidence or an unknown action', async () => {
    const provider = new ScriptedProvider([
      fields({ action: 'search', item: 'lamp', confidence: 0.3 }),
      fields({ action: 'dance' }),
    ]);
    const hybrid = analyzer(provider);

    expect(await hybrid.parse('search for Lamp')).toEqual({ name: 'search', entities: { query: 'Lamp' } });
    expect(await hybrid.parse('click on Help')).toEqual({ name: 'click', entities: { target: 'Help' } });
  });

  it('does not call the provider for empty input', async () => {
    const provider = new ScriptedProvider([]);
    const intent = await analyzer(provider).parse('   ');
    expect(provider.seen).toEqual([]);
    expect(intent).toEqual({ name: 'unknown', entities: { raw: '   ' } });
  });
});
