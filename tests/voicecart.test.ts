import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { VoiceCart } from '../src/index.js';
import { VoiceCartMCPServer } from '../src/server/mcp.js';
import { loadConfig } from '../src/config.js';
import { TraceStore } from '../src/trace/store.js';
import { StubPage } from './helpers/stub-page.js';
import { quietLogger } from './helpers/quiet-logger.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const config = loadConfig({ VOICECART_DEMO_USER: 'standard_user', VOICECART_DEMO_PASSWORD: 'test-secret' });

describe('VoiceCart', () => {
  let cart: VoiceCart;
  let page: StubPage;

  beforeEach(() => {
    cart = new VoiceCart({ config, provider: null, traces: new TraceStore(':memory:'), logger: quietLogger() });
    page = new StubPage();
    cart.attach(page);
  });

  afterEach(async () => {
    await cart.close();
  });

  it('parses and runs a spoken command', async () => {
    const { intent, results } = await cart.command('open the demo site');
    expect(intent).toEqual({ name: 'navigate', entities: { site: 'demo' } });
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ action: 'navigate', ok: true });
    expect(page.of('goto')).toEqual(['https://www.saucedemo.com']);
  });

  it('keeps running commands when the trace store fails', async () => {
    const lines: string[] = [];
    const broken = new TraceStore(':memory:');
    broken.close();
    const failing = new VoiceCart({ config, provider: null, traces: broken, logger: quietLogger(lines) });
    const tab = new StubPage();
    failing.attach(tab);

    const { intent, results } = await failing.command('open the demo site');
    expect(intent).toEqual({ name: 'navigate', entities: { site: 'demo' } });
    expect(results.map((r) => [r.action, r.ok])).toEqual([['navigate', true]]);
    expect(tab.of('goto')).toEqual(['https://www.saucedemo.com']);
    expect(lines.filter((l) => l.includes('"msg":"Trace write failed"'))).toHaveLength(2);
  });

  it('keeps a masked trace of every utterance', async () => {
    await cart.parse('search for Widget');
    await cart.parse('sign in with test-secret');

    expect(cart.traces().map((t) => [t.intent, t.raw])).toEqual([
      ['login', 'sign in with ***'],
      ['search', 'search for Widget'],
    ]);
  });

  it('runs an action plan from a file', async () => {
    const results = await cart.runPlan(fixture('demo-login.json'));
    expect(results.map((r) => r.action)).toEqual(['navigate', 'fill', 'fill', 'click', 'exists']);
    expect(results.every((r) => r.ok)).toBe(true);
    expect(page.of('fill')).toEqual(['#user-name=standard_user', '#password=test-secret']);
  });

  it('stops an intent plan after the first failing intent', async () => {
    const results = await cart.runPlan({
      kind: 'intents',
      steps: [
        { intent: 'search', entities: {} },
        { intent: 'navigate', entities: { site: 'demo' } },
      ],
    });
    expect(results).toEqual([{ action: 'search', ok: false, error: 'No query to search for', elapsed_ms: 0 }]);
  });
});

describe('VoiceCartMCPServer', () => {
  let server: VoiceCartMCPServer;

  beforeEach(() => {
    server = new VoiceCartMCPServer({ config, provider: null, traces: new TraceStore(':memory:'), logger: quietLogger() });
  });

  afterEach(async () => {
    await server.stop();
  });

  it('parses a command without a browser', async () => {
    const result = await server.callTool('parse_command', { text: 'add a lamp to cart' });
    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      { type: 'text', text: JSON.stringify({ name: 'add_to_cart', entities: { product: 'lamp' } }, null, 2) },
    ]);
  });

  it('returns recent traces', async () => {
    await server.callTool('parse_command', { text: 'checkout' });
    const result = await server.callTool('get_traces', { limit: 5 });
    const [content] = result.content;
    expect(content?.type).toBe('text');
    if (content?.type !== 'text') return;
    expect(JSON.parse(content.text)).toMatchObject([{ raw: 'checkout', intent: 'checkout', entities: {} }]);
  });

  it('runs actions against an attached page', async () => {
    const page = new StubPage();
    server.pipeline.attach(page);
    const result = await server.callTool('run_actions', { actions: [{ action: 'wait', timeout: 5 }] });
    expect(result.isError).toBeUndefined();
    expect(page.calls).toEqual([]);
  });

  it('analyses the attached page', async () => {
    server.pipeline.attach(new StubPage({ url: 'https://www.saucedemo.com/inventory.html', title: 'Swag Labs' }));
    const [content] = (await server.callTool('analyze_page', { context: 'checkout' })).content;
    expect(content?.type).toBe('text');
    if (content?.type !== 'text') return;
    expect(JSON.parse(content.text)).toMatchObject({
      page_info: { url: 'https://www.saucedemo.com/inventory.html', title: 'Swag Labs', action_context: 'checkout' },
      automation_ready: true,
    });
  });

  it('reports failures as tool errors', async () => {
    expect(await server.callTool('run_command', { text: 'open the demo site' })).toEqual({
      content: [{ type: 'text', text: 'Error: No page attached. Call launch() or attach() first.' }],
      isError: true,
    });
    expect((await server.callTool('teleport', {})).content).toEqual([{ type: 'text', text: 'Error: Unknown tool: teleport' }]);
    expect((await server.callTool('parse_command', {})).isError).toBe(true);
    expect((await server.callTool('analyze_page', {})).isError).toBe(true);
  });
});
