import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { VoiceCart, type VoiceCartOptions } from '../index.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// VoiceCart MCP Server
//
// Exposes the command pipeline as tools over stdio. Any MCP-compatible agent
// (or a voice front end) connects here. stdout belongs to the transport, so
// logging stays on stderr.
// ─────────────────────────────────────────────────────────────────────────────

const TOOLS = [
  {
    name: 'parse_command',
    description: 'Parse a spoken or typed shopping command into an intent without touching the browser.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'The command, e.g. "search for backpack"' },
      },
      required: ['text'],
    },
  },
  {
    name: 'run_command',
    description: 'Parse a command and carry it out in the browser. Returns the intent and one result per operation.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'The command, e.g. "open demo site and add backpack to cart"' },
      },
      required: ['text'],
    },
  },
  {
    name: 'run_actions',
    description: 'Execute a scripted list of browser actions in order. A failing action marked critical stops the list.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        actions: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              action: {
                type: 'string',
                enum: ['navigate', 'click', 'fill', 'exists', 'first_visible', 'wait', 'screenshot', 'smart_click'],
              },
              url: { type: 'string' },
              selector: { type: 'string' },
              selectors: { type: 'array', items: { type: 'string' } },
              text: { type: 'string' },
              timeout: { type: 'number' },
              path: { type: 'string' },
              description: { type: 'string' },
              critical: { type: 'boolean' },
            },
            required: ['action'],
          },
        },
      },
      required: ['actions'],
    },
  },
  {
    name: 'analyze_page',
    description: 'Report the login, shopping, search and navigation elements visible on the current page, plus element counts.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        context: { type: 'string', description: 'What the caller means to do next (default "general")' },
      },
    },
  },
  {
    name: 'get_traces',
    description: 'Recent parsed commands, newest first, with sensitive values masked.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'number', description: 'How many traces to return (default 20)' },
      },
    },
  },
];

const TextArgs = z.object({ text: z.string().min(1) });
const ActionsArgs = z.object({ actions: z.array(z.unknown()) });
const AnalyzeArgs = z.object({ context: z.string().min(1).optional() });
const TracesArgs = z.object({ limit: z.number().int().positive().max(500).optional() });

export class VoiceCartMCPServer {
  private server: Server;
  private cart: VoiceCart;
  private logger: Logger;
  private started = false;

  constructor(options: VoiceCartOptions = {}) {
    this.logger = (options.logger ?? rootLogger).child({ name: 'mcp' });
    this.cart = new VoiceCart(options);

    this.server = new Server(
      { name: 'voicecart', version: '0.1.0' },
      { capabilities: { tools: {} } },
    );

    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  /** Tool dispatch; errors come back as tool results, never as protocol errors */
  async callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'parse_command': {
          const { text } = TextArgs.parse(args);
          return textResult(await this.cart.parse(text));
        }
        case 'run_command': {
          const { text } = TextArgs.parse(args);
          return textResult(await this.cart.command(text));
        }
        case 'run_actions': {
          const { actions } = ActionsArgs.parse(args);
          return textResult(await this.cart.runActions(actions));
        }
        case 'analyze_page': {
          const { context } = AnalyzeArgs.parse(args);
          return textResult(await this.cart.analyzePage(context));
        }
        case 'get_traces': {
          const { limit } = TracesArgs.parse(args);
          return textResult(this.cart.traces(limit));
        }
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (err) {
      this.logger.warn('Tool call failed', { tool: name, error: errorMessage(err) });
      return {
        content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  async start(): Promise<void> {
    await this.cart.launch();
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.started = true;
    this.logger.info('VoiceCart MCP server started');
  }

  async stop(): Promise<void> {
    await this.cart.close();
    if (this.started) await this.server.close();
    this.started = false;
  }

  /** The pipeline behind the tools */
  get pipeline(): VoiceCart {
    return this.cart;
  }
}

function textResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}
