import type { LogLevel } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Logger — one JSON object per line on stderr
//
// stdout is reserved for the MCP stdio transport, so every level goes to
// console.error. Registered secrets are masked in messages and metadata.
// ─────────────────────────────────────────────────────────────────────────────

export const SECRET_MASK = '***';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogWriter = (line: string) => void;

function safeSerialize(meta: unknown): unknown {
  try {
    if (meta instanceof Error) {
      return { name: meta.name, message: meta.message };
    }
    return JSON.parse(
      JSON.stringify(meta, (_k, v: unknown) => {
        if (v instanceof Set) return Array.from(v);
        if (v instanceof Map) return Object.fromEntries(v);
        if (typeof v === 'bigint') return v.toString();
        if (v instanceof Error) return { name: v.name, message: v.message };
        return v;
      }),
    );
  } catch {
    return { value: String(meta) };
  }
}

export class Logger {
  private secrets: Set<string>;

  constructor(
    private level: LogLevel = 'info',
    private name = 'voicecart',
    private write: LogWriter = (line) => console.error(line),
    secrets: Set<string> = new Set(),
  ) {
    this.secrets = secrets;
  }

  /** Mask these values wherever they appear; shared with child loggers */
  addSecrets(values: Iterable<string>): void {
    for (const v of values) {
      if (v) this.secrets.add(v);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(msg: string, meta?: unknown): void {
    if (this.should('debug')) this.write(this.line('debug', msg, meta));
  }

  info(msg: string, meta?: unknown): void {
    if (this.should('info')) this.write(this.line('info', msg, meta));
  }

  warn(msg: string, meta?: unknown): void {
    if (this.should('warn')) this.write(this.line('warn', msg, meta));
  }

  error(msg: string, meta?: unknown): void {
    if (this.should('error')) this.write(this.line('error', msg, meta));
  }

  child(bindings: Partial<{ name: string; level: LogLevel }>): Logger {
    return new Logger(
      bindings.level ?? this.level,
      bindings.name ?? this.name,
      this.write,
      this.secrets,
    );
  }

  private should(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private line(level: LogLevel, msg: string, meta?: unknown): string {
    const payload: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      name: this.name,
      msg,
    };
    if (meta !== undefined) payload.meta = safeSerialize(meta);
    return this.mask(JSON.stringify(payload));
  }

  private mask(line: string): string {
    let out = line;
    for (const secret of this.secrets) {
      // Match the JSON-escaped form, that is what appears in the line
      const escaped = JSON.stringify(secret).slice(1, -1);
      out = out.split(escaped).join(SECRET_MASK);
    }
    return out;
  }
}

export const logger = new Logger();
