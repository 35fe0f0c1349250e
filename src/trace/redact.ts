import type { Intent, TraceRecord } from '../types.js';
import { SECRET_MASK } from '../utils/logger.js';

// Sensitive values are masked before a trace record leaves the pipeline.
// Keys match case-insensitively; nested objects and arrays are walked.

export const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'password',
  'passcode',
  'passwd',
  'secret',
  'token',
  'card_number',
  'card_cvv',
  'cvv',
  'otp',
]);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (typeof value !== 'object' || value === null) return value;

  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = isSensitiveKey(key) ? SECRET_MASK : redact(inner);
  }
  return out;
}

export function redactEntities(entities: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(entities)) {
    out[key] = isSensitiveKey(key) ? SECRET_MASK : redact(inner);
  }
  return out;
}

/** Known secret values (configured passwords) are masked in the raw text too */
export function buildTraceRecord(
  raw: string,
  intent: Intent,
  secrets: Iterable<string> = [],
  now: Date = new Date(),
): TraceRecord {
  let text = raw;
  for (const secret of secrets) {
    if (secret) text = text.split(secret).join(SECRET_MASK);
  }
  return {
    ts: now.toISOString(),
    raw: text,
    intent: intent.name,
    entities: redactEntities(intent.entities),
  };
}
