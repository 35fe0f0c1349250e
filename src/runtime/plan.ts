import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { Plan } from '../types.js';
import { ACTION_KINDS } from '../types.js';
import { BatchActionSchema } from './batch.js';

// Plans are scripted runs stored as JSON or YAML: either a list of batch
// actions, or a list of intents executed through the runner.

const EntitiesSchema = z.object({
  site: z.string().optional(),
  query: z.string().optional(),
  product: z.string().optional(),
  target: z.string().optional(),
  steps: z.array(z.enum(['login', 'add_to_cart', 'checkout', 'place_order'])).optional(),
  verify_price: z.boolean().optional(),
  fields: z.record(z.string()).optional(),
  use_saved: z.boolean().optional(),
  raw: z.string().optional(),
  qty: z.number().int().min(1).optional(),
});

const IntentStepSchema = z.object({
  intent: z.enum(ACTION_KINDS),
  entities: EntitiesSchema.default({}),
});

const PlanFileSchema = z.union([
  z.array(BatchActionSchema).transform((actions): Plan => ({ kind: 'actions', actions })),
  z.object({ actions: z.array(BatchActionSchema) }).transform((p): Plan => ({ kind: 'actions', actions: p.actions })),
  z.object({ steps: z.array(IntentStepSchema).min(1) }).transform((p): Plan => ({
    kind: 'intents',
    steps: p.steps.map((s) => ({ intent: s.intent, entities: { ...s.entities } })),
  })),
]);

export class PlanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanError';
  }
}

export async function loadPlan(path: string): Promise<Plan> {
  const format = formatOf(path);
  const text = await readFile(path, 'utf8');
  return parsePlan(text, format, path);
}

export function parsePlan(text: string, format: 'json' | 'yaml', source = 'plan'): Plan {
  let data: unknown;
  try {
    data = format === 'json' ? JSON.parse(text) : YAML.parse(text);
  } catch (err) {
    throw new PlanError(`${source}: not valid ${format.toUpperCase()}`, { cause: err });
  }

  const parsed = PlanFileSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new PlanError(`${source}: invalid plan (${detail})`);
  }
  return parsed.data;
}

function formatOf(path: string): 'json' | 'yaml' {
  const ext = extname(path).toLowerCase();
  if (ext === '.json') return 'json';
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  throw new PlanError(`${path}: unsupported plan format "${ext || 'none'}" (use .json, .yaml or .yml)`);
}
