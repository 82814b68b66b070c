// ═══════════════════════════════════════════════════════════════════
// RUNTIME CONFIG
// Resolved from the environment; callers can pass their own object to
// anything that takes a config.
//
//   MOTION_ERROR_POLICY  'warn' | 'error'  (default: warn in production)
//   MOTION_TICK_RATE     ticks per second for the default ticker
// ═══════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { TICK_RATE } from './constants.js';

const errorPolicySchema = z.enum(['warn', 'error']);

/**
 * Configuration schema with validation
 */
export const configSchema = z.object({
  /** How registry lookups of unknown names are reported */
  errorPolicy: errorPolicySchema,
  tickRate: z.number().finite().positive(),
});

export type ErrorPolicy = z.infer<typeof errorPolicySchema>;
export type MotionConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

const rawPolicySchema = z.string().trim().toLowerCase().pipe(errorPolicySchema);
const rawTickRateSchema = z.coerce.number().pipe(configSchema.shape.tickRate);

function parseErrorPolicy(env: Env): ErrorPolicy {
  const raw = env.MOTION_ERROR_POLICY?.trim();
  if (raw) {
    const parsed = rawPolicySchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    console.warn(`[Config] Ignoring MOTION_ERROR_POLICY="${raw}", expected "warn" or "error"`);
  }
  return env.NODE_ENV === 'production' ? 'warn' : 'error';
}

function parseTickRate(env: Env): number {
  const raw = env.MOTION_TICK_RATE;
  if (raw === undefined || raw === '') return TICK_RATE;
  const parsed = rawTickRateSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Config] Ignoring MOTION_TICK_RATE="${raw}", using ${TICK_RATE}`);
    return TICK_RATE;
  }
  return parsed.data;
}

/**
 * Load and validate configuration from environment
 */
export function loadConfig(env: Env = process.env): MotionConfig {
  return configSchema.parse({
    errorPolicy: parseErrorPolicy(env),
    tickRate: parseTickRate(env),
  });
}
