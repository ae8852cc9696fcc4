import { z } from 'zod';

/**
 * Engine configuration
 */
export const EngineOptions = z.object({
  backend: z.enum(['native', 'decimal']).default('native'),
  /** Significant digits carried by the decimal backend */
  precision: z.number().int().positive().max(1_000).default(64),
  angleUnit: z.enum(['radians', 'degrees']).default('radians'),
  /** Limit on nested user function calls */
  maxCallDepth: z.number().int().positive().max(1_000).default(256),
  logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('warn'),
});

export type EngineOptionsT = z.infer<typeof EngineOptions>;
export type EngineOptionsInput = z.input<typeof EngineOptions>;

type Env = Record<string, string | undefined>;

/**
 * Environment overrides, all optional:
 *   NUMEN_BACKEND, NUMEN_PRECISION, NUMEN_ANGLE_UNIT, NUMEN_LOG_LEVEL
 */
function fromEnv(env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.NUMEN_BACKEND) out.backend = env.NUMEN_BACKEND;
  if (env.NUMEN_PRECISION) out.precision = Number(env.NUMEN_PRECISION);
  if (env.NUMEN_ANGLE_UNIT) out.angleUnit = env.NUMEN_ANGLE_UNIT;
  if (env.NUMEN_LOG_LEVEL) out.logLevel = env.NUMEN_LOG_LEVEL;
  return out;
}

/**
 * Merges environment overrides under explicit options and validates the
 * result. Throws a ZodError on invalid values.
 */
export function loadOptions(input: EngineOptionsInput = {}, env: Env = process.env): EngineOptionsT {
  return EngineOptions.parse({ ...fromEnv(env), ...input });
}
