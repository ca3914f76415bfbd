import { z } from 'zod';

const optionalString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

// ============================================================================
// ENV SCHEMA (.env file, overridden by the process environment)
// ============================================================================

export const envSchema = z.object({
  TUNNEL_BINARY_PATH: optionalString,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
    z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),
  ),
});

export type EnvSchema = z.infer<typeof envSchema>;
