import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Zod schema for the @permission-broker/core configuration.
 *
 * Every value has a default and is read from `process.env`.
 */
export const configSchema = z.object({
  /** Emit console.debug traces for dispatch, completion and flush */
  DEBUG: booleanFlag,

  /**
   * What to do when a policy handler answers a slot twice (or answers an
   * out-of-range slot): log a warning and ignore it, or throw.
   */
  CONTRACT_VIOLATION: z.enum(['warn', 'throw']).default('warn'),
});

export type BrokerConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from `process.env`, validate with zod, and return a
 * frozen config object.
 *
 * Throws `ZodError` if validation fails.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BrokerConfig {
  const raw = {
    DEBUG: env.PERMISSION_BROKER_DEBUG,
    CONTRACT_VIOLATION: env.PERMISSION_BROKER_CONTRACT_VIOLATION,
  };

  // Strip undefined values so zod .default() kicks in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  return Object.freeze(configSchema.parse(cleaned));
}
