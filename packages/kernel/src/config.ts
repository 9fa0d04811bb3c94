/**
 * Runtime configuration
 *
 * Read from environment variables and validated with zod. Every value has a
 * default, so an empty environment yields a usable configuration.
 */

import { z } from 'zod';
import { LIMITS } from './constants.js';
import { ProtocolError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z
  .object({
    ZPR_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    ZPR_LOG_NAME: z.string().min(1).default('zpr-protocol'),
    ZPR_MAX_PAYLOAD_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(LIMITS.defaultMaxPayloadBytes),
  })
  .transform((env) => ({
    logLevel: env.ZPR_LOG_LEVEL,
    logName: env.ZPR_LOG_NAME,
    maxPayloadBytes: env.ZPR_MAX_PAYLOAD_BYTES,
  }));

export type ProtocolConfig = z.output<typeof ConfigSchema>;

export type LogLevel = ProtocolConfig['logLevel'];

/**
 * Load configuration from an environment map
 *
 * Empty strings count as unset.
 *
 * @throws ProtocolError E_INVALID_CONFIG naming the offending variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ProtocolConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('ZPR_') && value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const result = ConfigSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ProtocolError('E_INVALID_CONFIG', `Invalid configuration: ${issues}`);
  }
  return result.data;
}
