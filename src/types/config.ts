import { z } from 'zod'
import { LOG_LEVELS } from '../utils/logger.js'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1')

/**
 * Zod schema for environment validation.
 * All environment variables are validated at startup.
 */
export const envSchema = z.object({
  // IRC network - REQUIRED
  IRC_SERVER: z.string().min(1, 'IRC_SERVER must be a hostname (e.g., irc.libera.chat)'),
  IRC_PORT: z.string().default('6667').transform(Number).pipe(z.number().int().min(1).max(65535)),
  IRC_TLS: booleanFlag,
  IRC_CHANNEL: z
    .string()
    .regex(/^[#&][^\s,]+$/, 'IRC_CHANNEL must start with # or & and contain no spaces or commas'),
  IRC_NICK: z
    .string()
    .regex(/^[A-Za-z[\]\\`_^{|}][A-Za-z0-9[\]\\`_^{|}-]*$/, 'IRC_NICK must be a valid IRC nickname'),

  // Optional: identify to NickServ before joining
  NICKSERV_PASSWORD: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : value)),

  // Enrichment
  FETCH_TIMEOUT_MS: z.string().default('10000').transform(Number).pipe(z.number().int().min(1)),
  // 0 = no cap on enrichments per message
  MAX_URLS_PER_MESSAGE: z.string().default('0').transform(Number).pipe(z.number().int().min(0)),
  USER_AGENT: z
    .string()
    .min(1)
    .default('Mozilla/5.0 (compatible; channel-relay-bot/1.0)'),

  // Runtime
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HEALTH_PORT: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? undefined : Number(value)))
    .pipe(z.number().int().min(1).max(65535).optional()),
})

export type EnvConfig = z.infer<typeof envSchema>

/**
 * Check if NickServ identification is configured.
 */
export function isNickServConfigured(config: Pick<EnvConfig, 'NICKSERV_PASSWORD'>): boolean {
  return !!config.NICKSERV_PASSWORD
}
