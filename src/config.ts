import { config as loadEnv } from 'dotenv'
import { envSchema, type EnvConfig } from './types/config.js'
import { logger } from './utils/logger.js'
import { err, ok, type Result } from './utils/result.js'

// Load .env file
loadEnv()

/**
 * Validate and return environment configuration.
 * Returns Result type, never throws.
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): Result<EnvConfig> {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${String(e.path.join('.'))}: ${e.message}`)
      .join(', ')

    logger.error('Configuration validation failed', { event: 'config_invalid', errors })
    return err(`Invalid configuration: ${errors}`)
  }

  // Never log NICKSERV_PASSWORD itself
  logger.info('Configuration validated', {
    event: 'config_validated',
    nodeEnv: result.data.NODE_ENV,
    server: result.data.IRC_SERVER,
    port: result.data.IRC_PORT,
    channel: result.data.IRC_CHANNEL,
    nick: result.data.IRC_NICK,
    nickServ: result.data.NICKSERV_PASSWORD !== undefined,
    fetchTimeoutMs: result.data.FETCH_TIMEOUT_MS,
  })

  return ok(result.data)
}
