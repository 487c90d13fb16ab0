import irc from 'irc'
import { logger as defaultLogger, errorMessage, type Logger } from '../utils/logger.js'
import { isNickServConfigured, type EnvConfig } from '../types/config.js'
import type { PriceProvider } from '../services/yahooFinance.js'
import type { InboundMessage } from '../types/handlers.js'
import { setConnectionStatus, recordMessageHandled } from './state.js'
import { dispatchMessage, type DispatchContext } from './dispatcher.js'
import { createSerialQueue, type SerialQueue } from './queue.js'

export const NICKSERV = 'NickServ'

/**
 * Delay between reconnection attempts after a dropped connection.
 */
export const RECONNECT_DELAY_MS = 5000

export type TransportErrorSource = 'server' | 'network'

/**
 * The slice of an IRC client the bot needs.
 */
export interface ChatTransport {
  onRegistered(listener: () => void): void
  onMessage(listener: (nick: string, target: string, text: string) => void): void
  onError(listener: (error: unknown, source: TransportErrorSource) => void): void
  say(target: string, text: string): void
  join(channel: string, onJoined: () => void): void
  connect(): void
  disconnect(reason: string): Promise<void>
}

export type ConnectionConfig = Pick<
  EnvConfig,
  | 'IRC_SERVER'
  | 'IRC_PORT'
  | 'IRC_TLS'
  | 'IRC_CHANNEL'
  | 'IRC_NICK'
  | 'NICKSERV_PASSWORD'
  | 'FETCH_TIMEOUT_MS'
  | 'MAX_URLS_PER_MESSAGE'
  | 'USER_AGENT'
>

/**
 * Build a ChatTransport on top of the `irc` client.
 * The client does not connect until connect() is called.
 */
export function createIrcTransport(config: ConnectionConfig): ChatTransport {
  const client = new irc.Client(config.IRC_SERVER, config.IRC_NICK, {
    port: config.IRC_PORT,
    secure: config.IRC_TLS,
    userName: config.IRC_NICK,
    realName: config.IRC_NICK,
    channels: [],
    autoConnect: false,
    autoRejoin: true,
    retryDelay: RECONNECT_DELAY_MS,
    stripColors: true,
  })

  return {
    onRegistered: (listener) => {
      client.on('registered', () => listener())
    },
    onMessage: (listener) => {
      client.on('message', (nick: string, target: string, text: string) => listener(nick, target, text))
    },
    onError: (listener) => {
      client.on('error', (error: unknown) => listener(error, 'server'))
      client.on('netError', (error: unknown) => listener(error, 'network'))
    },
    say: (target, text) => client.say(target, text),
    join: (channel, onJoined) => client.join(channel, () => onJoined()),
    connect: () => client.connect(),
    disconnect: (reason) => new Promise<void>((resolve) => client.disconnect(reason, () => resolve())),
  }
}

export interface ConnectionDeps {
  /** Defaults to an `irc` client built from config */
  transport?: ChatTransport
  priceProvider?: PriceProvider
  logger?: Logger
}

export interface Connection {
  transport: ChatTransport
  queue: SerialQueue
}

function describeTransportError(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'object' && error !== null && 'command' in error) {
    return String(error.command)
  }
  return String(error)
}

/**
 * Wire the transport to the dispatcher and connect.
 *
 * - On registration: identify to NickServ when a password is configured, then join the channel
 * - On channel messages: queue a dispatch; messages are handled one at a time in arrival order
 */
export function createConnection(config: ConnectionConfig, deps: ConnectionDeps = {}): Connection {
  const log = (deps.logger ?? defaultLogger).child({ component: 'connection' })
  const transport = deps.transport ?? createIrcTransport(config)
  const queue = createSerialQueue(log)
  const channel = config.IRC_CHANNEL

  const dispatchContext: DispatchContext = {
    reply: (target, text) => transport.say(target, text),
    fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
    maxUrlsPerMessage: config.MAX_URLS_PER_MESSAGE,
    userAgent: config.USER_AGENT,
    priceProvider: deps.priceProvider,
    logger: log.child({ component: 'dispatcher' }),
  }

  transport.onRegistered(() => {
    setConnectionStatus('registered')
    log.info('Connected to server', { event: 'connection_registered', server: config.IRC_SERVER })

    if (isNickServConfigured(config)) {
      transport.say(NICKSERV, `IDENTIFY ${config.NICKSERV_PASSWORD}`)
      log.info('Identify sent to NickServ', { event: 'nickserv_identify' })
    }

    log.info('Joining channel', { event: 'channel_join_attempt', channel })
    transport.join(channel, () => {
      setConnectionStatus('joined')
      log.info('Joined channel', { event: 'channel_joined', channel })
    })
  })

  transport.onMessage((nick, target, text) => {
    // Private messages and other channels are ignored
    if (target.toLowerCase() !== channel.toLowerCase()) return

    const message: InboundMessage = { channelName: target, senderText: nick, rawText: text }

    log.debug('Message received', { event: 'message_received', channel: target, sender: nick, text })

    void queue.push(async () => {
      const summary = await dispatchMessage(message, dispatchContext)
      recordMessageHandled(summary.repliesSent)
    })
  })

  transport.onError((error, source) => {
    log.error('Transport error', {
      event: 'transport_error',
      source,
      error: describeTransportError(error),
    })
  })

  setConnectionStatus('connecting')
  log.info('Attempting connection...', {
    event: 'connection_attempt',
    server: config.IRC_SERVER,
    port: config.IRC_PORT,
    tls: config.IRC_TLS,
  })

  try {
    transport.connect()
  } catch (error) {
    setConnectionStatus('disconnected')
    log.error('Connection failed to start', { event: 'connection_error', error: errorMessage(error) })
    throw error
  }

  return { transport, queue }
}
