/**
 * Connection and activity state.
 * In-memory only - a restart begins from a fresh state.
 */

export type ConnectionStatus = 'disconnected' | 'connecting' | 'registered' | 'joined'

interface BotState {
  connectionStatus: ConnectionStatus
  lastConnected: Date | null
  messagesHandled: number
  repliesSent: number
  lastActivityAt: Date | null
  startedAt: Date
}

const state: BotState = {
  connectionStatus: 'disconnected',
  lastConnected: null,
  messagesHandled: 0,
  repliesSent: 0,
  lastActivityAt: null,
  startedAt: new Date(),
}

export function getConnectionStatus(): ConnectionStatus {
  return state.connectionStatus
}

export function setConnectionStatus(status: ConnectionStatus): void {
  state.connectionStatus = status
  if (status === 'registered') {
    state.lastConnected = new Date()
  }
}

/**
 * Count one dispatched message and the replies it produced.
 */
export function recordMessageHandled(repliesSent: number): void {
  state.messagesHandled++
  state.repliesSent += repliesSent
  state.lastActivityAt = new Date()
}

/**
 * Snapshot for the health endpoint. Returns a copy.
 */
export function getState(): Readonly<BotState> {
  return { ...state }
}

/**
 * Reset to initial values. Used by tests.
 */
export function resetState(): void {
  state.connectionStatus = 'disconnected'
  state.lastConnected = null
  state.messagesHandled = 0
  state.repliesSent = 0
  state.lastActivityAt = null
  state.startedAt = new Date()
}
