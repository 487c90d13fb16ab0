import { describe, it, expect, beforeEach } from 'vitest'
import {
  getConnectionStatus,
  setConnectionStatus,
  recordMessageHandled,
  getState,
  resetState,
} from './state.js'

describe('Bot State', () => {
  beforeEach(() => {
    resetState()
  })

  it('starts disconnected with no activity', () => {
    const state = getState()
    expect(state.connectionStatus).toBe('disconnected')
    expect(state.lastConnected).toBeNull()
    expect(state.messagesHandled).toBe(0)
    expect(state.repliesSent).toBe(0)
    expect(state.lastActivityAt).toBeNull()
  })

  it('tracks connection status', () => {
    setConnectionStatus('connecting')
    expect(getConnectionStatus()).toBe('connecting')
    expect(getState().lastConnected).toBeNull()
  })

  it('stamps lastConnected on registration', () => {
    setConnectionStatus('registered')
    expect(getState().lastConnected).toBeInstanceOf(Date)
  })

  it('keeps lastConnected once joined', () => {
    setConnectionStatus('registered')
    const registeredAt = getState().lastConnected
    setConnectionStatus('joined')
    expect(getState().lastConnected).toBe(registeredAt)
  })

  it('counts messages and replies', () => {
    recordMessageHandled(2)
    recordMessageHandled(0)

    const state = getState()
    expect(state.messagesHandled).toBe(2)
    expect(state.repliesSent).toBe(2)
    expect(state.lastActivityAt).toBeInstanceOf(Date)
  })

  it('returns a copy', () => {
    const snapshot = getState()
    recordMessageHandled(1)
    expect(snapshot.messagesHandled).toBe(0)
  })
})
