/**
 * XState stream negotiation machine.
 *
 * Tracks the connect-time handshake of one session. The machine performs no
 * I/O: the Session writes and reads, then reports what happened. Events that
 * do not apply in the current state are ignored, which is what keeps the
 * protocol order intact (no bind before auth, the JID recorded once).
 *
 * ## State Diagram
 *
 * ```
 * disconnected ── OPEN_STREAM ──► streamOpened ── STREAM_STARTED ──► awaitingFeatures
 *                                                                        │ FEATURES
 *                                                                        ▼
 *        authFailed ◄── AUTH_FAILURE ── authSent ◄── AUTH_SENT ── (features stored)
 *                                          │ AUTH_SUCCESS
 *                                          ▼
 *                                    authenticated ── RESTART ──► streamRestarted
 *                                                                        │ STREAM_STARTED
 *                                                                        ▼
 *        bound ◄── BOUND ── bindSent ◄── BIND_SENT ── awaitingFeatures2
 *          │ PRESENCE_SENT
 *          ▼
 *     presenceSent ── READY ──► ready
 *
 * FAIL from any non-final state ──► failed
 * CLOSE from any state but closed ──► closed
 * ```
 *
 * @module Core/NegotiationMachine
 */
import { setup, assign, type ActorRefFrom, type SnapshotFrom } from 'xstate'
import type { SaslMechanismName } from './sasl'

// ============================================================================
// Types
// ============================================================================

export type NegotiationEvent =
  | { type: 'OPEN_STREAM'; domain: string }
  | { type: 'STREAM_STARTED' }
  | { type: 'FEATURES'; mechanisms: string[] }
  | { type: 'AUTH_SENT'; mechanism: SaslMechanismName }
  | { type: 'AUTH_SUCCESS' }
  | { type: 'AUTH_FAILURE'; condition: string }
  | { type: 'RESTART' }
  | { type: 'BIND_SENT' }
  | { type: 'BOUND'; jid: string }
  | { type: 'PRESENCE_SENT' }
  | { type: 'READY' }
  | { type: 'FAIL'; error: string }
  | { type: 'CLOSE' }

export interface NegotiationContext {
  /** Domain the stream is addressed to */
  domain: string | null
  /** Mechanisms offered in the first features block */
  mechanisms: string[]
  mechanism: SaslMechanismName | null
  /** Full JID assigned by resource binding */
  jid: string | null
  lastError: string | null
}

export type NegotiationStateValue =
  | 'disconnected'
  | 'streamOpened'
  | 'awaitingFeatures'
  | 'authSent'
  | 'authenticated'
  | 'streamRestarted'
  | 'awaitingFeatures2'
  | 'bindSent'
  | 'bound'
  | 'presenceSent'
  | 'ready'
  | 'authFailed'
  | 'failed'
  | 'closed'

// ============================================================================
// Machine Definition
// ============================================================================

const FAIL = { target: '#negotiation.failed', actions: 'setError' } as const

export const negotiationMachine = setup({
  types: {
    context: {} as NegotiationContext,
    events: {} as NegotiationEvent,
  },
  actions: {
    setDomain: assign(({ event }) => (event.type === 'OPEN_STREAM' ? { domain: event.domain } : {})),
    setMechanisms: assign(({ event }) => (event.type === 'FEATURES' ? { mechanisms: event.mechanisms } : {})),
    setMechanism: assign(({ event }) => (event.type === 'AUTH_SENT' ? { mechanism: event.mechanism } : {})),
    setJid: assign(({ event }) => (event.type === 'BOUND' ? { jid: event.jid } : {})),
    setAuthError: assign(({ event }) =>
      event.type === 'AUTH_FAILURE' ? { lastError: `auth failure: ${event.condition}` } : {},
    ),
    setError: assign(({ event }) => (event.type === 'FAIL' ? { lastError: event.error } : {})),
  },
  guards: {
    // The JID is set once, and only to something non-empty
    canBind: ({ context, event }) => event.type === 'BOUND' && context.jid === null && event.jid !== '',
  },
}).createMachine({
  id: 'negotiation',
  context: {
    domain: null,
    mechanisms: [],
    mechanism: null,
    jid: null,
    lastError: null,
  },
  initial: 'disconnected',
  on: {
    CLOSE: { target: '.closed' },
  },
  states: {
    disconnected: {
      on: {
        OPEN_STREAM: { target: 'streamOpened', actions: 'setDomain' },
        FAIL,
      },
    },
    /** Header written, waiting for the server's stream root. */
    streamOpened: {
      on: {
        STREAM_STARTED: { target: 'awaitingFeatures' },
        FAIL,
      },
    },
    awaitingFeatures: {
      on: {
        FEATURES: { actions: 'setMechanisms' },
        AUTH_SENT: { target: 'authSent', actions: 'setMechanism' },
        FAIL,
      },
    },
    authSent: {
      on: {
        AUTH_SUCCESS: { target: 'authenticated' },
        AUTH_FAILURE: { target: 'authFailed', actions: 'setAuthError' },
        FAIL,
      },
    },
    authenticated: {
      on: {
        RESTART: { target: 'streamRestarted' },
        FAIL,
      },
    },
    /** Restart header written, waiting for the new stream root. */
    streamRestarted: {
      on: {
        STREAM_STARTED: { target: 'awaitingFeatures2' },
        FAIL,
      },
    },
    awaitingFeatures2: {
      on: {
        BIND_SENT: { target: 'bindSent' },
        FAIL,
      },
    },
    bindSent: {
      on: {
        BOUND: { target: 'bound', guard: 'canBind', actions: 'setJid' },
        FAIL,
      },
    },
    bound: {
      on: {
        PRESENCE_SENT: { target: 'presenceSent' },
        FAIL,
      },
    },
    presenceSent: {
      on: {
        READY: { target: 'ready' },
        FAIL,
      },
    },
    ready: {
      on: { FAIL },
    },
    authFailed: {},
    failed: {},
    closed: {
      type: 'final',
    },
  },
})

export type NegotiationActor = ActorRefFrom<typeof negotiationMachine>
export type NegotiationSnapshot = SnapshotFrom<typeof negotiationMachine>

/** Whether negotiation can no longer reach `ready`. */
export function isTerminalState(snapshot: NegotiationSnapshot): boolean {
  return snapshot.matches('authFailed') || snapshot.matches('failed') || snapshot.matches('closed')
}
