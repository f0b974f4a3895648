/**
 * Session configuration.
 *
 * Options are resolved per session from {@link DEFAULT_SESSION_OPTIONS}; no
 * defaults are shared or mutated across sessions.
 */

/** Presence `<show/>` values (RFC 3921 §2.2.2.1) */
export type PresenceShow = 'away' | 'chat' | 'dnd' | 'xa'

export interface InitialPresence {
  show?: PresenceShow
  status?: string
}

/** Callbacks receiving raw stream traffic, for diagnostics. */
export interface TrafficTee {
  /** Decoded inbound text, chunk by chunk */
  received?: (text: string) => void
  /** Every outbound write */
  sent?: (text: string) => void
}

export interface SessionOptions {
  /** Authenticate with SASL EXTERNAL when the server offers it */
  preferExternal: boolean
  /**
   * Send credentials over a transport that is not encrypted. Only for test
   * servers on a trusted network.
   */
  allowUnencryptedAuth: boolean
  /** Resource to request when binding; the server picks one when unset */
  resource?: string
  /** Initial presence sent once the resource is bound */
  presence: InitialPresence
  /** `xml:lang` of the initial presence */
  lang: string
  tee: TrafficTee
}

export const DEFAULT_SESSION_OPTIONS: Readonly<SessionOptions> = Object.freeze({
  preferExternal: false,
  allowUnencryptedAuth: false,
  presence: Object.freeze({ show: 'xa' as const }),
  lang: 'en',
  tee: Object.freeze({}),
})

export type SessionOptionsInput = Partial<Omit<SessionOptions, 'presence' | 'tee'>> & {
  presence?: InitialPresence
  tee?: TrafficTee
}

/**
 * Fill in defaults. Nested `presence` and `tee` objects are merged field by
 * field.
 */
export function resolveSessionOptions(input: SessionOptionsInput = {}): SessionOptions {
  return {
    preferExternal: input.preferExternal ?? DEFAULT_SESSION_OPTIONS.preferExternal,
    allowUnencryptedAuth: input.allowUnencryptedAuth ?? DEFAULT_SESSION_OPTIONS.allowUnencryptedAuth,
    resource: input.resource,
    presence: { ...DEFAULT_SESSION_OPTIONS.presence, ...input.presence },
    lang: input.lang ?? DEFAULT_SESSION_OPTIONS.lang,
    tee: { ...input.tee },
  }
}
