import type { ClientError, IqStanza, PresenceStanza } from '../core/stanzas'

/**
 * RFC 3920 §9.3.2 error type categories.
 *
 * - cancel:   Do not retry (the error condition is not expected to change)
 * - continue: Proceed (the condition was only a warning)
 * - modify:   Retry after changing the data sent
 * - auth:     Provide credentials and retry
 * - wait:     Retry after waiting (the error is temporary)
 */
export type XMPPErrorType = 'cancel' | 'continue' | 'modify' | 'auth' | 'wait'

/**
 * Structured representation of a stanza error (RFC 3920 §9.3).
 *
 * Example error stanza:
 * ```xml
 * <error type="auth">
 *   <not-authorized xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/>
 *   <text xmlns="urn:ietf:params:xml:ns:xmpp-stanzas">
 *     Resource binding is not allowed
 *   </text>
 * </error>
 * ```
 */
export interface XMPPStanzaError {
  /** Error category from the type attribute (cancel, auth, modify, wait, continue) */
  type: XMPPErrorType
  /** Defined condition element name (e.g. 'forbidden', 'conflict', 'bad-request') */
  condition: string
  /** Optional human-readable error description from the <text> element */
  text?: string
}

const VALID_ERROR_TYPES: ReadonlySet<string> = new Set(['cancel', 'continue', 'modify', 'auth', 'wait'])

function isErrorType(value: string | undefined): value is XMPPErrorType {
  return value !== undefined && VALID_ERROR_TYPES.has(value)
}

/**
 * Normalize a decoded `<error>` into a stanza error.
 *
 * @param source - The decoded error, or the presence/iq stanza carrying it.
 * @returns Parsed error object, or null if there is no error.
 */
export function parseXMPPError(source: ClientError | PresenceStanza | IqStanza | undefined | null): XMPPStanzaError | null {
  if (!source) return null

  // If passed the parent stanza instead of the error, extract it
  const error = source.kind === 'error' ? source : source.error
  if (!error) return null

  return {
    // Default to 'cancel' for malformed errors
    type: isErrorType(error.type) ? error.type : 'cancel',
    condition: error.condition ?? 'undefined-condition',
    text: error.text?.trim() || undefined,
  }
}

/**
 * Format an XMPPStanzaError into a human-readable string.
 *
 * Prefers the server-provided text when available, falls back to
 * converting the condition from kebab-case to a readable form
 * (e.g. 'not-allowed' → 'Not allowed').
 */
export function formatXMPPError(error: XMPPStanzaError): string {
  if (error.text) return error.text

  // Convert kebab-case condition to sentence case: 'not-allowed' → 'Not allowed'
  const words = error.condition.split('-')
  words[0] = words[0].charAt(0).toUpperCase() + words[0].slice(1)
  return words.join(' ')
}
