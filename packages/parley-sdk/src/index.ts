/**
 * # Parley SDK
 *
 * A client engine for the XMPP core protocol (RFC 3920/3921): stream
 * negotiation over a caller-supplied transport, SASL PLAIN/EXTERNAL, resource
 * binding and typed stanza exchange.
 *
 * ## Usage
 *
 * ```typescript
 * import { Session, dialTls } from '@parley/sdk'
 *
 * const transport = await dialTls({ jid: 'alice@example.com', host: 'xmpp.example.com:5223' })
 * const session = await Session.connect(transport, { jid: 'alice@example.com', password })
 *
 * await session.sendMessage('bob@example.com', 'Hello!')
 * const stanza = await session.recv()
 * await session.close()
 * ```
 *
 * @packageDocumentation
 */
export * from './core'

// Stanza error helpers
export { parseXMPPError, formatXMPPError } from './utils/xmppError'
export type { XMPPStanzaError, XMPPErrorType } from './utils/xmppError'
