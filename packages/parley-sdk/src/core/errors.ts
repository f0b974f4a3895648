/**
 * Error taxonomy for the stream engine.
 *
 * Every failure surfaced by the SDK is an {@link XMPPError}. The `code` field
 * is the stable discriminator; subclasses exist so callers can use
 * `instanceof` where that reads better.
 *
 * @module Core/Errors
 */
import { formatName, type QualifiedName } from './qname'

export type XMPPErrorCode =
  | 'CONFIG'
  | 'PROTOCOL'
  | 'AUTH'
  | 'SECURITY'
  | 'TRANSPORT'
  | 'TIMEOUT'
  | 'END_OF_STREAM'

export class XMPPError extends Error {
  override name = 'XMPPError'
  readonly code: XMPPErrorCode

  constructor(code: XMPPErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.code = code
  }
}

/** Malformed caller configuration, e.g. a JID without a domain. */
export class ConfigError extends XMPPError {
  override name = 'ConfigError'

  constructor(message: string) {
    super('CONFIG', message)
  }

  static invalidJid(jid: string): ConfigError {
    return new ConfigError(`invalid username (want user@domain): ${jid}`)
  }
}

/** The peer sent something the protocol does not allow at this point. */
export class ProtocolError extends XMPPError {
  override name = 'ProtocolError'
  /** Qualified name of the offending element, when there is one */
  readonly element: QualifiedName | undefined

  constructor(message: string, element?: QualifiedName) {
    super('PROTOCOL', message)
    this.element = element
  }

  static unexpectedElement(name: QualifiedName): ProtocolError {
    return new ProtocolError(`unexpected XMPP message ${name.space} <${name.local}/>`, name)
  }

  static expected(what: string, got: QualifiedName): ProtocolError {
    return new ProtocolError(`expected ${what} but got <${got.local}> in ${got.space}`, got)
  }

  static malformed(details: string, element?: QualifiedName): ProtocolError {
    const where = element ? ` in ${formatName(element)}` : ''
    return new ProtocolError(`malformed XML${where}: ${details}`, element)
  }

  static unexpectedEnd(inside?: QualifiedName): ProtocolError {
    const where = inside ? ` inside <${inside.local}>` : ''
    return new ProtocolError(`unexpected end of stream${where}`, inside)
  }
}

/** SASL negotiation failed or could not start. */
export class AuthError extends XMPPError {
  override name = 'AuthError'
  /** SASL failure condition reported by the server (e.g. 'not-authorized') */
  readonly condition: string | undefined

  constructor(message: string, condition?: string) {
    super('AUTH', message)
    this.condition = condition
  }

  static noMechanism(advertised: readonly string[]): AuthError {
    return new AuthError(`PLAIN authentication is not an option: [${advertised.join(' ')}]`)
  }

  static failure(condition: string): AuthError {
    return new AuthError(`auth failure: ${condition}`, condition)
  }
}

/** Local security policy refused to continue. */
export class SecurityError extends XMPPError {
  override name = 'SecurityError'

  constructor(message: string) {
    super('SECURITY', message)
  }

  static unencryptedAuth(): SecurityError {
    return new SecurityError('refusing to send credentials over an unencrypted transport')
  }
}

/** Read, write or close failure on the transport. */
export class TransportError extends XMPPError {
  override name = 'TransportError'

  constructor(message: string, cause?: unknown) {
    super('TRANSPORT', message, cause === undefined ? undefined : { cause })
  }

  static io(operation: 'read' | 'write' | 'close', cause: unknown): TransportError {
    const details = cause instanceof Error ? cause.message : String(cause)
    return new TransportError(`${operation} failed: ${details}`, cause)
  }

  static closed(): TransportError {
    return new TransportError('transport is closed')
  }

  static unusable(): TransportError {
    return new TransportError('session is unusable after a previous failure')
  }

  static endedDuringNegotiation(cause: unknown): TransportError {
    return new TransportError('unexpected end of stream during negotiation', cause)
  }

  static concurrent(path: 'read' | 'write'): TransportError {
    return new TransportError(`concurrent ${path} on the same session`)
  }
}

/** A deadline set on the transport expired. */
export class TimeoutError extends XMPPError {
  override name = 'TimeoutError'
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super('TIMEOUT', `transport timed out after ${timeoutMs}ms`)
    this.timeoutMs = timeoutMs
  }
}

/**
 * The peer closed the transport cleanly between elements.
 *
 * This is the normal termination signal of `Session.recv()`, not a failure.
 */
export class EndOfStreamError extends XMPPError {
  override name = 'EndOfStreamError'

  constructor() {
    super('END_OF_STREAM', 'end of stream')
  }
}

export function isXMPPError(err: unknown, code?: XMPPErrorCode): err is XMPPError {
  return err instanceof XMPPError && (code === undefined || err.code === code)
}

export function isEndOfStream(err: unknown): err is EndOfStreamError {
  return isXMPPError(err, 'END_OF_STREAM')
}
