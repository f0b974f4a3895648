/**
 * One client-to-server XMPP session over a single transport.
 *
 * {@link Session.connect} runs the whole handshake (stream open, SASL, stream
 * restart, resource binding, initial presence) and only resolves once the
 * session is ready; any failure closes the transport and rejects. Afterwards
 * {@link Session.recv} and {@link Session.send} exchange stanzas.
 *
 * @example
 * ```typescript
 * const transport = await dialTls({ jid: 'alice@example.com' })
 * const session = await Session.connect(transport, { jid: 'alice@example.com', password })
 * await session.sendMessage('bob@example.com', 'Hello!')
 * for await (const stanza of session.stanzas()) {
 *   if (stanza.kind === 'message') console.log(stanza.body)
 * }
 * ```
 *
 * @module Core/Session
 */
import type { Element } from '@xmpp/client'
import { createActor } from 'xstate'
import { resolveSessionOptions, type PresenceShow, type SessionOptions, type SessionOptionsInput } from './config'
import {
  AuthError,
  isEndOfStream,
  isXMPPError,
  ProtocolError,
  SecurityError,
  TransportError,
} from './errors'
import {
  authRequest,
  bindRequest,
  initialPresence,
  serializeStanza,
  STREAM_CLOSE,
  streamHeader,
} from './encoder'
import { getDomain, splitAccountJid } from './jid'
import { logError, logInfo, logWarn } from './logger'
import {
  isTerminalState,
  negotiationMachine,
  type NegotiationActor,
  type NegotiationEvent,
  type NegotiationSnapshot,
  type NegotiationStateValue,
} from './negotiationMachine'
import { formatName, sameName } from './qname'
import { selectMechanism, type Credential } from './sasl'
import type { MessageStanza, OutgoingStanza, PresenceStanza, StreamFeatures } from './stanzas'
import { Dispatcher, STREAM_ROOT, type DecodedElement } from './stream/dispatcher'
import { StreamReader } from './stream/StreamReader'
import type { Transport } from './transport'
import { parseXMPPError } from '../utils/xmppError'

/** Stanzas {@link Session.recv} hands to the application */
export type ReceivedStanza = MessageStanza | PresenceStanza

export interface PresenceOptions {
  show?: PresenceShow
  status?: string
  /** e.g. 'unavailable', 'subscribe' */
  type?: string
  /** Directed presence target */
  to?: string
}

const EMPTY_FEATURES: StreamFeatures = {
  kind: 'features',
  mechanisms: [],
  bind: false,
  session: false,
  other: [],
  otherElements: [],
}

export class Session {
  private readonly options: SessionOptions
  private readonly dispatcher: Dispatcher
  private readonly actor: NegotiationActor
  private streamFeatures: StreamFeatures | null = null
  private readBusy = false
  private writeBusy = false
  /** Set once a read or write failed; the stream can no longer be trusted */
  private broken = false
  private closed = false

  /**
   * Wrap a transport. Use {@link Session.connect} to negotiate in one step;
   * the constructor alone is for callers that drive {@link negotiate}
   * themselves.
   */
  constructor(
    private readonly transport: Transport,
    options: SessionOptionsInput = {},
  ) {
    this.options = resolveSessionOptions(options)
    const reader = new StreamReader(transport, {
      root: STREAM_ROOT,
      onReceived: this.options.tee.received,
    })
    this.dispatcher = new Dispatcher(reader)
    this.actor = createActor(negotiationMachine).start()
  }

  /**
   * Negotiate a session on a connected transport.
   *
   * @throws ConfigError, ProtocolError, AuthError, SecurityError,
   * TransportError or TimeoutError; the transport is closed in every case
   */
  static async connect(
    transport: Transport,
    credential: Credential,
    options: SessionOptionsInput = {},
  ): Promise<Session> {
    const session = new Session(transport, options)
    try {
      await session.negotiate(credential)
    } catch (err) {
      logError(`Negotiation failed (${isXMPPError(err) ? err.code : 'unexpected error'})`)
      await session.abort()
      throw err
    }
    return session
  }

  /** Full JID assigned by the server, once bound */
  get jid(): string | null {
    return this.snapshot.context.jid
  }

  /** Current negotiation state */
  get state(): NegotiationSnapshot['value'] {
    return this.snapshot.value
  }

  /** Features of the current stream, or null before the first block arrived */
  get features(): StreamFeatures | null {
    return this.streamFeatures
  }

  private get snapshot(): NegotiationSnapshot {
    return this.actor.getSnapshot()
  }

  // ==========================================================================
  // Negotiation
  // ==========================================================================

  /**
   * Run the handshake on this session's transport. Does not close the
   * transport on failure; {@link Session.connect} does. After a failure the
   * session is unusable.
   *
   * @throws TransportError when the server closes the stream before the
   * session is ready
   */
  async negotiate(credential: Credential): Promise<void> {
    if (!this.snapshot.matches('disconnected')) {
      throw new ProtocolError('negotiation has already been started')
    }
    try {
      await this.handshake(credential)
    } catch (caught) {
      // A session that failed to negotiate never carries application traffic
      this.broken = true
      const err = isEndOfStream(caught) ? TransportError.endedDuringNegotiation(caught) : caught
      if (!isTerminalState(this.snapshot)) {
        this.actor.send({ type: 'FAIL', error: err instanceof Error ? err.message : String(err) })
      }
      throw err
    }
  }

  private async handshake(credential: Credential): Promise<void> {
    const { domain } = splitAccountJid(credential.jid)

    logInfo(`Opening stream to ${domain}`)
    await this.write(streamHeader(domain))
    this.advance({ type: 'OPEN_STREAM', domain }, 'streamOpened')
    await this.expectStreamRoot()
    this.advance({ type: 'STREAM_STARTED' }, 'awaitingFeatures')

    const features = await this.readFeatures()
    this.streamFeatures = features
    this.actor.send({ type: 'FEATURES', mechanisms: features.mechanisms })

    const choice = selectMechanism(features.mechanisms, { preferExternal: this.options.preferExternal }, credential)
    if (!this.transport.encrypted && !this.options.allowUnencryptedAuth) {
      throw SecurityError.unencryptedAuth()
    }
    logInfo(`Authenticating with ${choice.mechanism}`)
    await this.write(authRequest(choice.mechanism, choice.payload))
    this.advance({ type: 'AUTH_SENT', mechanism: choice.mechanism }, 'authSent')
    await this.readAuthOutcome()

    await this.write(streamHeader(domain, { declaration: false }))
    this.advance({ type: 'RESTART' }, 'streamRestarted')
    await this.expectStreamRoot()
    this.advance({ type: 'STREAM_STARTED' }, 'awaitingFeatures2')
    this.streamFeatures = await this.readSecondFeatures()

    await this.write(bindRequest(this.options.resource))
    this.advance({ type: 'BIND_SENT' }, 'bindSent')
    const jid = await this.readBindResult()
    this.advance({ type: 'BOUND', jid }, 'bound')
    logInfo(`Resource bound on ${getDomain(jid)}`)

    await this.write(initialPresence({ ...this.options.presence, lang: this.options.lang }))
    this.advance({ type: 'PRESENCE_SENT' }, 'presenceSent')
    this.advance({ type: 'READY' }, 'ready')
    logInfo('Session ready')
  }

  /** Send an event and require the machine to land in `expected`. */
  private advance(event: NegotiationEvent, expected: NegotiationStateValue): void {
    this.actor.send(event)
    if (!this.snapshot.matches(expected)) {
      throw new ProtocolError(`negotiation could not move to ${expected} on ${event.type}`)
    }
  }

  private async expectStreamRoot(): Promise<void> {
    const start = await this.read(() => this.dispatcher.nextStart())
    if (!sameName(start.name, STREAM_ROOT)) {
      throw ProtocolError.expected('<stream>', start.name)
    }
  }

  private async readFeatures(): Promise<StreamFeatures> {
    const { name, stanza } = await this.nextElement()
    if (stanza.kind !== 'features') {
      throw ProtocolError.expected('<features>', name)
    }
    return stanza
  }

  private async readAuthOutcome(): Promise<void> {
    const { name, stanza } = await this.nextElement()
    switch (stanza.kind) {
      case 'success':
        this.advance({ type: 'AUTH_SUCCESS' }, 'authenticated')
        return
      case 'failure':
        this.actor.send({ type: 'AUTH_FAILURE', condition: stanza.condition })
        throw AuthError.failure(stanza.condition)
      default:
        throw ProtocolError.expected('<success> or <failure>', name)
    }
  }

  /**
   * The post-restart features block. A block that fails to decode, or some
   * other element in its place, counts as no features.
   */
  private async readSecondFeatures(): Promise<StreamFeatures> {
    const decoded = await this.read(async () => {
      try {
        return await this.dispatcher.nextElement()
      } catch (err) {
        if (!(err instanceof ProtocolError)) throw err
        logWarn(`Ignoring unreadable features after restart: ${err.message}`)
        return null
      }
    })
    if (!decoded) return EMPTY_FEATURES
    if (decoded.stanza.kind !== 'features') {
      logWarn(`Expected <features> after restart, got ${formatName(decoded.name)}`)
      return EMPTY_FEATURES
    }
    return decoded.stanza
  }

  private async readBindResult(): Promise<string> {
    const { name, stanza } = await this.nextElement()
    if (stanza.kind !== 'iq') {
      throw ProtocolError.expected('<iq>', name)
    }
    if (stanza.type === 'error') {
      const condition = parseXMPPError(stanza)?.condition ?? 'undefined-condition'
      throw new ProtocolError(`resource binding failed: ${condition}`)
    }
    if (stanza.type !== 'result') {
      throw new ProtocolError(`expected <iq type='result'> but got type ${stanza.type ?? '(none)'}`)
    }
    const jid = stanza.bind?.jid
    if (!jid) {
      throw new ProtocolError('<iq> result missing <bind>')
    }
    return jid
  }

  // ==========================================================================
  // Receiving
  // ==========================================================================

  /**
   * Next decoded top-level element, whatever its kind.
   *
   * @throws EndOfStreamError when the server closed the transport between elements
   * @throws ProtocolError for malformed markup or an element not in the dispatch table
   */
  nextElement(): Promise<DecodedElement> {
    return this.read(() => this.dispatcher.nextElement())
  }

  /**
   * Next message or presence. Other kinds (iq, stream errors, ...) are
   * logged and dropped.
   *
   * @throws EndOfStreamError when the server closed the transport between elements
   */
  async recv(): Promise<ReceivedStanza> {
    for (;;) {
      const { name, stanza } = await this.nextElement()
      if (stanza.kind === 'message' || stanza.kind === 'presence') {
        return stanza
      }
      if (stanza.kind === 'stream-error') {
        logWarn(`Stream error from server: ${stanza.condition}`)
      } else {
        logInfo(`Discarding ${formatName(name)}`)
      }
    }
  }

  /** Messages and presence until the server closes the stream. */
  async *stanzas(): AsyncGenerator<ReceivedStanza, void, undefined> {
    for (;;) {
      let stanza: ReceivedStanza
      try {
        stanza = await this.recv()
      } catch (err) {
        if (isEndOfStream(err)) return
        throw err
      }
      yield stanza
    }
  }

  private async read<T>(operation: () => Promise<T>): Promise<T> {
    this.ensureUsable()
    if (this.readBusy) {
      throw TransportError.concurrent('read')
    }
    this.readBusy = true
    try {
      return await operation()
    } catch (err) {
      if (!isEndOfStream(err)) this.broken = true
      throw err
    } finally {
      this.readBusy = false
    }
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  /**
   * Write one stanza in a single transport write.
   *
   * @throws TransportError when the write fails; the session is unusable afterwards
   */
  async send(stanza: OutgoingStanza | Element): Promise<void> {
    this.ensureUsable()
    await this.write('kind' in stanza ? serializeStanza(stanza) : stanza.toString())
  }

  sendMessage(to: string, body: string, type = 'chat'): Promise<void> {
    return this.send({ kind: 'message', to, type, body })
  }

  sendPresence(options: PresenceOptions = {}): Promise<void> {
    return this.send({ kind: 'presence', ...options })
  }

  private async write(data: string): Promise<void> {
    this.ensureUsable()
    if (this.writeBusy) {
      throw TransportError.concurrent('write')
    }
    this.writeBusy = true
    try {
      await this.transport.write(data)
      this.options.tee.sent?.(data)
    } catch (err) {
      this.broken = true
      throw isXMPPError(err) ? err : TransportError.io('write', err)
    } finally {
      this.writeBusy = false
    }
  }

  private ensureUsable(): void {
    if (this.closed) throw TransportError.closed()
    if (this.broken) throw TransportError.unusable()
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  /**
   * Close the stream and the transport. `</stream:stream>` is written when
   * the session is still healthy; a failure to write it is only logged.
   */
  async close(): Promise<void> {
    if (this.closed) return
    if (!this.broken && !this.snapshot.matches('disconnected')) {
      try {
        await this.write(STREAM_CLOSE)
      } catch (err) {
        logWarn(`Could not write stream close: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
    this.closed = true
    try {
      await this.transport.close()
    } finally {
      this.actor.send({ type: 'CLOSE' })
    }
  }

  /** Close the transport after a failed handshake, keeping the original error. */
  private async abort(): Promise<void> {
    this.closed = true
    try {
      await this.transport.close()
    } catch (err) {
      logWarn(`Could not close transport: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
}
