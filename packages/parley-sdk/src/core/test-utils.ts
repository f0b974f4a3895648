/**
 * Shared test utilities for stream and session tests
 */
import { TransportError } from './errors'
import type { Transport } from './transport'

export const NS_DECLS = `xmlns='jabber:client' xmlns:stream='http://etherx.jabber.org/streams'`

/** Server stream header as a server would send it */
export const serverHeader = (id: string, declaration = true): string =>
  (declaration ? `<?xml version='1.0'?>` : '') +
  `<stream:stream ${NS_DECLS} id='${id}' from='example.com' version='1.0'>`

export const PLAIN_FEATURES =
  `<stream:features><mechanisms xmlns='urn:ietf:params:xml:ns:xmpp-sasl'>` +
  `<mechanism>PLAIN</mechanism></mechanisms></stream:features>`

export const BIND_FEATURES =
  `<stream:features><bind xmlns='urn:ietf:params:xml:ns:xmpp-bind'/></stream:features>`

export const SASL_SUCCESS = `<success xmlns='urn:ietf:params:xml:ns:xmpp-sasl'/>`

export const bindResult = (jid: string): string =>
  `<iq type='result' id='x'><bind xmlns='urn:ietf:params:xml:ns:xmpp-bind'><jid>${jid}</jid></bind></iq>`

/**
 * Server replies for a complete PLAIN negotiation, one per client write:
 * stream header, auth, restart header, bind request, initial presence.
 */
export const happyPathReplies = (jid = 'alice@example.com/parley'): string[] => [
  serverHeader('s1') + PLAIN_FEATURES,
  SASL_SUCCESS,
  serverHeader('s2', false) + BIND_FEATURES,
  bindResult(jid),
  '',
]

export interface ScriptedTransportOptions {
  encrypted?: boolean
  /** Server text available before the first write */
  initial?: string
  /** Server text delivered after each client write, in order */
  replies?: string[]
  /** Keep reads pending once everything is delivered, until feed() or end() */
  keepOpen?: boolean
  /** Zero-based index of the write that fails */
  failWrite?: number
  /** Split server text into chunks of at most this many bytes */
  chunkSize?: number
}

/**
 * In-process {@link Transport} double that plays a scripted server.
 *
 * Every client write is recorded and answered with the next scripted reply.
 * Once drained, reads report a clean end of stream unless `keepOpen` is set.
 */
export class ScriptedTransport implements Transport {
  readonly encrypted: boolean
  readonly writes: string[] = []
  closed = false
  private readonly replies: string[]
  private readonly inbound: Uint8Array[] = []
  private readonly keepOpen: boolean
  private readonly failWrite: number | undefined
  private readonly chunkSize: number
  private ended = false
  private failed = false
  private waiting: ((chunk: Uint8Array | null) => void) | null = null

  constructor(options: ScriptedTransportOptions = {}) {
    this.encrypted = options.encrypted ?? true
    this.replies = options.replies ?? []
    this.keepOpen = options.keepOpen ?? false
    this.failWrite = options.failWrite
    this.chunkSize = options.chunkSize ?? Number.MAX_SAFE_INTEGER
    if (options.initial) this.feed(options.initial)
  }

  /** Everything the client wrote, concatenated */
  get written(): string {
    return this.writes.join('')
  }

  read(): Promise<Uint8Array | null> {
    const chunk = this.inbound.shift()
    if (chunk) return Promise.resolve(chunk)
    if (this.ended || !this.keepOpen) return Promise.resolve(null)
    return new Promise((resolve) => {
      this.waiting = resolve
    })
  }

  write(data: string): Promise<void> {
    if (this.closed) return Promise.reject(TransportError.closed())
    const index = this.writes.length + (this.failed ? 1 : 0)
    if (index === this.failWrite) {
      this.failed = true
      return Promise.reject(new Error('connection reset'))
    }
    this.writes.push(data)
    const reply = this.replies[index]
    if (reply) this.feed(reply)
    return Promise.resolve()
  }

  close(): Promise<void> {
    this.closed = true
    this.end()
    return Promise.resolve()
  }

  /** Deliver server text now. */
  feed(text: string): void {
    const bytes = Buffer.from(text, 'utf8')
    for (let offset = 0; offset < bytes.length; offset += this.chunkSize) {
      this.inbound.push(bytes.subarray(offset, offset + this.chunkSize))
    }
    this.wake()
  }

  /** Close the server side cleanly. */
  end(): void {
    this.ended = true
    this.wake()
  }

  private wake(): void {
    const waiting = this.waiting
    if (!waiting) return
    const chunk = this.inbound.shift()
    if (chunk) {
      this.waiting = null
      waiting(chunk)
    } else if (this.ended) {
      this.waiting = null
      waiting(null)
    }
  }
}
