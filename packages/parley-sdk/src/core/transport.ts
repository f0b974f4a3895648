/**
 * Transport adapter.
 *
 * The stream engine only needs a connected, optionally encrypted duplex byte
 * stream. {@link Transport} is that contract; {@link SocketTransport} adapts
 * any Node `Duplex` (a `net.Socket`, a `tls.TLSSocket`, a proxy tunnel) to it
 * and owns the read/write deadline.
 *
 * @module Core/Transport
 */
import type { Duplex } from 'node:stream'
import { connect as tlsConnect, TLSSocket, type ConnectionOptions } from 'node:tls'
import { TimeoutError, TransportError, type XMPPError } from './errors'
import { getDomain } from './jid'
import { logInfo } from './logger'

/** Default client-to-server port (RFC 3920 §15.9) */
export const DEFAULT_PORT = 5222

const DEFAULT_MAX_BUFFERED_BYTES = 64 * 1024

export interface Transport {
  /** Resolves with the next chunk of bytes, or `null` once the peer closed cleanly. */
  read(): Promise<Uint8Array | null>
  /** Writes `data` as UTF-8 in a single call to the underlying stream. */
  write(data: string): Promise<void>
  close(): Promise<void>
  /** Whether the byte stream is protected by TLS */
  readonly encrypted: boolean
}

export interface SocketTransportOptions {
  /**
   * Overrides encryption detection. By default a `TLSSocket` counts as
   * encrypted and anything else does not.
   */
  encrypted?: boolean
  /**
   * Deadline for each read or write in milliseconds. An operation still in
   * flight when it expires fails with `TimeoutError` and the socket is
   * destroyed. 0 disables the deadline.
   */
  timeoutMs?: number
  /**
   * Unread bytes held before the socket is paused. Reading resumes it.
   * Defaults to 64 KiB.
   */
  maxBufferedBytes?: number
}

interface PendingRead {
  resolve: (chunk: Uint8Array | null) => void
  reject: (err: XMPPError) => void
}

/**
 * {@link Transport} over a Node `Duplex`.
 *
 * @example
 * ```typescript
 * const socket = tls.connect({ host: 'example.com', port: 5222 })
 * const transport = new SocketTransport(socket, { timeoutMs: 30_000 })
 * ```
 */
export class SocketTransport implements Transport {
  readonly encrypted: boolean
  private readonly timeoutMs: number
  private readonly maxBufferedBytes: number
  private readonly chunks: Uint8Array[] = []
  private bufferedBytes = 0
  private paused = false
  private pending: PendingRead | null = null
  private ended = false
  private failure: XMPPError | null = null

  constructor(private readonly socket: Duplex, options: SocketTransportOptions = {}) {
    this.encrypted = options.encrypted ?? socket instanceof TLSSocket
    this.timeoutMs = options.timeoutMs ?? 0
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES

    socket.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk
      this.chunks.push(bytes)
      this.bufferedBytes += bytes.length
      if (this.bufferedBytes > this.maxBufferedBytes && !this.paused) {
        this.paused = true
        socket.pause()
      }
      this.settle()
    })
    socket.on('end', () => {
      this.ended = true
      this.settle()
    })
    socket.on('close', () => {
      this.ended = true
      this.settle()
    })
    socket.on('error', (err: Error) => {
      this.failure ??= TransportError.io('read', err)
      this.settle()
    })
  }

  read(): Promise<Uint8Array | null> {
    if (this.pending) {
      return Promise.reject(TransportError.concurrent('read'))
    }
    return new Promise<Uint8Array | null>((resolve, reject) => {
      const timer = this.armDeadline(() => {
        this.pending = null
        reject(this.expire())
      })
      this.pending = {
        resolve: (chunk) => {
          clearDeadline(timer)
          resolve(chunk)
        },
        reject: (err) => {
          clearDeadline(timer)
          reject(err)
        },
      }
      this.settle()
    })
  }

  write(data: string): Promise<void> {
    if (this.failure) return Promise.reject(this.failure)
    if (this.socket.destroyed || this.socket.writableEnded) {
      return Promise.reject(TransportError.closed())
    }
    return new Promise<void>((resolve, reject) => {
      let done = false
      const timer = this.armDeadline(() => {
        done = true
        reject(this.expire())
      })
      this.socket.write(data, 'utf8', (err?: Error | null) => {
        clearDeadline(timer)
        if (done) return
        done = true
        if (err) {
          reject(TransportError.io('write', err))
        } else {
          resolve()
        }
      })
    })
  }

  close(): Promise<void> {
    if (this.socket.destroyed) return Promise.resolve()
    return new Promise<void>((resolve) => {
      this.socket.end(() => {
        this.socket.destroy()
        resolve()
      })
    })
  }

  /** Hands buffered data, end-of-stream or a failure to the waiting reader. */
  private settle(): void {
    const pending = this.pending
    if (!pending) return

    const chunk = this.chunks.shift()
    if (chunk) {
      this.pending = null
      this.bufferedBytes -= chunk.length
      if (this.paused && this.bufferedBytes <= this.maxBufferedBytes) {
        this.paused = false
        this.socket.resume()
      }
      pending.resolve(chunk)
    } else if (this.failure) {
      this.pending = null
      pending.reject(this.failure)
    } else if (this.ended) {
      this.pending = null
      pending.resolve(null)
    }
  }

  private armDeadline(onExpire: () => void): ReturnType<typeof setTimeout> | null {
    if (this.timeoutMs <= 0) return null
    return setTimeout(onExpire, this.timeoutMs)
  }

  private expire(): TimeoutError {
    const err = new TimeoutError(this.timeoutMs)
    this.failure ??= err
    this.socket.destroy()
    return err
  }
}

function clearDeadline(timer: ReturnType<typeof setTimeout> | null): void {
  if (timer) clearTimeout(timer)
}

// ============================================================================
// Dialing
// ============================================================================

export interface ServiceAddress {
  host: string
  port: number
}

/**
 * Resolve the address to dial.
 *
 * `host` may be `hostname` or `hostname:port`. When it is blank the domain of
 * the account JID is used. The port defaults to {@link DEFAULT_PORT}.
 */
export function resolveServiceAddress(host: string | undefined, jid: string): ServiceAddress {
  let target = host?.trim() ?? ''
  if (!target) {
    target = getDomain(jid)
  }
  const colonIndex = target.lastIndexOf(':')
  if (colonIndex > 0) {
    const port = Number(target.substring(colonIndex + 1))
    if (Number.isInteger(port) && port > 0 && port < 65536) {
      return { host: target.substring(0, colonIndex), port }
    }
  }
  return { host: target, port: DEFAULT_PORT }
}

export interface DialOptions {
  /** Account JID, used for the host when `host` is blank */
  jid: string
  /** `hostname` or `hostname:port` */
  host?: string
  /** Extra TLS options (CA, client certificate for SASL EXTERNAL, ...) */
  tls?: ConnectionOptions
  timeoutMs?: number
}

/**
 * Open a direct TLS connection and wrap it as a {@link Transport}.
 *
 * The server certificate is verified against the host name being dialed.
 */
export function dialTls(options: DialOptions): Promise<SocketTransport> {
  const { host, port } = resolveServiceAddress(options.host, options.jid)
  logInfo(`Dialing ${host}:${port}`)

  return new Promise<SocketTransport>((resolve, reject) => {
    const socket = tlsConnect({ ...options.tls, host, port, servername: host })
    const onError = (err: Error) => {
      reject(TransportError.io('read', err))
    }
    socket.once('error', onError)
    socket.once('secureConnect', () => {
      socket.removeListener('error', onError)
      resolve(new SocketTransport(socket, { timeoutMs: options.timeoutMs }))
    })
  })
}
