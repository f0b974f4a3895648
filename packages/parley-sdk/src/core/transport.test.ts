import { PassThrough } from 'node:stream'
import { describe, it, expect, vi, afterEach } from 'vitest'
import { TimeoutError, TransportError } from './errors'
import { DEFAULT_PORT, SocketTransport, resolveServiceAddress } from './transport'

const text = (chunk: Uint8Array | null) => (chunk ? Buffer.from(chunk).toString('utf8') : chunk)

describe('SocketTransport', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should deliver buffered data to the next read', async () => {
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)
    socket.push('<stream:stream>')

    expect(text(await transport.read())).toBe('<stream:stream>')
  })

  it('should resolve a pending read when data arrives', async () => {
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)
    const read = transport.read()
    socket.push('<presence/>')

    expect(text(await read)).toBe('<presence/>')
  })

  it('should write through the socket', async () => {
    // A PassThrough hands written bytes back to its readable side
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)
    await transport.write('<message/>')

    expect(text(await transport.read())).toBe('<message/>')
  })

  it('should report a clean end of stream as null', async () => {
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)
    socket.push(null)

    expect(await transport.read()).toBeNull()
  })

  it('should reject a second read while one is pending', async () => {
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)
    const first = transport.read()

    await expect(transport.read()).rejects.toThrow(new TransportError('concurrent read on the same session'))
    socket.push('x')
    expect(text(await first)).toBe('x')
  })

  it('should turn socket errors into transport errors', async () => {
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)
    const read = transport.read()
    socket.destroy(new Error('connection reset'))

    await expect(read).rejects.toThrow(new TransportError('read failed: connection reset'))
    await expect(transport.write('<presence/>')).rejects.toThrow('read failed: connection reset')
  })

  it('should fail a read that outlives the deadline and destroy the socket', async () => {
    vi.useFakeTimers()
    const socket = new PassThrough()
    const transport = new SocketTransport(socket, { timeoutMs: 1000 })

    const assertion = expect(transport.read()).rejects.toBeInstanceOf(TimeoutError)
    vi.advanceTimersByTime(1000)
    await assertion

    expect(socket.destroyed).toBe(true)
  })

  it('should not time out when the deadline is disabled', async () => {
    vi.useFakeTimers()
    const socket = new PassThrough()
    const transport = new SocketTransport(socket)

    const read = transport.read()
    vi.advanceTimersByTime(60_000)
    socket.push('late')
    expect(text(await read)).toBe('late')
  })

  it('should refuse writes after close', async () => {
    const socket = new PassThrough()
    socket.resume()
    const transport = new SocketTransport(socket)
    await transport.close()

    expect(socket.destroyed).toBe(true)
    await expect(transport.write('<presence/>')).rejects.toThrow(TransportError.closed())
  })

  it('should pause the socket while too much is unread and resume on read', async () => {
    const socket = new PassThrough()
    const transport = new SocketTransport(socket, { maxBufferedBytes: 8 })
    socket.push('<a/>')
    socket.push('<presence/>')
    await new Promise((resolve) => setImmediate(resolve))

    expect(socket.isPaused()).toBe(true)
    expect(text(await transport.read())).toBe('<a/>')
    // 11 bytes still buffered
    expect(socket.isPaused()).toBe(true)
    expect(text(await transport.read())).toBe('<presence/>')
    expect(socket.isPaused()).toBe(false)
  })

  it('should count only TLS sockets as encrypted unless told otherwise', () => {
    expect(new SocketTransport(new PassThrough()).encrypted).toBe(false)
    expect(new SocketTransport(new PassThrough(), { encrypted: true }).encrypted).toBe(true)
  })
})

describe('resolveServiceAddress', () => {
  it.each([
    [undefined, 'alice@example.com', { host: 'example.com', port: DEFAULT_PORT }],
    ['   ', 'alice@example.com/laptop', { host: 'example.com', port: DEFAULT_PORT }],
    ['xmpp.example.net', 'alice@example.com', { host: 'xmpp.example.net', port: DEFAULT_PORT }],
    ['xmpp.example.net:5223', 'alice@example.com', { host: 'xmpp.example.net', port: 5223 }],
    ['xmpp.example.net:http', 'alice@example.com', { host: 'xmpp.example.net:http', port: DEFAULT_PORT }],
    ['xmpp.example.net:70000', 'alice@example.com', { host: 'xmpp.example.net:70000', port: DEFAULT_PORT }],
  ])('should resolve host %j for %s', (host, jid, expected) => {
    expect(resolveServiceAddress(host, jid)).toEqual(expected)
  })
})
