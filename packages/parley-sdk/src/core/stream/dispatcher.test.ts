import { describe, it, expect } from 'vitest'
import { ProtocolError } from '../errors'
import { NS_BIND, NS_CLIENT, NS_SASL, NS_STREAM, NS_TLS } from '../namespaces'
import { qname } from '../qname'
import { NS_DECLS, ScriptedTransport } from '../test-utils'
import { Dispatcher, STREAM_ROOT, isKnownElement } from './dispatcher'
import { StreamReader } from './StreamReader'

const OPEN = `<stream:stream ${NS_DECLS}>`

function dispatcherFor(body: string): Dispatcher {
  const transport = new ScriptedTransport({ initial: OPEN + body })
  return new Dispatcher(new StreamReader(transport, { root: STREAM_ROOT }))
}

/** Dispatcher positioned after the stream root */
async function openDispatcher(body: string): Promise<Dispatcher> {
  const dispatcher = dispatcherFor(body)
  const { stanza } = await dispatcher.nextElement()
  expect(stanza.kind).toBe('stream')
  return dispatcher
}

describe('Dispatcher', () => {
  describe('dispatch table', () => {
    it.each([
      [NS_STREAM, 'stream'],
      [NS_STREAM, 'features'],
      [NS_STREAM, 'error'],
      [NS_TLS, 'starttls'],
      [NS_TLS, 'proceed'],
      [NS_TLS, 'failure'],
      [NS_SASL, 'mechanisms'],
      [NS_SASL, 'challenge'],
      [NS_SASL, 'response'],
      [NS_SASL, 'abort'],
      [NS_SASL, 'success'],
      [NS_SASL, 'failure'],
      [NS_BIND, 'bind'],
      [NS_CLIENT, 'message'],
      [NS_CLIENT, 'presence'],
      [NS_CLIENT, 'iq'],
      [NS_CLIENT, 'error'],
    ])('should know {%s}%s', (space, local) => {
      expect(isKnownElement(qname(space, local))).toBe(true)
    })

    it('should not know names from other namespaces', () => {
      expect(isKnownElement(qname(NS_CLIENT, 'features'))).toBe(false)
      expect(isKnownElement(qname(NS_SASL, 'message'))).toBe(false)
    })
  })

  describe('nextElement', () => {
    it('should return the stream root as soon as its start tag is read', async () => {
      const dispatcher = dispatcherFor('')
      const decoded = await dispatcher.nextElement()
      expect(decoded.name).toEqual(STREAM_ROOT)
      expect(decoded.stanza).toEqual({
        kind: 'stream',
        from: undefined,
        id: undefined,
        version: undefined,
        lang: undefined,
      })
    })

    it('should fail on an unknown element naming exactly its namespace and local name', async () => {
      const dispatcher = await openDispatcher(`<foo xmlns='urn:example:unknown'/>`)
      const err = await dispatcher.nextElement().catch((e: unknown) => e)
      expect(err).toBeInstanceOf(ProtocolError)
      expect(err).toHaveProperty('message', 'unexpected XMPP message urn:example:unknown <foo/>')
      expect(err).toHaveProperty('element', { space: 'urn:example:unknown', local: 'foo' })
    })

    it('should fail on a known local name in the wrong namespace', async () => {
      const dispatcher = await openDispatcher(`<features/>`)
      await expect(dispatcher.nextElement()).rejects.toThrow(
        'unexpected XMPP message jabber:client <features/>',
      )
    })

    it('should skip whitespace and stray text between elements', async () => {
      const dispatcher = await openDispatcher(`\n  <presence/>\n  <iq type='get'/>`)
      expect((await dispatcher.nextElement()).stanza.kind).toBe('presence')
      expect((await dispatcher.nextElement()).stanza.kind).toBe('iq')
    })

    it('should capture inner markup exactly as received', async () => {
      const inner = `\n  <body>a &amp; b</body><x xmlns='urn:example:x' k="v"><![CDATA[<y>]]></x>\n`
      const dispatcher = await openDispatcher(`<message>${inner}</message>`)
      const { element } = await dispatcher.nextElement()
      expect(element.innerXml).toBe(inner)
      const [, body, x] = element.children
      expect(body).toMatchObject({ innerXml: 'a &amp; b', children: ['a & b'] })
      expect(x).toMatchObject({ innerXml: '<![CDATA[<y>]]>', children: ['<y>'] })
    })

    it('should give self-closing elements empty inner markup', async () => {
      const dispatcher = await openDispatcher(`<presence/>`)
      const { element } = await dispatcher.nextElement()
      expect(element.innerXml).toBe('')
      expect(element.children).toEqual([])
    })

    it('should fail when the stream ends inside an element', async () => {
      const dispatcher = await openDispatcher(`<message><body>hi</body>`)
      await expect(dispatcher.nextElement()).rejects.toThrow(
        new ProtocolError('unexpected end of stream inside <message>'),
      )
    })

    it('should fail when the stream restarts inside an element', async () => {
      const dispatcher = await openDispatcher(`<message><stream:stream ${NS_DECLS}>`)
      await expect(dispatcher.nextElement()).rejects.toThrow(
        'malformed XML in {jabber:client}message: stream restarted inside an element',
      )
    })
  })

  describe('nextStart', () => {
    it('should skip end tags and text up to the next start tag', async () => {
      const dispatcher = dispatcherFor(`<a>text</a><b/>`)
      await dispatcher.nextStart()
      await dispatcher.nextStart()
      const start = await dispatcher.nextStart()
      expect(start.prefixed).toBe('b')
    })
  })
})
