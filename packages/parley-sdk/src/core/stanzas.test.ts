import { describe, it, expect } from 'vitest'
import { NS_CLIENT } from './namespaces'
import type { Stanza } from './stanzas'
import { Dispatcher, STREAM_ROOT } from './stream/dispatcher'
import { StreamReader } from './stream/StreamReader'
import { NS_DECLS, ScriptedTransport } from './test-utils'

/** Decode the first element after a stream header. */
async function decode(markup: string): Promise<Stanza> {
  const transport = new ScriptedTransport({ initial: `<stream:stream ${NS_DECLS}>${markup}` })
  const dispatcher = new Dispatcher(new StreamReader(transport, { root: STREAM_ROOT }))
  await dispatcher.nextElement()
  return (await dispatcher.nextElement()).stanza
}

const ERROR_MESSAGE = `<message xmlns="jabber:client" id="3" type="error" to="123456789@gcm.googleapis.com/ABC">
\t<gcm xmlns="google:mobile:data">
\t\t{"random": "&lt;text&gt;"}
\t</gcm>
\t<error code="400" type="modify">
\t\t<bad-request xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/>
\t\t<text xmlns="urn:ietf:params:xml:ns:xmpp-stanzas">
\t\t\tInvalidJson: JSON_PARSING_ERROR : Missing Required Field: message_id
\t\t</text>
\t</error>
</message>`

describe('stanza decoding', () => {
  describe('message', () => {
    it('should capture unmodeled children as text and raw markup', async () => {
      const stanza = await decode(ERROR_MESSAGE)
      expect(stanza).toMatchObject({
        kind: 'message',
        id: '3',
        type: 'error',
        to: '123456789@gcm.googleapis.com/ABC',
        from: undefined,
        body: undefined,
        other: ['\n\t\t{"random": "<text>"}\n\t', '\n\t\t\n\t\t\n\t'],
      })
      if (stanza.kind !== 'message') throw new Error('expected a message')
      expect(stanza.otherElements).toEqual([
        {
          name: { space: 'google:mobile:data', local: 'gcm' },
          prefixed: 'gcm',
          declarations: { '': 'google:mobile:data' },
          attrs: [],
          innerXml: '\n\t\t{"random": "&lt;text&gt;"}\n\t',
        },
        {
          name: { space: NS_CLIENT, local: 'error' },
          prefixed: 'error',
          declarations: {},
          attrs: [
            { name: { space: '', local: 'code' }, prefixed: 'code', value: '400' },
            { name: { space: '', local: 'type' }, prefixed: 'type', value: 'modify' },
          ],
          innerXml:
            '\n\t\t<bad-request xmlns="urn:ietf:params:xml:ns:xmpp-stanzas"/>' +
            '\n\t\t<text xmlns="urn:ietf:params:xml:ns:xmpp-stanzas">' +
            '\n\t\t\tInvalidJson: JSON_PARSING_ERROR : Missing Required Field: message_id' +
            '\n\t\t</text>\n\t',
        },
      ])
    })

    it('should decode modeled fields and xml:lang', async () => {
      const stanza = await decode(
        `<message from='bob@example.com/phone' type='chat' xml:lang='fr'>` +
          `<subject>Re: lunch</subject><body>fish &amp; chips</body><thread>t1</thread></message>`,
      )
      expect(stanza).toEqual({
        kind: 'message',
        from: 'bob@example.com/phone',
        id: undefined,
        to: undefined,
        type: 'chat',
        lang: 'fr',
        subject: 'Re: lunch',
        body: 'fish & chips',
        thread: 't1',
        other: [],
        otherElements: [],
      })
    })
  })

  describe('presence', () => {
    it('should decode show, status, priority and error', async () => {
      const stanza = await decode(
        `<presence from='bob@example.com/phone' type='error'>` +
          `<show>away</show><status>Out to lunch</status><priority>5</priority>` +
          `<error type='cancel'><remote-server-not-found xmlns='urn:ietf:params:xml:ns:xmpp-stanzas'/></error>` +
          `<c xmlns='http://jabber.org/protocol/caps' ver='abc'/>` +
          `</presence>`,
      )
      expect(stanza).toMatchObject({
        kind: 'presence',
        from: 'bob@example.com/phone',
        type: 'error',
        show: 'away',
        status: 'Out to lunch',
        priority: '5',
        error: { kind: 'error', type: 'cancel', condition: 'remote-server-not-found', text: undefined },
        other: [''],
        otherElements: [{ name: { space: 'http://jabber.org/protocol/caps', local: 'c' }, innerXml: '' }],
      })
    })
  })

  describe('iq', () => {
    it('should decode a bind result', async () => {
      const stanza = await decode(
        `<iq type='result' id='x'><bind xmlns='urn:ietf:params:xml:ns:xmpp-bind'>` +
          `<jid> alice@example.com/parley </jid></bind></iq>`,
      )
      expect(stanza).toMatchObject({
        kind: 'iq',
        type: 'result',
        id: 'x',
        bind: { kind: 'bind', jid: 'alice@example.com/parley', resource: undefined },
        other: [],
      })
    })

    it('should decode an error with its text', async () => {
      const stanza = await decode(
        `<iq type='error' id='x'><error type='cancel'>` +
          `<conflict xmlns='urn:ietf:params:xml:ns:xmpp-stanzas'/>` +
          `<text xmlns='urn:ietf:params:xml:ns:xmpp-stanzas'>Resource in use</text></error></iq>`,
      )
      expect(stanza).toMatchObject({
        kind: 'iq',
        error: { type: 'cancel', condition: 'conflict', text: 'Resource in use' },
        bind: undefined,
      })
    })
  })

  describe('stream elements', () => {
    it('should decode features', async () => {
      const stanza = await decode(
        `<stream:features>` +
          `<starttls xmlns='urn:ietf:params:xml:ns:xmpp-tls'><required/></starttls>` +
          `<mechanisms xmlns='urn:ietf:params:xml:ns:xmpp-sasl'>` +
          `<mechanism> EXTERNAL </mechanism><mechanism>PLAIN</mechanism></mechanisms>` +
          `<bind xmlns='urn:ietf:params:xml:ns:xmpp-bind'/>` +
          `<session xmlns='urn:ietf:params:xml:ns:xmpp-session'/>` +
          `<sm xmlns='urn:xmpp:sm:3'/>` +
          `</stream:features>`,
      )
      expect(stanza).toEqual({
        kind: 'features',
        startTls: { required: true },
        mechanisms: ['EXTERNAL', 'PLAIN'],
        bind: true,
        session: true,
        other: [''],
        otherElements: [
          {
            name: { space: 'urn:xmpp:sm:3', local: 'sm' },
            prefixed: 'sm',
            declarations: { '': 'urn:xmpp:sm:3' },
            attrs: [],
            innerXml: '',
          },
        ],
      })
    })

    it('should decode a stream error', async () => {
      const stanza = await decode(
        `<stream:error><host-unknown xmlns='urn:ietf:params:xml:ns:xmpp-streams'/>` +
          `<text xmlns='urn:ietf:params:xml:ns:xmpp-streams'>no such host</text></stream:error>`,
      )
      expect(stanza).toEqual({ kind: 'stream-error', condition: 'host-unknown', text: 'no such host' })
    })

    it('should decode a SASL failure condition', async () => {
      const stanza = await decode(`<failure xmlns='urn:ietf:params:xml:ns:xmpp-sasl'><not-authorized/></failure>`)
      expect(stanza).toEqual({ kind: 'failure', condition: 'not-authorized', text: undefined })
    })

    it('should decode SASL success with and without data', async () => {
      expect(await decode(`<success xmlns='urn:ietf:params:xml:ns:xmpp-sasl'/>`)).toEqual({
        kind: 'success',
        data: undefined,
      })
      expect(await decode(`<success xmlns='urn:ietf:params:xml:ns:xmpp-sasl'>dj1h</success>`)).toEqual({
        kind: 'success',
        data: 'dj1h',
      })
    })

    it('should decode a SASL challenge', async () => {
      expect(await decode(`<challenge xmlns='urn:ietf:params:xml:ns:xmpp-sasl'> cmVhbG0= </challenge>`)).toEqual({
        kind: 'challenge',
        data: 'cmVhbG0=',
      })
    })

    it('should decode TLS proceed', async () => {
      expect(await decode(`<proceed xmlns='urn:ietf:params:xml:ns:xmpp-tls'/>`)).toEqual({ kind: 'tls-proceed' })
    })
  })
})
