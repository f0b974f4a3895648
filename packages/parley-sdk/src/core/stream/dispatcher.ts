/**
 * Qualified-name dispatcher.
 *
 * Reads whole top-level elements off a {@link StreamReader} and decodes them
 * through a fixed table keyed by (namespace, local name). Anything not in the
 * table fails the read: silently skipping unknown elements would hide a
 * desynchronized stream.
 *
 * @module Core/Stream/Dispatcher
 */
import { isEndOfStream, ProtocolError } from '../errors'
import { NS_BIND, NS_CLIENT, NS_SASL, NS_STREAM, NS_TLS } from '../namespaces'
import { qname, QNameMap, sameName, type QualifiedName } from '../qname'
import {
  decodeBind,
  decodeChallenge,
  decodeClientError,
  decodeFeatures,
  decodeIq,
  decodeMechanisms,
  decodeMessage,
  decodePresence,
  decodeResponse,
  decodeSaslAbort,
  decodeSaslFailure,
  decodeStartTls,
  decodeStreamError,
  decodeStreamHeader,
  decodeSuccess,
  decodeTlsFailure,
  decodeTlsProceed,
  type Stanza,
} from '../stanzas'
import type { XmlElement } from './element'
import type { StreamReader, XmlToken } from './StreamReader'

export type StartToken = Extract<XmlToken, { kind: 'start' }>

type Decoder = (el: XmlElement) => Stanza

/** Qualified name of the stream root element */
export const STREAM_ROOT = qname(NS_STREAM, 'stream')

const DECODERS = new QNameMap<Decoder>()
  .set(STREAM_ROOT, decodeStreamHeader)
  .set(qname(NS_STREAM, 'features'), decodeFeatures)
  .set(qname(NS_STREAM, 'error'), decodeStreamError)
  .set(qname(NS_TLS, 'starttls'), decodeStartTls)
  .set(qname(NS_TLS, 'proceed'), decodeTlsProceed)
  .set(qname(NS_TLS, 'failure'), decodeTlsFailure)
  .set(qname(NS_SASL, 'mechanisms'), decodeMechanisms)
  .set(qname(NS_SASL, 'challenge'), decodeChallenge)
  .set(qname(NS_SASL, 'response'), decodeResponse)
  .set(qname(NS_SASL, 'abort'), decodeSaslAbort)
  .set(qname(NS_SASL, 'success'), decodeSuccess)
  .set(qname(NS_SASL, 'failure'), decodeSaslFailure)
  .set(qname(NS_BIND, 'bind'), decodeBind)
  .set(qname(NS_CLIENT, 'message'), decodeMessage)
  .set(qname(NS_CLIENT, 'presence'), decodePresence)
  .set(qname(NS_CLIENT, 'iq'), decodeIq)
  .set(qname(NS_CLIENT, 'error'), decodeClientError)

/** Whether the dispatcher can decode elements with this name. */
export function isKnownElement(name: QualifiedName): boolean {
  return DECODERS.has(name)
}

export interface DecodedElement {
  name: QualifiedName
  stanza: Stanza
  /** The element as read; for the stream root, only its start tag */
  element: XmlElement
}

export class Dispatcher {
  constructor(readonly reader: StreamReader) {}

  /**
   * Skip character data and end tags up to the next start tag.
   *
   * Text consumed before it is released, so only the element that follows
   * stays sliceable.
   */
  async nextStart(): Promise<StartToken> {
    for (;;) {
      this.reader.release()
      const token = await this.reader.next()
      if (token.kind === 'start') return token
    }
  }

  /**
   * Read the rest of an element whose start tag has been consumed.
   *
   * @throws ProtocolError when the stream ends or restarts inside the element
   */
  async readElement(start: StartToken): Promise<XmlElement> {
    const element: XmlElement = {
      name: start.name,
      prefixed: start.prefixed,
      declarations: Object.fromEntries(start.declarations),
      attrs: start.attrs,
      children: [],
      innerXml: '',
    }
    for (;;) {
      const token = await this.nextInside(start.name)
      switch (token.kind) {
        case 'text':
          element.children.push(token.text)
          break
        case 'start':
          if (sameName(token.name, STREAM_ROOT)) {
            throw ProtocolError.malformed('stream restarted inside an element', start.name)
          }
          element.children.push(await this.readElement(token))
          break
        case 'end':
          element.innerXml = this.reader.slice(start.end, token.start)
          return element
      }
    }
  }

  /**
   * Read and decode the next top-level element.
   *
   * The stream root is returned as soon as its start tag is read.
   *
   * @throws ProtocolError for an element not in the dispatch table
   */
  async nextElement(): Promise<DecodedElement> {
    const start = await this.nextStart()
    const decode = DECODERS.get(start.name)
    if (!decode) {
      throw ProtocolError.unexpectedElement(start.name)
    }
    const element: XmlElement = sameName(start.name, STREAM_ROOT)
      ? {
          name: start.name,
          prefixed: start.prefixed,
          declarations: Object.fromEntries(start.declarations),
          attrs: start.attrs,
          children: [],
          innerXml: '',
        }
      : await this.readElement(start)
    return { name: start.name, stanza: decode(element), element }
  }

  private async nextInside(parent: QualifiedName): Promise<XmlToken> {
    try {
      return await this.reader.next()
    } catch (err) {
      if (isEndOfStream(err)) throw ProtocolError.unexpectedEnd(parent)
      throw err
    }
  }
}
