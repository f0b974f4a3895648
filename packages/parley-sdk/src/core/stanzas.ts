/**
 * Stanza model and the decoders that build it from element trees.
 *
 * Every element the dispatcher knows decodes to one member of the
 * {@link Stanza} union. Message, presence and iq keep what they do not model:
 * `other` holds the character data directly inside each unmodeled child and
 * `otherElements` the child itself with its original inner markup.
 *
 * @module Core/Stanzas
 */
import { NS_BIND, NS_SASL, NS_STREAMS_ERRORS, NS_TLS, NS_XML, NS_XMPP_STANZAS } from './namespaces'
import {
  attribute,
  childElements,
  childText,
  directText,
  findChild,
  toRawElement,
  type XmlElement,
  type XmlRawElement,
} from './stream/element'

// ============================================================================
// Types
// ============================================================================

/** Opening tag of the stream root; its content is the rest of the stream. */
export interface StreamHeader {
  kind: 'stream'
  from?: string
  id?: string
  version?: string
  lang?: string
}

export interface StreamFeatures {
  kind: 'features'
  /** Present when the server offers STARTTLS */
  startTls?: { required: boolean }
  /** SASL mechanism names, whitespace trimmed */
  mechanisms: string[]
  /** Resource binding advertised */
  bind: boolean
  /** Session establishment advertised */
  session: boolean
  other: string[]
  otherElements: XmlRawElement[]
}

export interface StreamErrorStanza {
  kind: 'stream-error'
  /** Defined condition, e.g. 'host-unknown' */
  condition: string
  text?: string
}

export interface StartTlsStanza { kind: 'starttls'; required: boolean }
export interface TlsProceedStanza { kind: 'tls-proceed' }
export interface TlsFailureStanza { kind: 'tls-failure' }

export interface MechanismsStanza {
  kind: 'mechanisms'
  mechanisms: string[]
}

export interface SaslChallenge { kind: 'challenge'; data: string }
export interface SaslResponse { kind: 'response'; data: string }
export interface SaslAbort { kind: 'abort' }
export interface SaslSuccess { kind: 'success'; data?: string }

export interface SaslFailure {
  kind: 'failure'
  /** Local name of the first child, e.g. 'not-authorized' */
  condition: string
  text?: string
}

export interface BindStanza {
  kind: 'bind'
  resource?: string
  jid?: string
}

/** `<error>` inside a client stanza (RFC 3920 §9.3). */
export interface ClientError {
  kind: 'error'
  code?: string
  type?: string
  /** First child in the stanza error namespace other than `text` */
  condition?: string
  text?: string
}

interface StanzaCommon {
  from?: string
  id?: string
  to?: string
  type?: string
}

export interface MessageStanza extends StanzaCommon {
  kind: 'message'
  /** `xml:lang` */
  lang?: string
  subject?: string
  body?: string
  thread?: string
  other: string[]
  otherElements: XmlRawElement[]
}

export interface PresenceStanza extends StanzaCommon {
  kind: 'presence'
  lang?: string
  show?: string
  status?: string
  priority?: string
  error?: ClientError
  other: string[]
  otherElements: XmlRawElement[]
}

export interface IqStanza extends StanzaCommon {
  kind: 'iq'
  error?: ClientError
  bind?: BindStanza
  other: string[]
  otherElements: XmlRawElement[]
}

export type Stanza =
  | StreamHeader
  | StreamFeatures
  | StreamErrorStanza
  | StartTlsStanza
  | TlsProceedStanza
  | TlsFailureStanza
  | MechanismsStanza
  | SaslChallenge
  | SaslResponse
  | SaslAbort
  | SaslSuccess
  | SaslFailure
  | BindStanza
  | MessageStanza
  | PresenceStanza
  | IqStanza
  | ClientError

export type StanzaKind = Stanza['kind']

/** Stanzas an application exchanges once the session is ready. */
export type ClientStanza = MessageStanza | PresenceStanza | IqStanza

/** Distributive `Omit` that keeps the union discriminated. */
type OmitUnion<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/**
 * Stanza values accepted by `Session.send`: the unmodeled child lists may be
 * left out.
 */
export type OutgoingStanza = OmitUnion<ClientStanza, 'other' | 'otherElements'> & {
  other?: string[]
  otherElements?: XmlRawElement[]
}

// ============================================================================
// Decoders
// ============================================================================

interface Unmodeled {
  other: string[]
  otherElements: XmlRawElement[]
}

/** Children whose local name is not in `modeled`, captured as text and raw markup. */
function collectUnmodeled(el: XmlElement, modeled: ReadonlySet<string>): Unmodeled {
  const rest = childElements(el).filter((child) => !modeled.has(child.name.local))
  return {
    other: rest.map(directText),
    otherElements: rest.map(toRawElement),
  }
}

function common(el: XmlElement): StanzaCommon {
  return {
    from: attribute(el, 'from'),
    id: attribute(el, 'id'),
    to: attribute(el, 'to'),
    type: attribute(el, 'type'),
  }
}

function optionalText(el: XmlElement): string | undefined {
  const text = directText(el)
  return text === '' ? undefined : text
}

export function decodeStreamHeader(el: XmlElement): StreamHeader {
  return {
    kind: 'stream',
    from: attribute(el, 'from'),
    id: attribute(el, 'id'),
    version: attribute(el, 'version'),
    lang: attribute(el, 'lang', NS_XML),
  }
}

const FEATURES_MODELED = new Set(['starttls', 'mechanisms', 'bind', 'session'])

export function decodeFeatures(el: XmlElement): StreamFeatures {
  const startTls = findChild(el, 'starttls', NS_TLS)
  const mechanisms = findChild(el, 'mechanisms', NS_SASL)
  return {
    kind: 'features',
    startTls: startTls ? { required: findChild(startTls, 'required') !== undefined } : undefined,
    mechanisms: mechanisms ? decodeMechanisms(mechanisms).mechanisms : [],
    bind: findChild(el, 'bind', NS_BIND) !== undefined,
    session: findChild(el, 'session') !== undefined,
    ...collectUnmodeled(el, FEATURES_MODELED),
  }
}

export function decodeStreamError(el: XmlElement): StreamErrorStanza {
  const condition = childElements(el).find(
    (child) => child.name.space === NS_STREAMS_ERRORS && child.name.local !== 'text',
  )
  return {
    kind: 'stream-error',
    condition: condition?.name.local ?? 'undefined-condition',
    text: childText(el, 'text', NS_STREAMS_ERRORS),
  }
}

export function decodeStartTls(el: XmlElement): StartTlsStanza {
  return { kind: 'starttls', required: findChild(el, 'required') !== undefined }
}

export function decodeMechanisms(el: XmlElement): MechanismsStanza {
  const mechanisms: string[] = []
  for (const child of childElements(el)) {
    if (child.name.local === 'mechanism') mechanisms.push(directText(child).trim())
  }
  return { kind: 'mechanisms', mechanisms }
}

export function decodeSaslFailure(el: XmlElement): SaslFailure {
  const first = childElements(el).find((child) => child.name.local !== 'text')
  return {
    kind: 'failure',
    condition: first?.name.local ?? '',
    text: childText(el, 'text'),
  }
}

export function decodeBind(el: XmlElement): BindStanza {
  return {
    kind: 'bind',
    resource: childText(el, 'resource')?.trim(),
    jid: childText(el, 'jid')?.trim(),
  }
}

export function decodeClientError(el: XmlElement): ClientError {
  const condition = childElements(el).find(
    (child) => child.name.space === NS_XMPP_STANZAS && child.name.local !== 'text',
  )
  return {
    kind: 'error',
    code: attribute(el, 'code'),
    type: attribute(el, 'type'),
    condition: condition?.name.local,
    text: childText(el, 'text', NS_XMPP_STANZAS),
  }
}

const MESSAGE_MODELED = new Set(['subject', 'body', 'thread'])

export function decodeMessage(el: XmlElement): MessageStanza {
  return {
    kind: 'message',
    ...common(el),
    lang: attribute(el, 'lang', NS_XML),
    subject: childText(el, 'subject'),
    body: childText(el, 'body'),
    thread: childText(el, 'thread'),
    ...collectUnmodeled(el, MESSAGE_MODELED),
  }
}

const PRESENCE_MODELED = new Set(['show', 'status', 'priority', 'error'])

export function decodePresence(el: XmlElement): PresenceStanza {
  const error = findChild(el, 'error')
  return {
    kind: 'presence',
    ...common(el),
    lang: attribute(el, 'lang', NS_XML),
    show: childText(el, 'show'),
    status: childText(el, 'status'),
    priority: childText(el, 'priority'),
    error: error ? decodeClientError(error) : undefined,
    ...collectUnmodeled(el, PRESENCE_MODELED),
  }
}

const IQ_MODELED = new Set(['error', 'bind'])

export function decodeIq(el: XmlElement): IqStanza {
  const error = findChild(el, 'error')
  const bind = findChild(el, 'bind', NS_BIND)
  return {
    kind: 'iq',
    ...common(el),
    error: error ? decodeClientError(error) : undefined,
    bind: bind ? decodeBind(bind) : undefined,
    ...collectUnmodeled(el, IQ_MODELED),
  }
}

export const decodeTlsProceed = (): TlsProceedStanza => ({ kind: 'tls-proceed' })
export const decodeTlsFailure = (): TlsFailureStanza => ({ kind: 'tls-failure' })
export const decodeSaslAbort = (): SaslAbort => ({ kind: 'abort' })

export function decodeChallenge(el: XmlElement): SaslChallenge {
  return { kind: 'challenge', data: directText(el).trim() }
}

export function decodeResponse(el: XmlElement): SaslResponse {
  return { kind: 'response', data: directText(el).trim() }
}

export function decodeSuccess(el: XmlElement): SaslSuccess {
  return { kind: 'success', data: optionalText(el)?.trim() }
}
