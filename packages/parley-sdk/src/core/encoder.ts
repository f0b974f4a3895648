/**
 * Outbound markup.
 *
 * Negotiation requests are fixed templates written exactly as servers expect
 * them; application stanzas are built with the `xml()` builder from
 * `@xmpp/client`, and unmodeled children are spliced back in as received.
 *
 * @module Core/Encoder
 */
import { xml, type Element } from '@xmpp/client'
import { NS_BIND, NS_CLIENT, NS_SASL, NS_STREAM, NS_XMPP_STANZAS } from './namespaces'
import type { BindStanza, ClientError, OutgoingStanza } from './stanzas'
import { rawMarkup } from './stream/element'
import { escapeXml } from './stream/entities'

// ============================================================================
// Negotiation templates
// ============================================================================

/** Id of the resource binding request */
export const BIND_REQUEST_ID = 'x'

export const STREAM_CLOSE = '</stream:stream>'

/**
 * Stream header addressed to `domain`. The restart header leaves out the XML
 * declaration, which may only appear at the very start of the byte stream.
 */
export function streamHeader(domain: string, options: { declaration?: boolean } = {}): string {
  const declaration = options.declaration === false ? '' : "<?xml version='1.0'?>\n"
  return (
    declaration +
    `<stream:stream to='${escapeXml(domain)}' xmlns='${NS_CLIENT}'\n` +
    ` xmlns:stream='${NS_STREAM}' version='1.0'>\n`
  )
}

/** SASL `<auth>`; an empty payload produces an empty element. */
export function authRequest(mechanism: string, payload: string): string {
  const open = `<auth xmlns='${NS_SASL}' mechanism='${escapeXml(mechanism)}'`
  return payload ? `${open}>${payload}</auth>` : `${open}/>`
}

export function bindRequest(resource?: string): string {
  const bind = resource
    ? `<bind xmlns='${NS_BIND}'><resource>${escapeXml(resource)}</resource></bind>`
    : `<bind xmlns='${NS_BIND}'/>`
  return `<iq type='set' id='${BIND_REQUEST_ID}'>${bind}</iq>`
}

/** Initial presence; empty `show` and `status` are left out. */
export function initialPresence(options: { show?: string; status?: string; lang: string }): string {
  let out = `<presence xml:lang='${escapeXml(options.lang)}'>`
  if (options.show) out += `<show>${escapeXml(options.show)}</show>`
  if (options.status) out += `<status>${escapeXml(options.status)}</status>`
  return out + '</presence>'
}

// ============================================================================
// Stanza encoding
// ============================================================================

type Child = Element | string

function definedAttrs(attrs: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) out[key] = value
  }
  return out
}

function textChild(name: string, value: string | undefined): Element[] {
  return value === undefined ? [] : [xml(name, {}, value)]
}

export function encodeClientError(error: ClientError): Element {
  const children: Child[] = []
  if (error.condition) children.push(xml(error.condition, { xmlns: NS_XMPP_STANZAS }))
  if (error.text !== undefined) children.push(xml('text', { xmlns: NS_XMPP_STANZAS }, error.text))
  return xml('error', definedAttrs({ code: error.code, type: error.type }), ...children)
}

export function encodeBind(bind: BindStanza): Element {
  return xml(
    'bind',
    { xmlns: NS_BIND },
    ...textChild('resource', bind.resource),
    ...textChild('jid', bind.jid),
  )
}

/**
 * Build the element for the modeled fields of a message, presence or iq.
 * `otherElements` is not part of it; {@link serializeStanza} adds those.
 */
export function encodeStanza(stanza: OutgoingStanza): Element {
  const base = { from: stanza.from, id: stanza.id, to: stanza.to, type: stanza.type }
  switch (stanza.kind) {
    case 'message':
      return xml(
        'message',
        definedAttrs({ ...base, 'xml:lang': stanza.lang }),
        ...textChild('subject', stanza.subject),
        ...textChild('body', stanza.body),
        ...textChild('thread', stanza.thread),
      )
    case 'presence':
      return xml(
        'presence',
        definedAttrs({ ...base, 'xml:lang': stanza.lang }),
        ...textChild('show', stanza.show),
        ...textChild('status', stanza.status),
        ...textChild('priority', stanza.priority),
        ...(stanza.error ? [encodeClientError(stanza.error)] : []),
      )
    case 'iq':
      return xml(
        'iq',
        definedAttrs(base),
        ...(stanza.bind ? [encodeBind(stanza.bind)] : []),
        ...(stanza.error ? [encodeClientError(stanza.error)] : []),
      )
  }
}

/**
 * Markup for a message, presence or iq value, as written to the stream.
 *
 * Unmodeled children follow the modeled ones, each written from its
 * `otherElements` entry with `innerXml` untouched; `other` only mirrors their
 * text and is not encoded.
 */
export function serializeStanza(stanza: OutgoingStanza): string {
  const markup = encodeStanza(stanza).toString()
  const raw = (stanza.otherElements ?? []).map((child) => rawMarkup(child, NS_CLIENT)).join('')
  if (!raw) return markup

  const close = `</${stanza.kind}>`
  if (markup.endsWith(close)) {
    return markup.substring(0, markup.length - close.length) + raw + close
  }
  // Self-closing: no modeled children
  return `${markup.substring(0, markup.length - 2)}>${raw}${close}`
}
