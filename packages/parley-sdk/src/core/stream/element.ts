/**
 * Decoded element trees and the helpers stanza decoders read them with.
 *
 * @module Core/Stream/Element
 */
import type { QualifiedName } from '../qname'
import { escapeXml } from './entities'
import type { XmlAttribute } from './StreamReader'

/**
 * An element read off the stream, with resolved names and the original
 * markup of its content.
 */
export interface XmlElement {
  name: QualifiedName
  /** Element name as written, prefix included */
  prefixed: string
  /** Namespace declarations on the start tag, keyed by prefix ('' for the default namespace) */
  declarations: Record<string, string>
  attrs: XmlAttribute[]
  children: XmlNode[]
  /** Markup between the start and end tags exactly as received */
  innerXml: string
}

export type XmlNode = XmlElement | string

/**
 * An element kept as its start tag and original inner markup, so it can be
 * written back out unchanged.
 */
export interface XmlRawElement {
  name: QualifiedName
  prefixed: string
  declarations: Record<string, string>
  attrs: XmlAttribute[]
  innerXml: string
}

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== 'string'
}

export function childElements(el: XmlElement): XmlElement[] {
  return el.children.filter(isElement)
}

/**
 * First child element with the given local name, and namespace when one is
 * given.
 */
export function findChild(el: XmlElement, local: string, space?: string): XmlElement | undefined {
  return childElements(el).find(
    (child) => child.name.local === local && (space === undefined || child.name.space === space),
  )
}

/** Character data directly inside the element; text of nested elements is not included. */
export function directText(el: XmlElement): string {
  let text = ''
  for (const child of el.children) {
    if (typeof child === 'string') text += child
  }
  return text
}

export function childText(el: XmlElement, local: string, space?: string): string | undefined {
  const child = findChild(el, local, space)
  return child ? directText(child) : undefined
}

/** Attribute value by qualified name; unprefixed attributes are in no namespace. */
export function attribute(el: XmlElement, local: string, space = ''): string | undefined {
  return el.attrs.find((attr) => attr.name.local === local && attr.name.space === space)?.value
}

export function toRawElement(el: XmlElement): XmlRawElement {
  return {
    name: el.name,
    prefixed: el.prefixed,
    declarations: el.declarations,
    attrs: el.attrs,
    innerXml: el.innerXml,
  }
}

function prefixOf(prefixed: string): string {
  const colonIndex = prefixed.indexOf(':')
  return colonIndex < 0 ? '' : prefixed.substring(0, colonIndex)
}

/**
 * Markup for a raw element: its start tag rebuilt from the recorded name,
 * declarations and attributes, then `innerXml` exactly as stored.
 *
 * The element's own prefix is declared when the declarations do not bind it,
 * so an element whose prefix was bound further out keeps its namespace.
 * Unprefixed elements outside `defaultSpace` get an `xmlns` the same way.
 */
export function rawMarkup(raw: XmlRawElement, defaultSpace: string): string {
  const declarations = { ...raw.declarations }
  const prefix = prefixOf(raw.prefixed)
  if (declarations[prefix] === undefined && (prefix !== '' || raw.name.space !== defaultSpace)) {
    declarations[prefix] = raw.name.space
  }

  let out = `<${raw.prefixed}`
  for (const [declared, uri] of Object.entries(declarations)) {
    out += ` ${declared ? `xmlns:${declared}` : 'xmlns'}='${escapeXml(uri)}'`
  }
  for (const attr of raw.attrs) {
    out += ` ${attr.prefixed}='${escapeXml(attr.value)}'`
  }
  return raw.innerXml ? `${out}>${raw.innerXml}</${raw.prefixed}>` : `${out}/>`
}
