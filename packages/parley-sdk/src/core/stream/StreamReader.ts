/**
 * Token stream reader over a {@link Transport}.
 *
 * Pulls bytes from the transport on demand, decodes UTF-8, tokenizes and
 * resolves namespaces. The stream root may be reopened at any time (stream
 * restart after SASL, RFC 3920 §6.2): a start tag with the root's qualified
 * name becomes the new logical root without an end tag for the old one, and
 * the reader keeps going with whatever it has already buffered.
 *
 * @module Core/Stream/StreamReader
 */
import { EndOfStreamError, ProtocolError, TransportError, isXMPPError } from '../errors'
import { logInfo } from '../logger'
import { NS_XML } from '../namespaces'
import { sameName, type QualifiedName } from '../qname'
import type { Transport } from '../transport'
import { XmlTokenizer, type RawAttribute, type RawToken } from './tokenizer'

export interface XmlAttribute {
  name: QualifiedName
  /** Attribute name as written, prefix included */
  prefixed: string
  value: string
}

export type XmlToken =
  | {
    kind: 'start'
    name: QualifiedName
    prefixed: string
    /** Attributes other than namespace declarations */
    attrs: XmlAttribute[]
    /** Namespace declarations made on this element, prefix '' for the default namespace */
    declarations: Map<string, string>
    selfClosing: boolean
    start: number
    end: number
  }
  | { kind: 'end'; name: QualifiedName; prefixed: string; start: number; end: number }
  | { kind: 'text'; text: string; start: number; end: number }

export interface StreamReaderOptions {
  /** Qualified name of the document root; seeing it again restarts the document */
  root: QualifiedName
  /** Receives every decoded chunk of inbound text */
  onReceived?: (text: string) => void
}

type Scope = ReadonlyMap<string, string>

const BASE_SCOPE: Scope = new Map([['xml', NS_XML]])

interface OpenElement {
  name: QualifiedName
  prefixed: string
  scope: Scope
}

export class StreamReader {
  private readonly tokenizer = new XmlTokenizer()
  private decoder = new TextDecoder('utf-8', { fatal: true })
  private readonly open: OpenElement[] = []
  /** End token owed for a self-closing start tag */
  private pendingEnd: XmlToken | null = null
  private restarts = 0

  constructor(
    private transport: Transport,
    private readonly options: StreamReaderOptions,
  ) {}

  /** Elements currently open, the stream root included. */
  get depth(): number {
    return this.open.length
  }

  /** Number of times the document root has been reopened. */
  get restartCount(): number {
    return this.restarts
  }

  /**
   * Swap the transport beneath the reader (e.g. after a TLS upgrade).
   *
   * Buffered text and token boundaries are kept; only subsequent reads go to
   * the new transport.
   */
  replaceTransport(transport: Transport): void {
    this.transport = transport
  }

  /**
   * Next token, reading from the transport as needed.
   *
   * @throws EndOfStreamError when the transport closes cleanly between tokens
   * @throws ProtocolError on malformed markup or a close inside a tag
   * @throws TransportError or TimeoutError from the transport
   */
  async next(): Promise<XmlToken> {
    if (this.pendingEnd) {
      const token = this.pendingEnd
      this.pendingEnd = null
      return token
    }
    for (;;) {
      const raw = this.tokenizer.next()
      if (raw) return this.resolve(raw)
      await this.fill()
    }
  }

  /** Original markup between two token offsets. */
  slice(start: number, end: number): string {
    return this.tokenizer.slice(start, end)
  }

  /** Forget text that has already been tokenized. */
  release(): void {
    this.tokenizer.release()
  }

  private async fill(): Promise<void> {
    let chunk: Uint8Array | null
    try {
      chunk = await this.transport.read()
    } catch (err) {
      throw isXMPPError(err) ? err : TransportError.io('read', err)
    }

    if (chunk === null) {
      const tail = this.decodeChunk()
      if (tail) this.tokenizer.write(tail)
      if (this.tokenizer.hasPendingInput()) {
        throw ProtocolError.unexpectedEnd(this.open.at(-1)?.name)
      }
      throw new EndOfStreamError()
    }

    const text = this.decodeChunk(chunk)
    if (text) {
      this.options.onReceived?.(text)
      this.tokenizer.write(text)
    }
  }

  private decodeChunk(chunk?: Uint8Array): string {
    try {
      return chunk ? this.decoder.decode(chunk, { stream: true }) : this.decoder.decode()
    } catch {
      this.decoder = new TextDecoder('utf-8', { fatal: true })
      throw ProtocolError.malformed('invalid UTF-8 in stream')
    }
  }

  private resolve(raw: RawToken): XmlToken {
    switch (raw.kind) {
      case 'text':
        return raw
      case 'start':
        return this.resolveStart(raw)
      case 'end':
        return this.resolveEnd(raw)
    }
  }

  private resolveStart(raw: Extract<RawToken, { kind: 'start' }>): XmlToken {
    const declarations = new Map<string, string>()
    const plain: RawAttribute[] = []
    for (const attr of raw.attrs) {
      if (attr.name === 'xmlns') {
        declarations.set('', attr.value)
      } else if (attr.name.startsWith('xmlns:')) {
        declarations.set(attr.name.substring(6), attr.value)
      } else {
        plain.push(attr)
      }
    }

    let parentScope = this.open.at(-1)?.scope ?? BASE_SCOPE
    let scope = extendScope(parentScope, declarations)
    let name = resolveName(raw.name, scope, true)

    if (this.open.length > 0 && this.isRoot(raw.name, declarations)) {
      // Stream restart: the previous root is abandoned without an end tag.
      this.open.length = 0
      this.restarts++
      logInfo(`Stream root reopened (restart ${this.restarts})`)
      parentScope = BASE_SCOPE
      scope = extendScope(parentScope, declarations)
      name = resolveName(raw.name, scope, true)
    }

    const attrs = plain.map((attr) => ({
      name: resolveName(attr.name, scope, false),
      prefixed: attr.name,
      value: attr.value,
    }))

    this.open.push({ name, prefixed: raw.name, scope })
    const token: XmlToken = {
      kind: 'start',
      name,
      prefixed: raw.name,
      attrs,
      declarations,
      selfClosing: raw.selfClosing,
      start: raw.start,
      end: raw.end,
    }
    if (raw.selfClosing) {
      this.open.pop()
      this.pendingEnd = { kind: 'end', name, prefixed: raw.name, start: raw.end, end: raw.end }
    }
    return token
  }

  private resolveEnd(raw: Extract<RawToken, { kind: 'end' }>): XmlToken {
    const current = this.open.pop()
    if (!current) {
      throw ProtocolError.malformed(`unexpected end tag </${raw.name}>`)
    }
    if (current.prefixed !== raw.name) {
      throw ProtocolError.malformed(`element <${current.prefixed}> closed by </${raw.name}>`, current.name)
    }
    return { kind: 'end', name: current.name, prefixed: raw.name, start: raw.start, end: raw.end }
  }

  /** Whether a start tag, resolved on its own declarations, names the document root. */
  private isRoot(prefixed: string, declarations: Map<string, string>): boolean {
    const ownScope = extendScope(BASE_SCOPE, declarations)
    const colonIndex = prefixed.indexOf(':')
    const prefix = colonIndex >= 0 ? prefixed.substring(0, colonIndex) : ''
    if (!ownScope.has(prefix)) return false
    return sameName(resolveName(prefixed, ownScope, true), this.options.root)
  }
}

function extendScope(parent: Scope, declarations: Map<string, string>): Scope {
  if (declarations.size === 0) return parent
  const scope = new Map(parent)
  for (const [prefix, uri] of declarations) scope.set(prefix, uri)
  return scope
}

/**
 * Resolve a prefixed name against a scope. Unprefixed attributes are in no
 * namespace; unprefixed elements take the default namespace.
 */
function resolveName(prefixed: string, scope: Scope, isElement: boolean): QualifiedName {
  const colonIndex = prefixed.indexOf(':')
  if (colonIndex < 0) {
    return { space: isElement ? scope.get('') ?? '' : '', local: prefixed }
  }
  const prefix = prefixed.substring(0, colonIndex)
  const local = prefixed.substring(colonIndex + 1)
  const space = scope.get(prefix)
  if (space === undefined) {
    throw ProtocolError.malformed(`unbound namespace prefix ${prefix}`, { space: '', local })
  }
  return { space, local }
}
