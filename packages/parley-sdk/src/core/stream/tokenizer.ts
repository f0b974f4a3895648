/**
 * Incremental XML tokenizer.
 *
 * Text is pushed in with {@link XmlTokenizer.write} as it arrives and pulled
 * out one token at a time with {@link XmlTokenizer.next}, which returns
 * `null` while the next token is still incomplete. Tokens carry absolute
 * offsets into everything written so far, so callers can slice the original
 * markup back out (see {@link XmlTokenizer.slice}) until they
 * {@link XmlTokenizer.release} it.
 *
 * The tokenizer knows nothing about nesting or namespaces. Declarations,
 * processing instructions and comments are skipped wherever they appear.
 *
 * @module Core/Stream/Tokenizer
 */
import { ProtocolError } from '../errors'
import { decodeEntities, decodeText, EntityError } from './entities'

export interface RawAttribute {
  /** Attribute name as written, prefix included */
  name: string
  value: string
}

export type RawToken =
  | { kind: 'start'; name: string; attrs: RawAttribute[]; selfClosing: boolean; start: number; end: number }
  | { kind: 'end'; name: string; start: number; end: number }
  | { kind: 'text'; text: string; start: number; end: number }

// ASCII subset of NameStartChar/NameChar plus everything above U+00BF.
const NAME_RE = /^[A-Za-z_:\u00C0-\uFFFF][A-Za-z0-9_:.\-\u00B7\u00C0-\uFFFF]*$/
const TAG_NAME_RE = /^[A-Za-z_:\u00C0-\uFFFF][A-Za-z0-9_:.\-\u00B7\u00C0-\uFFFF]*/
const ATTRIBUTE_RE = /\s+([^\s=/>"']+)\s*=\s*(?:"([^"]*)"|'([^']*)')/y
const ATTRIBUTE_WS_RE = /\r\n|[\r\n\t]/g
const TRAILING_WS_RE = /^\s*$/

type LiteralMatch = 'match' | 'partial' | 'mismatch'

export class XmlTokenizer {
  private buffer = ''
  /** Absolute offset of buffer[0] */
  private base = 0
  /** Scan position within the buffer */
  private pos = 0
  /**
   * Absolute offset up to which the construct starting at `pos` has already
   * been searched, so input arriving in small pieces is scanned once.
   */
  private scannedTo = 0
  /** Quote left open at `scannedTo` inside a start tag */
  private scanQuote = ''

  write(text: string): void {
    this.buffer += text
  }

  /** Absolute offset of the first character not yet consumed. */
  get offset(): number {
    return this.base + this.pos
  }

  /** Whether unconsumed input other than whitespace is buffered. */
  hasPendingInput(): boolean {
    return !TRAILING_WS_RE.test(this.buffer.substring(this.pos))
  }

  /**
   * Next complete token, or `null` when more input is needed.
   *
   * @throws ProtocolError on malformed markup
   */
  next(): RawToken | null {
    for (;;) {
      const { buffer, pos } = this
      if (pos >= buffer.length) return null

      const ltIndex = buffer.indexOf('<', this.resumeAt(pos))
      if (ltIndex < 0) return this.scannedAll()
      if (ltIndex > pos) return this.text(pos, ltIndex)
      if (pos + 1 >= buffer.length) return null

      const marker = buffer[pos + 1]
      if (marker === '?') {
        const close = buffer.indexOf('?>', this.resumeAt(pos + 2, 1))
        if (close < 0) return this.scannedAll()
        this.pos = close + 2
        continue
      }
      if (marker === '!') {
        const comment = this.matchLiteral('<!--')
        if (comment === 'match') {
          const close = buffer.indexOf('-->', this.resumeAt(pos + 4, 2))
          if (close < 0) return this.scannedAll()
          this.pos = close + 3
          continue
        }
        const cdata = this.matchLiteral('<![CDATA[')
        if (cdata === 'match') {
          const close = buffer.indexOf(']]>', this.resumeAt(pos + 9, 2))
          if (close < 0) return this.scannedAll()
          return this.cdata(pos, close)
        }
        if (comment === 'partial' || cdata === 'partial') return null
        throw ProtocolError.malformed('document type declarations are not allowed')
      }
      if (marker === '/') {
        return this.endTag(pos)
      }
      return this.startTag(pos)
    }
  }

  /**
   * Character data left at the end of the input, for callers that know no
   * more input will come.
   *
   * @throws ProtocolError when the input ends inside markup
   */
  finish(): RawToken | null {
    const token = this.next()
    if (token) return token
    if (this.pos >= this.buffer.length) return null
    if (this.buffer.indexOf('<', this.pos) >= 0) {
      throw ProtocolError.unexpectedEnd()
    }
    return this.text(this.pos, this.buffer.length)
  }

  /** Original input between two absolute offsets. */
  slice(start: number, end: number): string {
    if (start < this.base) {
      throw new RangeError(`input before offset ${this.base} has been released`)
    }
    return this.buffer.substring(start - this.base, end - this.base)
  }

  /** Drop consumed input; offsets before {@link offset} can no longer be sliced. */
  release(): void {
    if (this.pos === 0) return
    this.buffer = this.buffer.substring(this.pos)
    this.base += this.pos
    this.pos = 0
  }

  /** Where to continue searching from, given how far earlier calls got; `overlap` covers a terminator split across writes. */
  private resumeAt(from: number, overlap = 0): number {
    return Math.max(from, this.scannedTo - this.base - overlap)
  }

  private scannedAll(quote = ''): null {
    this.scannedTo = this.base + this.buffer.length
    this.scanQuote = quote
    return null
  }

  private matchLiteral(literal: string): LiteralMatch {
    const available = Math.min(this.buffer.length - this.pos, literal.length)
    if (this.buffer.substring(this.pos, this.pos + available) !== literal.substring(0, available)) {
      return 'mismatch'
    }
    return available === literal.length ? 'match' : 'partial'
  }

  private text(from: number, to: number): RawToken {
    const raw = this.buffer.substring(from, to)
    this.pos = to
    return { kind: 'text', text: decode(() => decodeText(raw)), start: this.base + from, end: this.base + to }
  }

  private cdata(from: number, close: number): RawToken {
    const content = this.buffer.substring(from + 9, close).replace(/\r\n?/g, '\n')
    this.pos = close + 3
    return { kind: 'text', text: content, start: this.base + from, end: this.base + close + 3 }
  }

  private endTag(from: number): RawToken | null {
    const gtIndex = this.buffer.indexOf('>', this.resumeAt(from + 2))
    if (gtIndex < 0) return this.scannedAll()
    const name = this.buffer.substring(from + 2, gtIndex).trimEnd()
    if (!NAME_RE.test(name)) {
      throw ProtocolError.malformed(`invalid end tag </${name}>`)
    }
    this.pos = gtIndex + 1
    return { kind: 'end', name, start: this.base + from, end: this.base + gtIndex + 1 }
  }

  private startTag(from: number): RawToken | null {
    const { buffer } = this
    const resume = this.resumeAt(from + 1)
    let quote = resume > from + 1 ? this.scanQuote : ''
    for (let i = resume; i < buffer.length; i++) {
      const ch = buffer[i]
      if (quote) {
        if (ch === quote) quote = ''
      } else if (ch === '"' || ch === "'") {
        quote = ch
      } else if (ch === '<') {
        throw ProtocolError.malformed('unexpected < inside a tag')
      } else if (ch === '>') {
        const token = parseStartTag(buffer.substring(from + 1, i))
        this.pos = i + 1
        this.scanQuote = ''
        return { kind: 'start', ...token, start: this.base + from, end: this.base + i + 1 }
      }
    }
    return this.scannedAll(quote)
  }
}

function parseStartTag(source: string): { name: string; attrs: RawAttribute[]; selfClosing: boolean } {
  let body = source
  const selfClosing = body.endsWith('/')
  if (selfClosing) body = body.slice(0, -1)

  const nameMatch = TAG_NAME_RE.exec(body)
  if (!nameMatch) {
    throw ProtocolError.malformed(`invalid start tag <${source}>`)
  }
  const name = nameMatch[0]

  const attrs: RawAttribute[] = []
  let index = name.length
  for (;;) {
    ATTRIBUTE_RE.lastIndex = index
    const match = ATTRIBUTE_RE.exec(body)
    if (!match) break
    index = ATTRIBUTE_RE.lastIndex

    const attrName = match[1]
    const rawValue = match[2] ?? match[3] ?? ''
    if (rawValue.includes('<')) {
      throw ProtocolError.malformed(`unescaped < in attribute ${attrName} of <${name}>`)
    }
    if (attrs.some((attr) => attr.name === attrName)) {
      throw ProtocolError.malformed(`duplicate attribute ${attrName} on <${name}>`)
    }
    const value = decode(() => decodeEntities(rawValue.replace(ATTRIBUTE_WS_RE, ' ')))
    attrs.push({ name: attrName, value })
  }
  if (!TRAILING_WS_RE.test(body.substring(index))) {
    throw ProtocolError.malformed(`invalid attributes in <${name}>`)
  }
  return { name, attrs, selfClosing }
}

function decode(fn: () => string): string {
  try {
    return fn()
  } catch (err) {
    if (err instanceof EntityError) {
      throw ProtocolError.malformed(err.message)
    }
    throw err
  }
}
