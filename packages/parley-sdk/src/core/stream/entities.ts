/**
 * XML entity decoding and escaping.
 *
 * Only the five predefined entities and character references exist in an
 * XMPP stream (RFC 3920 §11.1 forbids DTDs), so anything else is malformed.
 *
 * @module Core/Stream/Entities
 */

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  apos: "'",
  quot: '"',
}

const CHAR_TO_ENTITY: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  "'": '&apos;',
  '"': '&quot;',
}

const SPECIAL_CHARS_RE = /[<>&'"]/g
const LINE_ENDING_RE = /\r\n?/g

export class EntityError extends Error {
  override name = 'EntityError'
}

/**
 * Checks if a code point is a valid XML 1.0 Char (XML 1.0 §2.2).
 */
function isValidXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff)
  )
}

function decodeReference(ref: string): string {
  const named = NAMED_ENTITIES[ref]
  if (named !== undefined) return named

  let codePoint = Number.NaN
  if (/^#x[0-9a-fA-F]+$/.test(ref)) {
    codePoint = parseInt(ref.slice(2), 16)
  } else if (/^#[0-9]+$/.test(ref)) {
    codePoint = parseInt(ref.slice(1), 10)
  }
  if (Number.isNaN(codePoint)) {
    throw new EntityError(`unknown entity &${ref};`)
  }
  if (!isValidXmlChar(codePoint)) {
    throw new EntityError(`character reference &${ref}; is not a valid XML character`)
  }
  return String.fromCodePoint(codePoint)
}

/**
 * Replace entity and character references with the characters they stand for.
 *
 * @throws EntityError on an unknown entity or a bare `&`
 */
export function decodeEntities(raw: string): string {
  let ampIndex = raw.indexOf('&')
  if (ampIndex < 0) return raw

  let result = ''
  let last = 0
  while (ampIndex >= 0) {
    const semiIndex = raw.indexOf(';', ampIndex + 1)
    if (semiIndex < 0) {
      throw new EntityError('bare & in character data')
    }
    result += raw.substring(last, ampIndex) + decodeReference(raw.substring(ampIndex + 1, semiIndex))
    last = semiIndex + 1
    ampIndex = raw.indexOf('&', last)
  }
  return result + raw.substring(last)
}

/**
 * Decode parsed character data: line endings are normalized to `\n` before
 * references are expanded, so `&#13;` survives.
 */
export function decodeText(raw: string): string {
  return decodeEntities(raw.replace(LINE_ENDING_RE, '\n'))
}

/** Escape `< > " ' &` for use in attribute values and character data. */
export function escapeXml(value: string): string {
  return value.replace(SPECIAL_CHARS_RE, (ch) => CHAR_TO_ENTITY[ch] ?? ch)
}
