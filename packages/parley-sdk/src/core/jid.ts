/**
 * JID (Jabber ID) Utilities
 *
 * XMPP addresses (JIDs) have the format: local@domain/resource
 * - Bare JID: local@domain (without resource)
 * - Full JID: local@domain/resource (with resource)
 *
 * Examples:
 * - user@example.com (bare JID)
 * - user@example.com/laptop (full JID, as returned by resource binding)
 *
 * These utilities are simple string operations; no stringprep or escaping
 * is applied.
 */
import { ConfigError } from './errors'

export interface ParsedJid {
  local: string
  domain: string
  resource?: string
  bare: string
  full: string
}

/**
 * Parse a JID into its components
 * @param jid - Full or bare JID string
 * @returns Parsed JID object with all components
 */
export function parseJid(jid: string): ParsedJid {
  if (!jid) {
    return { local: '', domain: '', bare: '', full: '' }
  }

  // Split resource first (everything after first /)
  const slashIndex = jid.indexOf('/')
  const bareJid = slashIndex >= 0 ? jid.substring(0, slashIndex) : jid
  const resource = slashIndex >= 0 ? jid.substring(slashIndex + 1) : undefined

  const atIndex = bareJid.indexOf('@')
  const local = atIndex >= 0 ? bareJid.substring(0, atIndex) : ''
  const domain = atIndex >= 0 ? bareJid.substring(atIndex + 1) : bareJid

  return {
    local,
    domain,
    resource,
    bare: bareJid,
    full: jid,
  }
}

/**
 * Get bare JID (without resource) from a full JID
 * @param fullJid - Full JID (e.g., "user@example.com/laptop")
 * @returns Bare JID (e.g., "user@example.com")
 */
export function getBareJid(fullJid: string): string {
  if (!fullJid) return ''
  const slashIndex = fullJid.indexOf('/')
  return slashIndex >= 0 ? fullJid.substring(0, slashIndex) : fullJid
}

/**
 * Get resource from a full JID
 * @returns Resource string or undefined if no resource
 */
export function getResource(fullJid: string): string | undefined {
  if (!fullJid) return undefined
  const slashIndex = fullJid.indexOf('/')
  return slashIndex >= 0 ? fullJid.substring(slashIndex + 1) : undefined
}

/**
 * Get domain from a JID
 * @param jid - Any JID (e.g., "user@example.com" or "user@example.com/laptop")
 * @returns Domain (e.g., "example.com")
 */
export function getDomain(jid: string): string {
  return parseJid(jid).domain
}

/**
 * Split an account JID into the local part and the domain the stream is
 * addressed to.
 *
 * The split happens on the first `@`; everything after it is the domain.
 *
 * @throws ConfigError when the JID has no `@`
 */
export function splitAccountJid(jid: string): { local: string; domain: string } {
  const atIndex = jid.indexOf('@')
  if (atIndex < 0) {
    throw ConfigError.invalidJid(jid)
  }
  return { local: jid.substring(0, atIndex), domain: jid.substring(atIndex + 1) }
}
