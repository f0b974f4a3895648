/**
 * XMPP Namespace Constants
 *
 * Namespaces of the core protocol (RFC 3920 Appendix C, RFC 3921 Appendix B).
 * These are used throughout the SDK for element dispatch and generation.
 */

// RFC 3920 C.1: Streams
export const NS_STREAM = 'http://etherx.jabber.org/streams'

// RFC 3920 C.2: Stream errors
export const NS_STREAMS_ERRORS = 'urn:ietf:params:xml:ns:xmpp-streams'

// RFC 3920 C.3: STARTTLS
export const NS_TLS = 'urn:ietf:params:xml:ns:xmpp-tls'

// RFC 3920 C.4: SASL
export const NS_SASL = 'urn:ietf:params:xml:ns:xmpp-sasl'

// RFC 3920 C.5: Resource binding
export const NS_BIND = 'urn:ietf:params:xml:ns:xmpp-bind'

// RFC 3921 B.1: Client stanzas
export const NS_CLIENT = 'jabber:client'

// RFC 3920: Stanza error conditions
export const NS_XMPP_STANZAS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

// XML namespace, bound to the `xml` prefix by definition
export const NS_XML = 'http://www.w3.org/XML/1998/namespace'
