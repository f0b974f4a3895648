// Session: negotiation, receiving and sending
export { Session } from './Session'
export type { ReceivedStanza, PresenceOptions } from './Session'

// Configuration
export { DEFAULT_SESSION_OPTIONS, resolveSessionOptions } from './config'
export type { SessionOptions, SessionOptionsInput, InitialPresence, PresenceShow, TrafficTee } from './config'

// Transport
export { SocketTransport, dialTls, resolveServiceAddress, DEFAULT_PORT } from './transport'
export type { Transport, SocketTransportOptions, DialOptions, ServiceAddress } from './transport'

// SASL
export { selectMechanism, plainPayload } from './sasl'
export type { Credential, MechanismChoice, MechanismPolicy, SaslMechanismName } from './sasl'

// Negotiation state machine
export { negotiationMachine, isTerminalState } from './negotiationMachine'
export type {
  NegotiationActor,
  NegotiationContext,
  NegotiationEvent,
  NegotiationSnapshot,
  NegotiationStateValue,
} from './negotiationMachine'

// Stanzas
export { encodeStanza, serializeStanza } from './encoder'
export type {
  Stanza,
  StanzaKind,
  ClientStanza,
  OutgoingStanza,
  StreamHeader,
  StreamFeatures,
  StreamErrorStanza,
  MessageStanza,
  PresenceStanza,
  IqStanza,
  ClientError,
  BindStanza,
  SaslFailure,
  SaslSuccess,
} from './stanzas'

// Stream reading
export { StreamReader } from './stream/StreamReader'
export type { StreamReaderOptions, XmlToken, XmlAttribute } from './stream/StreamReader'
export { Dispatcher, STREAM_ROOT, isKnownElement } from './stream/dispatcher'
export type { DecodedElement, StartToken } from './stream/dispatcher'
export { rawMarkup } from './stream/element'
export type { XmlElement, XmlNode, XmlRawElement } from './stream/element'

// Qualified names
export { qname, sameName, formatName, QNameMap } from './qname'
export type { QualifiedName } from './qname'

// Errors
export {
  XMPPError,
  ConfigError,
  ProtocolError,
  AuthError,
  SecurityError,
  TransportError,
  TimeoutError,
  EndOfStreamError,
  isXMPPError,
  isEndOfStream,
} from './errors'
export type { XMPPErrorCode } from './errors'

// JID helpers
export { parseJid, getBareJid, getResource, getDomain, splitAccountJid } from './jid'
export type { ParsedJid } from './jid'

// Namespaces
export * from './namespaces'

// Re-export xml builder from @xmpp/client for raw stanza construction
export { xml } from '@xmpp/client'
export type { Element } from '@xmpp/client'
