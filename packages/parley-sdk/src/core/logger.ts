/**
 * SDK diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[Parley]` prefix so host
 * applications can route or filter SDK output.
 *
 * **Privacy**: Never pass passwords, SASL payloads, message bodies or JID
 * local parts to these functions. Use `getDomain(jid)` when a connection
 * needs to be identified.
 *
 * @module Core/Logger
 */

const PREFIX = '[Parley]'

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}
