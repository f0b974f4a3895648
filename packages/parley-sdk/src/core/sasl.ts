/**
 * SASL mechanism selection (RFC 3920 §6).
 *
 * Pure: picks a mechanism from what the server advertised and builds the
 * initial payload. Nothing is written until a mechanism has been chosen.
 *
 * @module Core/Sasl
 */
import { AuthError } from './errors'
import { splitAccountJid } from './jid'

export type SaslMechanismName = 'EXTERNAL' | 'PLAIN'

export interface Credential {
  /** Account JID, `local@domain` */
  jid: string
  /** Required for PLAIN */
  password?: string
}

export interface MechanismPolicy {
  /** Use EXTERNAL when the server offers it (identity comes from the TLS layer) */
  preferExternal: boolean
}

export interface MechanismChoice {
  mechanism: SaslMechanismName
  /** Base64 initial response; '' when the mechanism sends none */
  payload: string
}

/**
 * PLAIN initial response: `authzid NUL authcid NUL password`, with an empty
 * authzid and the JID local part as authcid.
 */
export function plainPayload(local: string, password: string): string {
  return Buffer.from(`\0${local}\0${password}`, 'utf-8').toString('base64')
}

/**
 * Choose a mechanism.
 *
 * EXTERNAL when preferred and advertised; otherwise PLAIN when advertised.
 *
 * @throws AuthError when neither applies, or PLAIN is chosen without a password
 * @throws ConfigError when the JID has no `@`
 */
export function selectMechanism(
  advertised: readonly string[],
  policy: MechanismPolicy,
  credential: Credential,
): MechanismChoice {
  if (policy.preferExternal && advertised.includes('EXTERNAL')) {
    return { mechanism: 'EXTERNAL', payload: '' }
  }
  if (!advertised.includes('PLAIN')) {
    throw AuthError.noMechanism(advertised)
  }
  if (credential.password === undefined) {
    throw new AuthError('PLAIN authentication requires a password')
  }
  const { local } = splitAccountJid(credential.jid)
  return { mechanism: 'PLAIN', payload: plainPayload(local, credential.password) }
}
