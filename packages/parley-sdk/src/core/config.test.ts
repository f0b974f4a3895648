import { describe, it, expect } from 'vitest'
import { DEFAULT_SESSION_OPTIONS, resolveSessionOptions } from './config'

describe('resolveSessionOptions', () => {
  it('should apply defaults', () => {
    expect(resolveSessionOptions()).toEqual({
      preferExternal: false,
      allowUnencryptedAuth: false,
      resource: undefined,
      presence: { show: 'xa' },
      lang: 'en',
      tee: {},
    })
  })

  it('should merge presence field by field', () => {
    expect(resolveSessionOptions({ presence: { status: 'reading' } }).presence).toEqual({
      show: 'xa',
      status: 'reading',
    })
    expect(resolveSessionOptions({ presence: { show: 'dnd' } }).presence).toEqual({ show: 'dnd' })
  })

  it('should not share nested objects between sessions', () => {
    const first = resolveSessionOptions()
    first.presence.status = 'changed'

    expect(resolveSessionOptions().presence).toEqual({ show: 'xa' })
    expect(DEFAULT_SESSION_OPTIONS.presence).toEqual({ show: 'xa' })
  })

  it('should keep explicit values', () => {
    const sent = (text: string) => text.length
    const options = resolveSessionOptions({
      preferExternal: true,
      allowUnencryptedAuth: true,
      resource: 'laptop',
      lang: 'de',
      tee: { sent },
    })
    expect(options).toMatchObject({ preferExternal: true, allowUnencryptedAuth: true, resource: 'laptop', lang: 'de' })
    expect(options.tee.sent).toBe(sent)
  })
})
