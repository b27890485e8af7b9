import { describe, it, expect } from 'vitest'
import { validatePersona } from '../validatePersona.js'
import { draftToPersona } from '../buildPersona.js'

const valid = draftToPersona({ name: '김선생', subject: '화학', level: 'high_school' })

describe('validatePersona', () => {
  it('should accept a complete record', () => {
    expect(validatePersona(valid)).toEqual({ ok: true, errors: [] })
  })

  it('should require a non-blank name', () => {
    expect(validatePersona({ ...valid, name: '   ' }).errors).toEqual(['name is required'])
  })

  it('should accept a Korean level label', () => {
    expect(validatePersona({ ...valid, level: '대학교' }).ok).toBe(true)
  })

  it('should reject an unknown level', () => {
    expect(validatePersona({ ...valid, level: 'phd' }).errors).toEqual([
      'level must be one of elementary, middle_school, high_school, university, graduate',
    ])
  })

  it('should check all twelve traits', () => {
    const personality = { ...valid.personality, response_speed: 101 }
    const { vocabulary_level: _dropped, ...withoutVocabulary } = personality

    expect(validatePersona({ ...valid, personality: withoutVocabulary }).errors).toEqual([
      'personality.response_speed must be a number between 0 and 100',
      'personality.vocabulary_level is required',
    ])
  })

  it('should check voice ranges', () => {
    const result = validatePersona({
      ...valid,
      voice_settings: { speed: 3, pitch: 1, volume: 1.5, auto_play: 'yes' },
    })

    expect(result.errors).toEqual([
      'voice_settings.speed must be between 0.5 and 2',
      'voice_settings.volume must be between 0 and 1',
      'voice_settings.auto_play must be a boolean',
    ])
  })

  it('should collect errors from several fields at once', () => {
    const result = validatePersona({ ...valid, name: '', subject: 42 })
    expect(result.ok).toBe(false)
    expect(result.errors).toEqual(['subject must be a string', 'name is required'])
  })
})
