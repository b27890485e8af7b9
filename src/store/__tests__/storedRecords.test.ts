import { describe, it, expect } from 'vitest'
import { parsePersonaList, parsePresetMap, parseStoredPersona, parseStoredPreset } from '../storedRecords.js'
import { PERSONA_SCHEMA_VERSION, draftToPersona } from '../../persona/buildPersona.js'

const personality = { friendliness: 90, humor_level: 70, encouragement: 90, explanation_detail: 60 }

describe('parseStoredPersona', () => {
  it('should accept a complete record unchanged', () => {
    const persona = draftToPersona({ name: '김선생' })
    expect(parseStoredPersona(JSON.parse(JSON.stringify(persona)))).toEqual({ ok: true, value: persona })
  })

  it('should fill in a missing version', () => {
    const record: Record<string, unknown> = { ...draftToPersona({ name: '김선생' }) }
    delete record.version
    const parsed = parseStoredPersona(record)

    expect(parsed.ok && parsed.value.version).toBe(PERSONA_SCHEMA_VERSION)
  })

  it('should turn a level label into its key', () => {
    const parsed = parseStoredPersona({ ...draftToPersona({ name: '김선생' }), level: '초등학교' })
    expect(parsed.ok && parsed.value.level).toBe('elementary')
  })

  it('should reject values that are not objects', () => {
    expect(parseStoredPersona('teacher')).toEqual({ ok: false, error: ['persona must be an object'] })
    expect(parseStoredPersona([])).toEqual({ ok: false, error: ['persona must be an object'] })
  })

  it('should reject an unknown level', () => {
    const parsed = parseStoredPersona({ ...draftToPersona({ name: '김선생' }), level: 'kindergarten' })
    expect(parsed).toEqual({
      ok: false,
      error: ['level must be one of elementary, middle_school, high_school, university, graduate'],
    })
  })
})

describe('parseStoredPreset', () => {
  it('should keep the optional fields that are present', () => {
    const parsed = parseStoredPreset({
      subject: '수학',
      level: '중학교',
      personality,
      description: '설명',
      is_user_preset: true,
      created_at: '2024-01-01T00:00:00.000Z',
    })

    expect(parsed).toEqual({
      ok: true,
      value: {
        subject: '수학',
        level: '중학교',
        personality,
        description: '설명',
        is_user_preset: true,
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: '',
      },
    })
  })

  it('should report the missing fields', () => {
    expect(parseStoredPreset({ subject: '수학' })).toEqual({
      ok: false,
      error: ['level is required', 'personality is required'],
    })
  })
})

describe('collections', () => {
  it('should keep valid personas and label the problems by index', () => {
    const persona = draftToPersona({ name: '김선생' })
    const parsed = parsePersonaList([{ name: '' }, persona], 'backup')

    expect(parsed.value).toEqual([persona])
    expect(parsed.problems[0]).toBe('backup[0]: id is required')
  })

  it('should keep valid presets and label the problems by name', () => {
    const parsed = parsePresetMap({
      good: { subject: '수학', level: '중학교', personality },
      bad: 3,
    })

    expect(Object.keys(parsed.value)).toEqual(['good'])
    expect(parsed.problems).toEqual(['presets.bad: config must be an object'])
  })
})
