/**
 * 프리셋 / 페르소나 검증 스키마
 *
 * 모든 위반 사항을 모아 필드 경로가 들어간 메시지 목록으로 돌려준다.
 */

import { z } from 'zod'
import { EDUCATION_LEVELS, TRAIT_NAMES } from '../types/persona.js'
import { TRAIT_RANGE, VOICE_RANGES, normalizeLevel } from '../persona/ranges.js'

export interface ValidationResult {
  ok: boolean
  errors: string[]
}

/** 프리셋에 반드시 있어야 하는 성격 특성 */
export const REQUIRED_PRESET_TRAITS = [
  'friendliness',
  'humor_level',
  'encouragement',
  'explanation_detail',
] as const

function requiredString(field: string) {
  return z.string({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a string`,
  })
}

function traitScore(trait: string) {
  const rangeMessage = `personality.${trait} must be a number between ${TRAIT_RANGE.min} and ${TRAIT_RANGE.max}`
  return z
    .number({ required_error: `personality.${trait} is required`, invalid_type_error: rangeMessage })
    .min(TRAIT_RANGE.min, rangeMessage)
    .max(TRAIT_RANGE.max, rangeMessage)
}

function personalitySchema(traits: readonly string[]) {
  const shape = Object.fromEntries(traits.map(trait => [trait, traitScore(trait)]))
  return z
    .object(shape, {
      required_error: 'personality is required',
      invalid_type_error: 'personality must be an object',
    })
    .passthrough()
}

function voiceNumber(field: 'speed' | 'pitch' | 'volume', ranged: boolean) {
  const typeMessage = `voice_settings.${field} must be a number`
  const base = z.number({ invalid_type_error: typeMessage })
  if (!ranged) return base.optional()
  const { min, max } = VOICE_RANGES[field]
  const rangeMessage = `voice_settings.${field} must be between ${min} and ${max}`
  return base.min(min, rangeMessage).max(max, rangeMessage).optional()
}

export const presetConfigSchema = z
  .object(
    {
      subject: requiredString('subject'),
      level: requiredString('level'),
      personality: personalitySchema(REQUIRED_PRESET_TRAITS),
      voice_settings: z
        .object(
          { speed: voiceNumber('speed', false), pitch: voiceNumber('pitch', false) },
          { invalid_type_error: 'voice_settings must be an object' }
        )
        .passthrough()
        .optional(),
    },
    { required_error: 'config must be an object', invalid_type_error: 'config must be an object' }
  )
  .passthrough()

/** 전체 페르소나 레코드: 프리셋 규칙 + 이름, 레벨 값, 12개 특성, 음성 범위 */
export const personaRecordSchema = presetConfigSchema.extend({
  name: requiredString('name').refine(value => value.trim().length > 0, { message: 'name is required' }),
  level: requiredString('level').refine(value => normalizeLevel(value) !== null, {
    message: `level must be one of ${EDUCATION_LEVELS.join(', ')}`,
  }),
  personality: personalitySchema(TRAIT_NAMES),
  voice_settings: z
    .object(
      {
        speed: voiceNumber('speed', true),
        pitch: voiceNumber('pitch', true),
        volume: voiceNumber('volume', true),
        auto_play: z.boolean({ invalid_type_error: 'voice_settings.auto_play must be a boolean' }).optional(),
      },
      { invalid_type_error: 'voice_settings must be an object' }
    )
    .passthrough()
    .optional(),
})

export function collectIssues(schema: z.ZodTypeAny, input: unknown): ValidationResult {
  const result = schema.safeParse(input)
  if (result.success) {
    return { ok: true, errors: [] }
  }
  return { ok: false, errors: result.error.issues.map(issue => issue.message) }
}

export function validatePresetConfig(config: unknown): ValidationResult {
  return collectIssues(presetConfigSchema, config)
}
