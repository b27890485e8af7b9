/**
 * 튜터 페르소나 / 프리셋 데이터 모델
 *
 * 필드 이름은 저장 파일(teachers.json, presets.json)의 형식을 그대로 따른다.
 */

export const TRAIT_NAMES = [
  'friendliness',
  'humor_level',
  'encouragement',
  'interaction_frequency',
  'explanation_detail',
  'theory_vs_practice',
  'safety_emphasis',
  'adaptability',
  'natural_speech',
  'question_sensitivity',
  'response_speed',
  'vocabulary_level',
] as const

export type TraitName = (typeof TRAIT_NAMES)[number]

/** 각 값은 0~100 */
export type PersonalityTraits = Record<TraitName, number>

/** 낮은 단계부터 순서대로 */
export const EDUCATION_LEVELS = [
  'elementary',
  'middle_school',
  'high_school',
  'university',
  'graduate',
] as const

export type EducationLevel = (typeof EDUCATION_LEVELS)[number]

export interface VoiceSettings {
  /** 0.5 ~ 2.0 */
  speed: number
  /** 0.5 ~ 2.0 */
  pitch: number
  /** 0.0 ~ 1.0 */
  volume: number
  auto_play: boolean
}

export interface DocumentRef {
  name: string
  size: number
}

export interface PersonaRecord {
  id: string
  created_at: string
  version: string
  name: string
  title: string
  background: string
  subject: string
  level: EducationLevel
  personality: PersonalityTraits
  voice_settings: VoiceSettings
  document_refs: DocumentRef[]
  use_general_knowledge: boolean
}

/** 프리셋 본문 (내장 / 사용자 공통) */
export interface PresetConfig {
  subject: string
  /** 표시용 레벨 라벨("대학교") 또는 레벨 키 */
  level: string
  personality: Partial<PersonalityTraits>
  voice_settings?: Partial<VoiceSettings>
  description?: string
  is_user_preset?: boolean
}

/** presets.json 에 저장된 사용자 프리셋 */
export interface StoredPreset extends PresetConfig {
  created_at: string
  updated_at: string
}

/**
 * 프리셋을 덮어쓸 수 있는 느슨한 설정
 * 프리셋이 다루지 않는 필드는 그대로 통과한다
 */
export interface TutorDraft {
  name?: string
  title?: string
  background?: string
  subject?: string
  level?: string
  personality?: Partial<PersonalityTraits>
  voice_settings?: Partial<VoiceSettings>
  document_refs?: DocumentRef[]
  use_general_knowledge?: boolean
  [key: string]: unknown
}
