/**
 * 성격 특성 / 음성 설정의 범위와 기본값, 과목과 교육 수준 목록
 */

import { EDUCATION_LEVELS } from '../types/persona.js'
import type { EducationLevel, PersonalityTraits, TraitName, VoiceSettings } from '../types/persona.js'

export interface NumericRange {
  min: number
  max: number
  default: number
  step?: number
}

export const TRAIT_RANGE = { min: 0, max: 100 } as const

export const PERSONALITY_DEFAULTS: PersonalityTraits = {
  friendliness: 70,
  humor_level: 30,
  encouragement: 80,
  interaction_frequency: 60,
  explanation_detail: 70,
  theory_vs_practice: 50,
  safety_emphasis: 90,
  adaptability: 75,
  natural_speech: 80,
  question_sensitivity: 70,
  response_speed: 60,
  vocabulary_level: 50,
}

/** 프롬프트와 CLI 출력에 쓰는 특성 이름과 양 끝 설명 */
export const TRAIT_LABELS: Record<TraitName, { label: string; scale: string }> = {
  friendliness: { label: '친근함', scale: '0: 매우 엄격 ↔ 100: 매우 친근' },
  humor_level: { label: '유머', scale: '0: 진지함 ↔ 100: 유머러스' },
  encouragement: { label: '격려', scale: '0: 객관적 ↔ 100: 매우 격려적' },
  interaction_frequency: { label: '상호작용 빈도', scale: '0: 강의식 ↔ 100: 대화식' },
  explanation_detail: { label: '설명 상세도', scale: '0: 간단명료 ↔ 100: 매우 상세' },
  theory_vs_practice: { label: '이론-실습 균형', scale: '0: 이론 중심 ↔ 100: 실습 중심' },
  safety_emphasis: { label: '안전 강조', scale: '실험/실습 시 안전 주의사항 강조' },
  adaptability: { label: '적응성', scale: '학생 반응에 따른 설명 조절' },
  natural_speech: { label: '자연스러운 말투', scale: '끊어지는 말, 되묻기 등' },
  question_sensitivity: { label: '질문 감지 민감도', scale: '0: 둔감 ↔ 100: 민감' },
  response_speed: { label: '응답 속도', scale: '0: 신중함 ↔ 100: 즉각적' },
  vocabulary_level: { label: '어휘 수준', scale: '0: 쉬운 어휘 ↔ 100: 전문 용어' },
}

export const VOICE_RANGES: Record<'speed' | 'pitch' | 'volume', NumericRange> = {
  speed: { min: 0.5, max: 2.0, default: 1.0, step: 0.1 },
  pitch: { min: 0.5, max: 2.0, default: 1.0, step: 0.1 },
  volume: { min: 0.0, max: 1.0, default: 0.8, step: 0.1 },
}

export const VOICE_DEFAULTS: VoiceSettings = {
  speed: VOICE_RANGES.speed.default,
  pitch: VOICE_RANGES.pitch.default,
  volume: VOICE_RANGES.volume.default,
  auto_play: true,
}

export const SUBJECTS = [
  '물리학',
  '화학',
  '생물학',
  '수학',
  '지구과학',
  '공학',
  '컴퓨터과학',
  '의학',
  '약학',
  '간호학',
  '기타',
] as const

export const LEVEL_LABELS: Record<EducationLevel, string> = {
  elementary: '초등학교',
  middle_school: '중학교',
  high_school: '고등학교',
  university: '대학교',
  graduate: '대학원',
}

export function isEducationLevel(value: string): value is EducationLevel {
  return (EDUCATION_LEVELS as readonly string[]).includes(value)
}

/**
 * 레벨 키나 한국어 라벨을 레벨 키로 바꾼다. 알 수 없으면 null.
 */
export function normalizeLevel(value: string): EducationLevel | null {
  const trimmed = value.trim()
  if (isEducationLevel(trimmed)) return trimmed
  const match = EDUCATION_LEVELS.find(level => LEVEL_LABELS[level] === trimmed)
  return match ?? null
}

