/**
 * 설정 그룹들을 모아 페르소나 레코드를 만든다
 *
 * 여기서는 검증하지 않는다. 저장 전에 validatePersona() 를 따로 호출할 것.
 */

import { generateId } from '../shared/generateId.js'
import { now } from '../shared/formatTime.js'
import { TRAIT_NAMES } from '../types/persona.js'
import { PERSONALITY_DEFAULTS, VOICE_DEFAULTS, normalizeLevel } from './ranges.js'
import type {
  DocumentRef,
  EducationLevel,
  PersonaRecord,
  PersonalityTraits,
  TutorDraft,
  VoiceSettings,
} from '../types/persona.js'

export const PERSONA_SCHEMA_VERSION = '1.0'

const DEFAULT_LEVEL: EducationLevel = 'high_school'
const DEFAULT_SUBJECT = '물리학'

// ============ 설정 그룹 ============

/** 핵심 기능 */
export type CoreSettings = Pick<
  PersonalityTraits,
  'explanation_detail' | 'question_sensitivity' | 'safety_emphasis' | 'theory_vs_practice'
>

/** 대화 스타일 */
export type StyleSettings = Pick<
  PersonalityTraits,
  'natural_speech' | 'adaptability' | 'encouragement' | 'response_speed'
>

/** 개성 */
export type PersonalitySettings = Pick<
  PersonalityTraits,
  'friendliness' | 'humor_level' | 'interaction_frequency' | 'vocabulary_level'
>

export interface SpecialtySettings {
  subject: string
  level: EducationLevel
}

export interface DocumentSettings {
  files: DocumentRef[]
  useGeneralKnowledge: boolean
}

export interface IdentitySettings {
  name: string
  title: string
  background: string
}

export function assemblePersona(
  core: CoreSettings,
  style: StyleSettings,
  personality: PersonalitySettings,
  specialty: SpecialtySettings,
  documents: DocumentSettings,
  identity: IdentitySettings,
  voice: VoiceSettings
): PersonaRecord {
  return {
    id: generateId(),
    created_at: now(),
    version: PERSONA_SCHEMA_VERSION,
    name: identity.name,
    title: identity.title,
    background: identity.background,
    subject: specialty.subject,
    level: specialty.level,
    personality: { ...core, ...style, ...personality },
    voice_settings: { ...voice },
    document_refs: documents.files.map(file => ({ name: file.name, size: file.size })),
    use_general_knowledge: documents.useGeneralKnowledge,
  }
}

// ============ 초안 ============

export function getDefaultDraft(): TutorDraft {
  return {
    name: '',
    title: '선생님',
    background: '',
    subject: DEFAULT_SUBJECT,
    level: DEFAULT_LEVEL,
    personality: { ...PERSONALITY_DEFAULTS },
    voice_settings: { ...VOICE_DEFAULTS },
    document_refs: [],
    use_general_knowledge: true,
  }
}

/**
 * 프리셋이 적용된 초안을 새 페르소나 레코드로 만든다. 빠진 값은 기본값으로 채운다.
 */
export function draftToPersona(draft: TutorDraft): PersonaRecord {
  return {
    id: generateId(),
    created_at: now(),
    version: PERSONA_SCHEMA_VERSION,
    name: draft.name ?? '',
    title: draft.title ?? '',
    background: draft.background ?? '',
    subject: draft.subject ?? DEFAULT_SUBJECT,
    level: (draft.level && normalizeLevel(draft.level)) || DEFAULT_LEVEL,
    personality: { ...PERSONALITY_DEFAULTS, ...draft.personality },
    voice_settings: { ...VOICE_DEFAULTS, ...draft.voice_settings },
    document_refs: draft.document_refs ?? [],
    use_general_knowledge: draft.use_general_knowledge ?? true,
  }
}

// ============ 외부 입력 ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key]
  return typeof value === 'string' ? value : undefined
}

function pickTraits(value: unknown): Partial<PersonalityTraits> | undefined {
  if (!isRecord(value)) return undefined
  const traits: Partial<PersonalityTraits> = {}
  for (const trait of TRAIT_NAMES) {
    const score = value[trait]
    if (typeof score === 'number') traits[trait] = score
  }
  return traits
}

function pickVoice(value: unknown): Partial<VoiceSettings> | undefined {
  if (!isRecord(value)) return undefined
  const voice: Partial<VoiceSettings> = {}
  for (const key of ['speed', 'pitch', 'volume'] as const) {
    const n = value[key]
    if (typeof n === 'number') voice[key] = n
  }
  if (typeof value.auto_play === 'boolean') voice.auto_play = value.auto_play
  return voice
}

function pickDocuments(value: unknown): DocumentRef[] | undefined {
  if (!Array.isArray(value)) return undefined
  return value.filter(isRecord).flatMap(doc =>
    typeof doc.name === 'string' && typeof doc.size === 'number' ? [{ name: doc.name, size: doc.size }] : []
  )
}

/**
 * 파싱된 JSON 객체에서 초안이 다루는 필드만 골라낸다
 */
export function toDraft(source: Record<string, unknown>): TutorDraft {
  const draft: TutorDraft = {
    name: pickString(source, 'name'),
    title: pickString(source, 'title'),
    background: pickString(source, 'background'),
    subject: pickString(source, 'subject'),
    level: pickString(source, 'level'),
    personality: pickTraits(source.personality),
    voice_settings: pickVoice(source.voice_settings),
    document_refs: pickDocuments(source.document_refs),
  }
  if (typeof source.use_general_knowledge === 'boolean') {
    draft.use_general_knowledge = source.use_general_knowledge
  }
  return draft
}
