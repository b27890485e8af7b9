/**
 * 파일이나 백업에서 읽은 레코드를 검사해 타입이 있는 값으로 바꾼다
 *
 * 페르소나 레벨은 한국어 라벨("고등학교")로 저장된 경우에도 레벨 키로 바꾼다.
 */

import { err, ok, type Result } from '../shared/result.js'
import { PERSONA_SCHEMA_VERSION, toDraft } from '../persona/buildPersona.js'
import { PERSONALITY_DEFAULTS, VOICE_DEFAULTS, normalizeLevel } from '../persona/ranges.js'
import { validatePersona } from '../persona/validatePersona.js'
import { validatePresetConfig } from '../preset/schema.js'
import type { PersonaRecord, StoredPreset } from '../types/persona.js'
import type { PresetMap } from './types.js'

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback
}

export function parseStoredPersona(entry: unknown): Result<PersonaRecord, string[]> {
  if (!isPlainObject(entry)) return err(['persona must be an object'])

  const errors: string[] = []
  if (typeof entry.id !== 'string' || entry.id === '') errors.push('id is required')
  errors.push(...validatePersona(entry).errors)

  const level = typeof entry.level === 'string' ? normalizeLevel(entry.level) : null
  if (errors.length > 0 || level === null || typeof entry.id !== 'string') {
    return err(errors)
  }

  // 검증을 통과했으므로 12개 특성이 모두 있다. 기본값은 타입을 채우는 용도.
  const draft = toDraft(entry)
  return ok({
    id: entry.id,
    created_at: stringOr(entry.created_at, ''),
    version: stringOr(entry.version, PERSONA_SCHEMA_VERSION),
    name: draft.name ?? '',
    title: draft.title ?? '',
    background: draft.background ?? '',
    subject: draft.subject ?? '',
    level,
    personality: { ...PERSONALITY_DEFAULTS, ...draft.personality },
    voice_settings: { ...VOICE_DEFAULTS, ...draft.voice_settings },
    document_refs: draft.document_refs ?? [],
    use_general_knowledge: draft.use_general_knowledge ?? true,
  })
}

export function parseStoredPreset(entry: unknown): Result<StoredPreset, string[]> {
  const check = validatePresetConfig(entry)
  if (!check.ok || !isPlainObject(entry)) {
    return err(check.errors)
  }

  const draft = toDraft(entry)
  const preset: StoredPreset = {
    subject: draft.subject ?? '',
    level: draft.level ?? '',
    personality: draft.personality ?? {},
    created_at: stringOr(entry.created_at, ''),
    updated_at: stringOr(entry.updated_at, ''),
  }
  if (draft.voice_settings) preset.voice_settings = draft.voice_settings
  if (typeof entry.description === 'string') preset.description = entry.description
  if (typeof entry.is_user_preset === 'boolean') preset.is_user_preset = entry.is_user_preset
  return ok(preset)
}

export interface ParsedCollection<T> {
  value: T
  /** "teachers[2]: name is required" 형식 */
  problems: string[]
}

export function parsePersonaList(entries: unknown[], label = 'teachers'): ParsedCollection<PersonaRecord[]> {
  const value: PersonaRecord[] = []
  const problems: string[] = []
  entries.forEach((entry, index) => {
    const parsed = parseStoredPersona(entry)
    if (parsed.ok) value.push(parsed.value)
    else problems.push(...parsed.error.map(message => `${label}[${index}]: ${message}`))
  })
  return { value, problems }
}

export function parsePresetMap(entries: Record<string, unknown>, label = 'presets'): ParsedCollection<PresetMap> {
  const value: PresetMap = {}
  const problems: string[] = []
  for (const [name, entry] of Object.entries(entries)) {
    const parsed = parseStoredPreset(entry)
    if (parsed.ok) value[name] = parsed.value
    else problems.push(...parsed.error.map(message => `${label}.${name}: ${message}`))
  }
  return { value, problems }
}
