/**
 * 프리셋 카탈로그
 *
 * 내장 프리셋(읽기 전용)과 ConfigStore 의 사용자 프리셋을 하나의 목록으로 다룬다.
 * 이름이 겹치면 내장 프리셋이 이긴다.
 */

import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { err, ok, type Result } from '../shared/result.js'
import { getErrorMessage } from '../shared/assertError.js'
import { toDraft } from '../persona/buildPersona.js'
import { serializeJson } from '../store/readWriteJson.js'
import { BUILTIN_PRESETS } from './builtinPresets.js'
import { validatePresetConfig, type ValidationResult } from './schema.js'
import type { ConfigStore } from '../store/ConfigStore.js'
import type { PersonaRecord, PresetConfig, TutorDraft } from '../types/persona.js'

const logger = createLogger('preset')

export const PRESET_EXPORT_VERSION = '1.0'
const MAX_SUGGESTIONS = 5

export interface PresetExport {
  preset_name: string
  preset_config: PresetConfig
  export_version: string
}

export interface PresetsByOrigin {
  builtin: string[]
  user: string[]
}

export interface PersonalityProfile {
  teachingStyle: '이론 중심' | '실습 중심'
  interactionLevel: '일방적' | '상호작용적'
  difficultyLevel: '기초' | '고급'
  communicationStyle: '격식적' | '친근함'
  humorTendency: '진지함' | '유머러스'
}

export class PresetCatalog {
  constructor(
    private readonly store: ConfigStore,
    private readonly builtins: Readonly<Record<string, Readonly<PresetConfig>>> = BUILTIN_PRESETS
  ) {}

  isBuiltin(name: string): boolean {
    return Object.hasOwn(this.builtins, name)
  }

  /** 내장 프리셋은 복사본을 돌려준다 */
  getPreset(name: string): PresetConfig | null {
    const builtin = this.isBuiltin(name) ? this.builtins[name] : undefined
    if (builtin) return structuredClone(builtin)
    return this.store.getPreset(name)
  }

  listPresetNames(): string[] {
    const names = new Set([...Object.keys(this.builtins), ...Object.keys(this.store.listPresets())])
    // 코드 포인트 순서, 로케일과 무관
    return [...names].sort()
  }

  listByOrigin(): PresetsByOrigin {
    return {
      builtin: Object.keys(this.builtins),
      user: Object.keys(this.store.listPresets()).filter(name => !this.isBuiltin(name)),
    }
  }

  saveUserPreset(name: string, config: PresetConfig, description = ''): Result<void, AppError> {
    const trimmed = name.trim()
    if (!trimmed) {
      return err(AppError.validation('Preset name is required'))
    }
    if (this.isBuiltin(trimmed)) {
      return err(AppError.validation(`Cannot overwrite built-in preset: ${trimmed}`))
    }
    const check = this.validate(config)
    if (!check.ok) {
      return err(AppError.validation(`Invalid preset: ${trimmed}`, check.errors))
    }

    const stored: PresetConfig = { ...config, description, is_user_preset: true }
    if (!this.store.savePreset(trimmed, stored)) {
      return err(AppError.storage('Failed to save preset', trimmed))
    }
    return ok(undefined)
  }

  /** 내장 프리셋이면 아무것도 하지 않고 false */
  deleteUserPreset(name: string): boolean {
    if (this.isBuiltin(name)) {
      logger.warn(`Built-in preset cannot be deleted: ${name}`)
      return false
    }
    return this.store.deletePreset(name)
  }

  /**
   * 과목 / 수준으로 프리셋을 추천한다
   *
   * 정확히 일치하면 +2, 포함되면 +1 (대소문자 무시). 정확히 일치하는 값은 포함 조건도 만족한다.
   * 동점이면 카탈로그 순서(내장 → 사용자)를 유지한다.
   */
  suggest(subject: string, level: string): string[] {
    const wantSubject = subject.trim().toLowerCase()
    const wantLevel = level.trim().toLowerCase()

    const scored: Array<{ name: string; score: number }> = []
    for (const [name, preset] of this.catalogEntries()) {
      const presetSubject = preset.subject.toLowerCase()
      const presetLevel = preset.level.toLowerCase()
      let score = 0
      if (wantSubject) {
        if (presetSubject === wantSubject) score += 2
        if (presetSubject.includes(wantSubject)) score += 1
      }
      if (wantLevel) {
        if (presetLevel === wantLevel) score += 2
        if (presetLevel.includes(wantLevel)) score += 1
      }
      if (score > 0) scored.push({ name, score })
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, MAX_SUGGESTIONS)
      .map(entry => entry.name)
  }

  /**
   * 프리셋을 초안 위에 덮어쓴다. 이름을 찾지 못하면 base 를 그대로 돌려준다.
   */
  apply(name: string, base: TutorDraft): TutorDraft {
    const preset = this.getPreset(name)
    if (!preset) {
      logger.debug(`Preset not found, draft unchanged: ${name}`)
      return base
    }

    // subject, level, personality, voice_settings 중 프리셋에 있는 것만 덮어쓴다
    const updated: TutorDraft = { ...base }
    if (preset.subject !== undefined) updated.subject = preset.subject
    if (preset.level !== undefined) updated.level = preset.level
    if (preset.personality !== undefined) updated.personality = preset.personality
    if (preset.voice_settings !== undefined) updated.voice_settings = preset.voice_settings
    return updated
  }

  validate(config: unknown): ValidationResult {
    return validatePresetConfig(config)
  }

  // ============ 가져오기 / 내보내기 ============

  exportPreset(name: string): string | null {
    const preset = this.getPreset(name)
    if (!preset) return null
    const doc: PresetExport = {
      preset_name: name,
      preset_config: preset,
      export_version: PRESET_EXPORT_VERSION,
    }
    return serializeJson(doc)
  }

  /** @returns 가져온 프리셋 이름 */
  importPreset(json: string): Result<string, AppError> {
    let data: unknown
    try {
      data = JSON.parse(json)
    } catch (e) {
      return err(AppError.validation('Preset file is not valid JSON', [getErrorMessage(e)]))
    }

    if (!isRecord(data) || typeof data.preset_name !== 'string' || !isRecord(data.preset_config)) {
      return err(AppError.validation('Invalid preset file format', ['preset_name and preset_config are required']))
    }

    const check = this.validate(data.preset_config)
    if (!check.ok) {
      return err(AppError.validation(`Invalid preset: ${data.preset_name}`, check.errors))
    }

    const config = toPresetConfig(data.preset_config)
    const saved = this.saveUserPreset(data.preset_name, config, config.description ?? '')
    return saved.ok ? ok(data.preset_name.trim()) : saved
  }

  createPresetFromPersona(persona: PersonaRecord, name: string): Result<void, AppError> {
    const config: PresetConfig = {
      subject: persona.subject,
      level: persona.level,
      personality: { ...persona.personality },
      voice_settings: { ...persona.voice_settings },
    }
    const author = persona.name.trim() || '익명'
    return this.saveUserPreset(name, config, `${author}님의 설정을 기반으로 생성된 프리셋`)
  }

  /** 빠진 특성은 50 으로 본다 */
  describePersonality(name: string): PersonalityProfile | null {
    const preset = this.getPreset(name)
    if (!preset) return null
    const trait = (key: keyof PresetConfig['personality']) => preset.personality[key] ?? 50

    return {
      teachingStyle: trait('theory_vs_practice') < 50 ? '이론 중심' : '실습 중심',
      interactionLevel: trait('interaction_frequency') < 50 ? '일방적' : '상호작용적',
      difficultyLevel: trait('vocabulary_level') < 50 ? '기초' : '고급',
      communicationStyle: trait('friendliness') < 50 ? '격식적' : '친근함',
      humorTendency: trait('humor_level') < 30 ? '진지함' : '유머러스',
    }
  }

  private catalogEntries(): Array<[string, Readonly<PresetConfig>]> {
    const user = Object.entries(this.store.listPresets()).filter(([name]) => !this.isBuiltin(name))
    return [...Object.entries(this.builtins), ...user]
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** 검증을 통과한 객체에서 프리셋 필드만 골라낸다 */
function toPresetConfig(source: Record<string, unknown>): PresetConfig {
  const draft = toDraft(source)
  const config: PresetConfig = {
    subject: draft.subject ?? '',
    level: draft.level ?? '',
    personality: draft.personality ?? {},
  }
  if (draft.voice_settings) config.voice_settings = draft.voice_settings
  if (typeof source.description === 'string') config.description = source.description
  return config
}
