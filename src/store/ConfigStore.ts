/**
 * 페르소나 / 사용자 프리셋 저장소
 *
 * 모든 변경은 "전체 읽기 → 메모리에서 수정 → 전체 쓰기" 이다.
 * 실패는 이 경계 밖으로 예외를 던지지 않고 false 나 Result 로 알린다.
 * 단일 작성자 가정: 여러 프로세스가 동시에 쓰면 마지막 쓰기가 이긴다.
 */

import { createLogger, logError } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { err, ok, type Result } from '../shared/result.js'
import { getErrorMessage } from '../shared/assertError.js'
import { daysAgo, formatTime, now, parseTimestamp } from '../shared/formatTime.js'
import { draftToPersona, toDraft } from '../persona/buildPersona.js'
import { collectIssues, personaRecordSchema } from '../preset/schema.js'
import { serializeJson } from './readWriteJson.js'
import { isPlainObject, parsePersonaList, parsePresetMap } from './storedRecords.js'
import type { PersonaRecord, PresetConfig, StoredPreset } from '../types/persona.js'
import type { BackupDocument, PresetMap, StorageBackend, StorageStats } from './types.js'

const logger = createLogger('config-store')

export const DEFAULT_MAX_PERSONAS = 20

export interface ConfigStoreOptions {
  /** 보관할 최대 페르소나 수, 오래된 것부터 삭제 */
  maxPersonas?: number
}

export class ConfigStore {
  readonly maxPersonas: number

  constructor(
    private readonly backend: StorageBackend,
    options: ConfigStoreOptions = {}
  ) {
    this.maxPersonas = Math.max(1, options.maxPersonas ?? DEFAULT_MAX_PERSONAS)
  }

  get storageKind() {
    return this.backend.kind
  }

  // ============ 페르소나 ============

  savePersona(record: PersonaRecord): boolean {
    const personas = this.backend.readPersonas()
    personas.push(record)
    const kept = personas.slice(-this.maxPersonas)

    if (!this.tryWrite('save persona', () => this.backend.writePersonas(kept), { personaId: record.id })) {
      return false
    }
    const evicted = personas.length - kept.length
    if (evicted > 0) {
      logger.debug(`Evicted ${evicted} oldest persona(s), limit ${this.maxPersonas}`)
    }
    logger.info(`Saved persona: ${record.name} (${record.id})`)
    return true
  }

  /** 저장된 순서 그대로 */
  listPersonas(): PersonaRecord[] {
    return this.backend.readPersonas()
  }

  /** created_at 최신순 */
  listRecentPersonas(limit = 10): PersonaRecord[] {
    return this.backend
      .readPersonas()
      .sort((a, b) => compareDesc(a.created_at, b.created_at))
      .slice(0, Math.max(0, limit))
  }

  getPersona(id: string): PersonaRecord | null {
    return this.backend.readPersonas().find(p => p.id === id) ?? null
  }

  /** 없는 ID여도 성공, I/O 실패일 때만 false */
  deletePersona(id: string): boolean {
    const personas = this.backend.readPersonas()
    const remaining = personas.filter(p => p.id !== id)
    if (remaining.length === personas.length) {
      logger.debug(`Persona not found, nothing to delete: ${id}`)
      return true
    }
    const written = this.tryWrite('delete persona', () => this.backend.writePersonas(remaining), { personaId: id })
    if (written) logger.info(`Deleted persona: ${id}`)
    return written
  }

  exportPersona(id: string): string | null {
    const persona = this.getPersona(id)
    return persona ? serializeJson(persona) : null
  }

  /**
   * JSON 으로 내보낸 페르소나를 새 ID로 가져온다
   */
  importPersona(json: string): Result<PersonaRecord, AppError> {
    const parsed = parseJson(json)
    if (!parsed.ok) {
      return err(AppError.validation('Persona file is not valid JSON', [parsed.error]))
    }

    const check = collectIssues(personaRecordSchema, parsed.value)
    if (!check.ok) {
      return err(AppError.validation('Persona file failed validation', check.errors))
    }

    const record = draftToPersona(isPlainObject(parsed.value) ? toDraft(parsed.value) : {})
    if (!this.savePersona(record)) {
      return err(AppError.storage('Failed to save imported persona', 'write failed'))
    }
    return ok(record)
  }

  /**
   * created_at 이 days 일보다 오래된 페르소나를 지운다. 날짜를 읽을 수 없는 레코드는 남긴다.
   * @returns 삭제한 개수
   */
  cleanOldPersonas(days = 30): number {
    const cutoff = daysAgo(days)
    const personas = this.backend.readPersonas()
    const active = personas.filter(p => {
      const created = parseTimestamp(p.created_at ?? '')
      return created === null || created > cutoff
    })
    const removed = personas.length - active.length
    if (removed === 0) return 0

    if (!this.tryWrite('clean old personas', () => this.backend.writePersonas(active))) {
      return 0
    }
    logger.info(`Removed ${removed} persona(s) older than ${days} days`)
    return removed
  }

  // ============ 프리셋 ============

  /** upsert. 처음 저장한 created_at 은 유지하고 updated_at 만 갱신 */
  savePreset(name: string, config: PresetConfig): boolean {
    const presets = this.backend.readPresets()
    const timestamp = now()
    const stored: StoredPreset = {
      ...config,
      created_at: presets[name]?.created_at ?? timestamp,
      updated_at: timestamp,
    }
    const next: PresetMap = { ...presets, [name]: stored }

    const written = this.tryWrite('save preset', () => this.backend.writePresets(next), { presetName: name })
    if (written) logger.info(`Saved preset: ${name}`)
    return written
  }

  getPreset(name: string): StoredPreset | null {
    const presets = this.backend.readPresets()
    return Object.hasOwn(presets, name) ? (presets[name] ?? null) : null
  }

  listPresets(): PresetMap {
    return this.backend.readPresets()
  }

  deletePreset(name: string): boolean {
    const presets = this.backend.readPresets()
    if (!Object.hasOwn(presets, name)) {
      return true
    }
    const { [name]: _removed, ...rest } = presets
    const written = this.tryWrite('delete preset', () => this.backend.writePresets(rest), { presetName: name })
    if (written) logger.info(`Deleted preset: ${name}`)
    return written
  }

  // ============ 백업 / 복원 ============

  exportAll(): string {
    const backup: BackupDocument = {
      teachers: this.backend.readPersonas(),
      presets: this.backend.readPresets(),
      backup_date: formatTime(now(), 'yyyy-MM-dd HH:mm:ss'),
    }
    return serializeJson(backup)
  }

  /**
   * 백업으로 두 컬렉션을 교체한다. 검증에 실패하면 아무것도 바꾸지 않는다.
   */
  restoreAll(snapshot: string): Result<void, AppError> {
    const parsed = parseJson(snapshot)
    if (!parsed.ok) {
      return err(AppError.validation('Backup is not valid JSON', [parsed.error]))
    }

    const doc = parsed.value
    if (!isPlainObject(doc)) {
      return err(AppError.validation('Invalid backup format', ['backup must be an object']))
    }

    const problems: string[] = []
    if (!('teachers' in doc)) problems.push('teachers is required')
    else if (!Array.isArray(doc.teachers)) problems.push('teachers must be a list of persona records')
    if (!('presets' in doc)) problems.push('presets is required')
    else if (!isPlainObject(doc.presets)) problems.push('presets must be an object of presets')
    if (!Array.isArray(doc.teachers) || !isPlainObject(doc.presets)) {
      return err(AppError.validation('Invalid backup format', problems))
    }

    // 항목 하나라도 잘못되면 아무것도 바꾸지 않는다
    const personas = parsePersonaList(doc.teachers)
    const presets = parsePresetMap(doc.presets)
    const entryProblems = [...personas.problems, ...presets.problems]
    if (entryProblems.length > 0) {
      return err(AppError.validation('Backup contains invalid records', entryProblems))
    }

    try {
      this.backend.replaceAll({ personas: personas.value, presets: presets.value })
    } catch (e) {
      logError(logger, 'Failed to restore backup', e)
      return err(AppError.storage('Failed to restore backup', e))
    }
    logger.info(`Restored ${personas.value.length} persona(s), ${Object.keys(presets.value).length} preset(s)`)
    return ok(undefined)
  }

  stats(): StorageStats {
    const personasSize = this.backend.sizeOf('personas')
    const presetsSize = this.backend.sizeOf('presets')
    return {
      persona_count: this.backend.readPersonas().length,
      preset_count: Object.keys(this.backend.readPresets()).length,
      personas_size_bytes: personasSize,
      presets_size_bytes: presetsSize,
      total_size_bytes: personasSize + presetsSize,
    }
  }

  private tryWrite(action: string, write: () => void, context?: Record<string, unknown>): boolean {
    try {
      write()
      return true
    } catch (e) {
      logError(logger, `Failed to ${action}`, e, { storage: this.backend.kind, ...context })
      return false
    }
  }
}

function compareDesc(a: string | undefined, b: string | undefined): number {
  const left = a ?? ''
  const right = b ?? ''
  if (left === right) return 0
  return left < right ? 1 : -1
}

function parseJson(text: string): Result<unknown, string> {
  try {
    return ok(JSON.parse(text))
  } catch (e) {
    return err(getErrorMessage(e))
  }
}
