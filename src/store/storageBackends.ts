/**
 * 저장 기능 구현
 *
 * - FileStorageBackend: 데이터 디렉토리의 JSON 파일 두 개
 * - MemoryStorageBackend: 파일 시스템에 쓸 수 없는 환경용, 프로세스가 끝나면 사라짐
 *
 * 어느 쪽을 쓸지는 시작할 때 probeStorage() 한 번으로 정한다.
 */

import { existsSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs'
import { createLogger, logError } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { ensureDir, readJson, serializeJson, writeJson } from './readWriteJson.js'
import { getStoragePaths, type StoragePaths } from './paths.js'
import { isPlainObject, parsePersonaList, parsePresetMap, type ParsedCollection } from './storedRecords.js'
import type { PersonaRecord } from '../types/persona.js'
import type {
  CollectionName,
  PresetMap,
  StorageBackend,
  StorageKind,
  StorageSnapshot,
} from './types.js'

const logger = createLogger('storage')

// ============ 형태 검사 ============

function isUnknownArray(data: unknown): data is unknown[] {
  return Array.isArray(data)
}

/** 검사에 실패한 항목은 건너뛰고 경고만 남긴다 */
function keepValid<T>(parsed: ParsedCollection<T>, file: string): T {
  if (parsed.problems.length > 0) {
    logger.warn(`Skipping invalid entries in ${file}: ${parsed.problems.join('; ')}`)
  }
  return parsed.value
}

// ============ 파일 ============

export class FileStorageBackend implements StorageBackend {
  readonly kind = 'file' as const
  readonly paths: StoragePaths

  constructor(dataDir: string) {
    this.paths = getStoragePaths(dataDir)
  }

  readPersonas(): PersonaRecord[] {
    const entries = readJson(this.paths.personasFile, { defaultValue: [], validate: isUnknownArray })
    return keepValid(parsePersonaList(entries), this.paths.personasFile)
  }

  writePersonas(personas: PersonaRecord[]): void {
    writeJson(this.paths.personasFile, personas)
  }

  readPresets(): PresetMap {
    const entries = readJson(this.paths.presetsFile, { defaultValue: {}, validate: isPlainObject })
    return keepValid(parsePresetMap(entries), this.paths.presetsFile)
  }

  writePresets(presets: PresetMap): void {
    writeJson(this.paths.presetsFile, presets)
  }

  replaceAll(snapshot: StorageSnapshot): void {
    const { personasFile } = this.paths
    const previousPersonas = existsSync(personasFile) ? readFileSync(personasFile, 'utf-8') : null

    writeJson(personasFile, snapshot.personas)
    try {
      writeJson(this.paths.presetsFile, snapshot.presets)
    } catch (e) {
      this.rollbackPersonas(previousPersonas)
      throw e
    }
  }

  sizeOf(collection: CollectionName): number {
    const file = collection === 'personas' ? this.paths.personasFile : this.paths.presetsFile
    return existsSync(file) ? statSync(file).size : 0
  }

  private rollbackPersonas(previous: string | null): void {
    try {
      if (previous === null) {
        rmSync(this.paths.personasFile, { force: true })
      } else {
        writeFileSync(this.paths.personasFile, previous, 'utf-8')
      }
    } catch (e) {
      logError(logger, 'Rollback of personas file failed', e, { file: this.paths.personasFile })
    }
  }
}

// ============ 메모리 ============

export class MemoryStorageBackend implements StorageBackend {
  readonly kind = 'memory' as const
  private personas: PersonaRecord[]
  private presets: PresetMap

  constructor(initial?: Partial<StorageSnapshot>) {
    this.personas = structuredClone(initial?.personas ?? [])
    this.presets = structuredClone(initial?.presets ?? {})
  }

  readPersonas(): PersonaRecord[] {
    return structuredClone(this.personas)
  }

  writePersonas(personas: PersonaRecord[]): void {
    this.personas = structuredClone(personas)
  }

  readPresets(): PresetMap {
    return structuredClone(this.presets)
  }

  writePresets(presets: PresetMap): void {
    this.presets = structuredClone(presets)
  }

  replaceAll(snapshot: StorageSnapshot): void {
    const personas = structuredClone(snapshot.personas)
    const presets = structuredClone(snapshot.presets)
    this.personas = personas
    this.presets = presets
  }

  sizeOf(collection: CollectionName): number {
    const data = collection === 'personas' ? this.personas : this.presets
    return Buffer.byteLength(serializeJson(data), 'utf-8')
  }
}

// ============ 선택 ============

export type StorageMode = StorageKind | 'auto'

/**
 * 데이터 디렉토리에 실제로 파일을 쓰고 지울 수 있는지 확인한다
 */
export function probeStorage(dataDir: string): StorageKind {
  const { probeFile } = getStoragePaths(dataDir)
  try {
    ensureDir(dataDir)
    writeFileSync(probeFile, 'ok', 'utf-8')
    rmSync(probeFile, { force: true })
    return 'file'
  } catch (e) {
    logger.warn(`Data directory is not writable, falling back to in-memory storage (${getErrorMessage(e)})`)
    return 'memory'
  }
}

export function createStorageBackend(dataDir: string, mode: StorageMode = 'auto'): StorageBackend {
  const kind = mode === 'auto' ? probeStorage(dataDir) : mode
  logger.debug(`Using ${kind} storage (${dataDir})`)
  return kind === 'file' ? new FileStorageBackend(dataDir) : new MemoryStorageBackend()
}
