/**
 * 저장소 타입
 */

import type { PersonaRecord, StoredPreset } from '../types/persona.js'

export interface JsonReadOptions<T> {
  /** 파일이 없거나 읽을 수 없을 때 돌려줄 값 */
  defaultValue: T
  /** 파싱된 값의 형태 검사 */
  validate: (data: unknown) => data is T
}

export interface JsonWriteOptions {
  /** 기본 2 */
  indent?: number
}

export type PresetMap = Record<string, StoredPreset>

export type CollectionName = 'personas' | 'presets'

export interface StorageSnapshot {
  personas: PersonaRecord[]
  presets: PresetMap
}

/** 백업 파일 형식 */
export interface BackupDocument {
  teachers: PersonaRecord[]
  presets: PresetMap
  backup_date: string
}

export interface StorageStats {
  persona_count: number
  preset_count: number
  personas_size_bytes: number
  presets_size_bytes: number
  total_size_bytes: number
}

export type StorageKind = 'file' | 'memory'

/**
 * 두 컬렉션을 통째로 읽고 쓰는 저장 기능
 *
 * 읽기는 실패하지 않는다 (없거나 손상되면 빈 컬렉션).
 * 쓰기는 실패 시 예외를 던지고 이전 내용을 유지해야 한다.
 */
export interface StorageBackend {
  readonly kind: StorageKind
  readPersonas(): PersonaRecord[]
  writePersonas(personas: PersonaRecord[]): void
  readPresets(): PresetMap
  writePresets(presets: PresetMap): void
  /** 두 컬렉션을 함께 교체한다. 하나라도 실패하면 둘 다 이전 상태. */
  replaceAll(snapshot: StorageSnapshot): void
  /** 직렬화된 크기 (bytes) */
  sizeOf(collection: CollectionName): number
}
