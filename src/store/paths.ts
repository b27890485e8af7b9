/**
 * 저장 경로
 *
 * 데이터 디렉토리 우선순위:
 * 1. 명시적으로 전달된 경로 (설정 파일의 storage.dataDir)
 * 2. 환경 변수 TUTOR_DATA_DIR
 * 3. 기본값 ./data
 */

import { isAbsolute, join } from 'path'

const DEFAULT_DATA_DIR_NAME = 'data'

export const FILE_NAMES = {
  PERSONAS: 'teachers.json',
  PRESETS: 'presets.json',
  PROBE: '.write-test',
} as const

export function resolveDataDir(dir?: string): string {
  const chosen = dir || process.env.TUTOR_DATA_DIR || DEFAULT_DATA_DIR_NAME
  return isAbsolute(chosen) ? chosen : join(process.cwd(), chosen)
}

export function getStoragePaths(dataDir: string) {
  return {
    dataDir,
    personasFile: join(dataDir, FILE_NAMES.PERSONAS),
    presetsFile: join(dataDir, FILE_NAMES.PRESETS),
    probeFile: join(dataDir, FILE_NAMES.PROBE),
  }
}

export type StoragePaths = ReturnType<typeof getStoragePaths>
