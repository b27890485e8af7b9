/**
 * @entry Store 모듈
 *
 * 페르소나 / 프리셋 JSON 저장소
 */

import { createLogger } from '../shared/logger.js'
import { ConfigStore } from './ConfigStore.js'
import { resolveDataDir } from './paths.js'
import { createStorageBackend } from './storageBackends.js'
import type { StorageConfig } from '../config/schema.js'

const logger = createLogger('store')

export { ConfigStore, DEFAULT_MAX_PERSONAS, type ConfigStoreOptions } from './ConfigStore.js'
export {
  FileStorageBackend,
  MemoryStorageBackend,
  createStorageBackend,
  probeStorage,
  type StorageMode,
} from './storageBackends.js'
export { FILE_NAMES, getStoragePaths, resolveDataDir, type StoragePaths } from './paths.js'
export { ensureDir, readJson, serializeJson, writeJson } from './readWriteJson.js'
export type * from './types.js'

/** 설정의 storage 섹션으로 저장소를 만든다 */
export function createConfigStore(config: StorageConfig): ConfigStore {
  const dataDir = resolveDataDir(config.dataDir)
  const backend = createStorageBackend(dataDir, config.mode)
  if (backend.kind === 'memory' && config.mode !== 'memory') {
    logger.warn('Changes will not be kept after this process exits')
  }
  return new ConfigStore(backend, { maxPersonas: config.maxPersonas })
}
