/**
 * CLI 명령이 공유하는 설정 / 저장소
 */

import { clearConfigCache, loadConfig, type Config } from '../config/index.js'
import { createConfigStore, type ConfigStore } from '../store/index.js'
import { PresetCatalog } from '../preset/PresetCatalog.js'
import type { PersonaRecord } from '../types/persona.js'

export interface CliContext {
  config: Config
  store: ConfigStore
  catalog: PresetCatalog
}

let context: CliContext | null = null

export async function getContext(): Promise<CliContext> {
  if (context) return context
  const config = await loadConfig()
  const store = createConfigStore(config.storage)
  context = { config, store, catalog: new PresetCatalog(store) }
  return context
}

/**
 * 전체 ID 또는 겹치지 않는 ID 앞부분으로 페르소나를 찾는다
 */
export function findPersona(store: ConfigStore, idOrPrefix: string): PersonaRecord | null {
  const exact = store.getPersona(idOrPrefix)
  if (exact) return exact
  const matches = store.listPersonas().filter(p => p.id.startsWith(idOrPrefix))
  return matches.length === 1 ? (matches[0] ?? null) : null
}

/** 다음 getContext() 호출에서 설정과 저장소를 다시 만든다 */
export function resetContext(): void {
  context = null
  clearConfigCache()
}
