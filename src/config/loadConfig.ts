import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.tutor-forge.yaml'

let cachedConfig: Config | null = null

/**
 * 설정 파일 경로 (전역 + 프로젝트)
 * 전역 설정이 바탕이고 프로젝트 설정이 그 위를 덮는다
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const home = homedir()
  const homePath = join(home, CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 홈 디렉토리에서 실행하면 한 번만 읽는다
  const isHomeCwd = projectDir === home

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 설정 로드
 * 순서: ~/.tutor-forge.yaml → 프로젝트 디렉토리 → 환경 변수
 * 형식 오류가 있으면 경고 후 기본값을 쓴다
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = mergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn(
      `Config file format error, using defaults: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    )
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** 비어 있거나 주석뿐인 파일은 빈 객체 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring config file that is not a mapping: ${filePath}`)
    return {}
  }
  return parsed
}

/**
 * override 의 값이 base 를 덮는다. 객체는 재귀적으로 합치고 배열은 교체한다.
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? mergeConfig(current, val) : val
  }
  return result
}

function parsePositiveInt(value: string): number | null {
  const n = Number(value)
  return Number.isInteger(n) && n > 0 ? n : null
}

/**
 * 환경 변수 덮어쓰기. 스키마 검증 뒤에 적용한다.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.TUTOR_DATA_DIR || env.TUTOR_MAX_PERSONAS) {
    const storage = { ...config.storage }
    if (env.TUTOR_DATA_DIR) storage.dataDir = env.TUTOR_DATA_DIR
    if (env.TUTOR_MAX_PERSONAS) {
      const max = parsePositiveInt(env.TUTOR_MAX_PERSONAS)
      if (max === null) {
        logger.warn(`Ignoring TUTOR_MAX_PERSONAS=${env.TUTOR_MAX_PERSONAS}, expected a positive integer`)
      } else {
        storage.maxPersonas = max
      }
    }
    config = { ...config, storage }
  }

  const apiKey = env.TUTOR_CHAT_API_KEY || env.OPENAI_API_KEY
  if (apiKey || env.TUTOR_CHAT_MODEL || env.TUTOR_CHAT_BASE_URL) {
    const chat = { ...config.chat }
    // 설정 파일의 키가 OPENAI_API_KEY 보다 우선
    if (env.TUTOR_CHAT_API_KEY) chat.apiKey = env.TUTOR_CHAT_API_KEY
    else if (!chat.apiKey && env.OPENAI_API_KEY) chat.apiKey = env.OPENAI_API_KEY
    if (env.TUTOR_CHAT_MODEL) chat.model = env.TUTOR_CHAT_MODEL
    if (env.TUTOR_CHAT_BASE_URL) chat.baseURL = env.TUTOR_CHAT_BASE_URL
    config = { ...config, chat }
  }

  return config
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
