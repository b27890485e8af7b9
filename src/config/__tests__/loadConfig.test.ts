/**
 * loadConfig tests
 * 파일 병합, 캐시, 잘못된 설정, 환경 변수 덮어쓰기
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const TEST_DIR = join(tmpdir(), `tutor-config-test-${Date.now()}`)
const PROJECT_DIR = join(TEST_DIR, 'project')

// 실제 ~/.tutor-forge.yaml 을 읽지 않도록 홈 디렉토리를 바꾼다
vi.mock('os', async importOriginal => {
  const os = await importOriginal<typeof import('os')>()
  return { ...os, homedir: () => TEST_DIR }
})

const { loadConfig, getDefaultConfig, clearConfigCache, applyEnvOverrides, CONFIG_FILENAME } =
  await import('../loadConfig.js')

const ENV_KEYS = [
  'TUTOR_DATA_DIR',
  'TUTOR_MAX_PERSONAS',
  'TUTOR_CHAT_API_KEY',
  'TUTOR_CHAT_MODEL',
  'TUTOR_CHAT_BASE_URL',
  'OPENAI_API_KEY',
]

beforeEach(() => {
  clearConfigCache()
  mkdirSync(PROJECT_DIR, { recursive: true })
  for (const key of ENV_KEYS) vi.stubEnv(key, '')
})

afterEach(() => {
  clearConfigCache()
  vi.unstubAllEnvs()
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('getDefaultConfig', () => {
  it('should return the documented defaults', () => {
    const config = getDefaultConfig()

    expect(config.storage).toEqual({ maxPersonas: 20, mode: 'auto' })
    expect(config.chat).toEqual({ model: 'gpt-4o-mini', maxTokens: 2000, temperature: 0.7, historyWindow: 10 })
    expect(config.speech).toEqual({ enabled: true, model: 'tts-1', voice: 'nova' })
  })
})

describe('loadConfig', () => {
  it('should return defaults when no config file exists', async () => {
    expect(await loadConfig({ cwd: PROJECT_DIR })).toEqual(getDefaultConfig())
  })

  it('should load the project file', async () => {
    writeFileSync(
      join(PROJECT_DIR, CONFIG_FILENAME),
      `
storage:
  maxPersonas: 5
  mode: memory
chat:
  model: local-model
  baseURL: http://localhost:1234/v1
`
    )

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.storage).toEqual({ maxPersonas: 5, mode: 'memory' })
    expect(config.chat.model).toBe('local-model')
    expect(config.chat.baseURL).toBe('http://localhost:1234/v1')
    expect(config.chat.maxTokens).toBe(2000)
  })

  it('should merge the project file over the global file', async () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'chat:\n  model: global-model\n  temperature: 0.2\n')
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'chat:\n  model: project-model\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.chat.model).toBe('project-model')
    expect(config.chat.temperature).toBe(0.2)
  })

  it('should treat an empty file as defaults', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), '# nothing here\n')
    expect(await loadConfig({ cwd: PROJECT_DIR })).toEqual(getDefaultConfig())
  })

  it('should fall back to defaults for an invalid file', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'speech:\n  voice: robot\n')
    expect(await loadConfig({ cwd: PROJECT_DIR })).toEqual(getDefaultConfig())
  })

  it('should cache the loaded config', async () => {
    const first = await loadConfig({ cwd: PROJECT_DIR })
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'chat:\n  model: later\n')

    expect(await loadConfig({ cwd: PROJECT_DIR })).toBe(first)

    clearConfigCache()
    expect((await loadConfig({ cwd: PROJECT_DIR })).chat.model).toBe('later')
  })
})

describe('applyEnvOverrides', () => {
  it('should override storage settings', () => {
    vi.stubEnv('TUTOR_DATA_DIR', '/tmp/tutor-data')
    vi.stubEnv('TUTOR_MAX_PERSONAS', '3')

    expect(applyEnvOverrides(getDefaultConfig()).storage).toEqual({
      dataDir: '/tmp/tutor-data',
      maxPersonas: 3,
      mode: 'auto',
    })
  })

  it('should ignore a non-positive persona limit', () => {
    vi.stubEnv('TUTOR_MAX_PERSONAS', '0')
    expect(applyEnvOverrides(getDefaultConfig()).storage.maxPersonas).toBe(20)
  })

  it('should prefer TUTOR_CHAT_API_KEY over the file and OPENAI_API_KEY', () => {
    vi.stubEnv('TUTOR_CHAT_API_KEY', 'test-tutor-key')
    vi.stubEnv('OPENAI_API_KEY', 'test-openai-key')
    const config = getDefaultConfig()

    const result = applyEnvOverrides({ ...config, chat: { ...config.chat, apiKey: 'test-file-key' } })
    expect(result.chat.apiKey).toBe('test-tutor-key')
  })

  it('should use OPENAI_API_KEY only when the file has no key', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai-key')
    const config = getDefaultConfig()

    expect(applyEnvOverrides(config).chat.apiKey).toBe('test-openai-key')
    expect(applyEnvOverrides({ ...config, chat: { ...config.chat, apiKey: 'test-file-key' } }).chat.apiKey).toBe(
      'test-file-key'
    )
  })

  it('should override the model and base URL', () => {
    vi.stubEnv('TUTOR_CHAT_MODEL', 'env-model')
    vi.stubEnv('TUTOR_CHAT_BASE_URL', 'http://localhost:11434/v1')

    const { chat } = applyEnvOverrides(getDefaultConfig())
    expect(chat.model).toBe('env-model')
    expect(chat.baseURL).toBe('http://localhost:11434/v1')
  })
})
