/**
 * readWriteJson 테스트
 *
 * - readJson: 읽기, 기본값, 형태 검사
 * - writeJson: 원자적 쓰기, 디렉토리 자동 생성
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, existsSync, readFileSync, rmSync, mkdirSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { readJson, writeJson, serializeJson, ensureDir } from '../src/store/readWriteJson.js'

let testDir: string

const isStringList = (data: unknown): data is string[] =>
  Array.isArray(data) && data.every(item => typeof item === 'string')

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'tutor-rw-test-'))
})

afterEach(() => {
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true })
  }
})

describe('readJson', () => {
  it('should read a file that passes validation', () => {
    const filepath = join(testDir, 'data.json')
    writeFileSync(filepath, JSON.stringify(['a', 'b']))

    expect(readJson(filepath, { defaultValue: [], validate: isStringList })).toEqual(['a', 'b'])
  })

  it('should return defaultValue for a missing file', () => {
    const result = readJson(join(testDir, 'missing.json'), { defaultValue: ['fallback'], validate: isStringList })
    expect(result).toEqual(['fallback'])
  })

  it('should return defaultValue for invalid JSON', () => {
    const filepath = join(testDir, 'bad.json')
    writeFileSync(filepath, 'not valid json {{{')

    expect(readJson(filepath, { defaultValue: [], validate: isStringList })).toEqual([])
  })

  it('should return defaultValue when the shape is wrong', () => {
    const filepath = join(testDir, 'object.json')
    writeFileSync(filepath, JSON.stringify({ key: 'value' }))

    expect(readJson(filepath, { defaultValue: [], validate: isStringList })).toEqual([])
  })
})

describe('writeJson', () => {
  it('should create parent directories', () => {
    const filepath = join(testDir, 'nested', 'deep', 'data.json')
    writeJson(filepath, { ok: true })

    expect(JSON.parse(readFileSync(filepath, 'utf-8'))).toEqual({ ok: true })
  })

  it('should not leave a temp file behind', () => {
    const filepath = join(testDir, 'data.json')
    writeJson(filepath, [1, 2, 3])

    expect(existsSync(`${filepath}.tmp`)).toBe(false)
  })

  it('should keep Hangul unescaped with 2-space indent', () => {
    const filepath = join(testDir, 'data.json')
    writeJson(filepath, { name: '김선생' })

    expect(readFileSync(filepath, 'utf-8')).toBe('{\n  "name": "김선생"\n}')
  })

  it('should keep the previous content when the write fails', () => {
    const filepath = join(testDir, 'data.json')
    writeJson(filepath, ['before'])
    // 임시 파일 자리에 디렉토리가 있으면 쓰기가 실패한다
    mkdirSync(`${filepath}.tmp`)

    expect(() => writeJson(filepath, ['after'])).toThrow()
    expect(JSON.parse(readFileSync(filepath, 'utf-8'))).toEqual(['before'])
  })

  it('should honour the indent option and leave no temp file', () => {
    const filepath = join(testDir, 'compact.json')
    writeJson(filepath, { a: 1 }, { indent: 0 })

    expect(readFileSync(filepath, 'utf-8')).toBe('{"a":1}')
    expect(existsSync(`${filepath}.tmp`)).toBe(false)
  })
})

describe('serializeJson', () => {
  it('should pretty-print with the given indent', () => {
    expect(serializeJson({ a: [1] }, 4)).toBe('{\n    "a": [\n        1\n    ]\n}')
  })
})

describe('ensureDir', () => {
  it('should be a no-op for an existing directory', () => {
    ensureDir(testDir)
    ensureDir(join(testDir, 'x'))
    expect(existsSync(join(testDir, 'x'))).toBe(true)
  })
})
