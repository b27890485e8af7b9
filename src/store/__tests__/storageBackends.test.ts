import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import {
  FileStorageBackend,
  MemoryStorageBackend,
  createStorageBackend,
  probeStorage,
} from '../storageBackends.js'
import { serializeJson } from '../readWriteJson.js'
import { draftToPersona } from '../../persona/buildPersona.js'
import type { PresetMap } from '../types.js'

let dataDir: string

const presets: PresetMap = {
  '내 프리셋': {
    subject: '수학',
    level: '중학교',
    personality: { friendliness: 90, humor_level: 70, encouragement: 90, explanation_detail: 60 },
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
  },
}

beforeEach(() => {
  dataDir = mkdtempSync(join(tmpdir(), 'tutor-backend-test-'))
})

afterEach(() => {
  rmSync(dataDir, { recursive: true, force: true })
})

describe('FileStorageBackend', () => {
  it('should persist both collections across instances', () => {
    const persona = draftToPersona({ name: '김선생' })
    const writer = new FileStorageBackend(dataDir)
    writer.writePersonas([persona])
    writer.writePresets(presets)

    const reader = new FileStorageBackend(dataDir)
    expect(reader.readPersonas()).toEqual([persona])
    expect(reader.readPresets()).toEqual(presets)
    expect(existsSync(join(dataDir, 'teachers.json'))).toBe(true)
    expect(existsSync(join(dataDir, 'presets.json'))).toBe(true)
  })

  it('should read empty collections when files are missing or corrupt', () => {
    const backend = new FileStorageBackend(dataDir)
    expect(backend.readPersonas()).toEqual([])

    writeFileSync(join(dataDir, 'teachers.json'), '{ broken')
    writeFileSync(join(dataDir, 'presets.json'), '[]')
    expect(backend.readPersonas()).toEqual([])
    expect(backend.readPresets()).toEqual({})
  })

  it('should skip invalid entries and normalise level labels on read', () => {
    const valid = draftToPersona({ name: '정상' })
    const labelled = { ...draftToPersona({ name: '라벨' }), level: '대학교' }
    writeFileSync(
      join(dataDir, 'teachers.json'),
      serializeJson([valid, { id: 'p1', name: 'broken' }, labelled, 'not a record'])
    )
    writeFileSync(join(dataDir, 'presets.json'), serializeJson({ ...presets, broken: { description: 'x' } }))

    const backend = new FileStorageBackend(dataDir)
    expect(backend.readPersonas().map(p => [p.name, p.level])).toEqual([
      ['정상', 'high_school'],
      ['라벨', 'university'],
    ])
    expect(backend.readPresets()).toEqual(presets)
  })

  it('should restore the personas file when writing presets fails during replaceAll', () => {
    const backend = new FileStorageBackend(dataDir)
    const before = draftToPersona({ name: '이전' })
    backend.writePersonas([before])
    const original = readFileSync(join(dataDir, 'teachers.json'), 'utf-8')
    mkdirSync(join(dataDir, 'presets.json.tmp'))

    expect(() =>
      backend.replaceAll({ personas: [draftToPersona({ name: '이후' })], presets })
    ).toThrow()

    expect(readFileSync(join(dataDir, 'teachers.json'), 'utf-8')).toBe(original)
    expect(backend.readPersonas().map(p => p.name)).toEqual(['이전'])
  })

  it('should report file sizes', () => {
    const backend = new FileStorageBackend(dataDir)
    expect(backend.sizeOf('presets')).toBe(0)

    backend.writePresets(presets)
    expect(backend.sizeOf('presets')).toBe(Buffer.byteLength(serializeJson(presets), 'utf-8'))
  })
})

describe('MemoryStorageBackend', () => {
  it('should not share references with callers', () => {
    const backend = new MemoryStorageBackend()
    const persona = draftToPersona({ name: '원본' })
    backend.writePersonas([persona])

    persona.name = '바뀜'
    const read = backend.readPersonas()
    read.push(draftToPersona({ name: '추가' }))

    expect(backend.readPersonas().map(p => p.name)).toEqual(['원본'])
  })

  it('should start from an initial snapshot', () => {
    const backend = new MemoryStorageBackend({ presets })
    expect(backend.readPresets()).toEqual(presets)
    expect(backend.readPersonas()).toEqual([])
  })
})

describe('probeStorage', () => {
  it('should pick file storage for a writable directory', () => {
    expect(probeStorage(join(dataDir, 'new-dir'))).toBe('file')
    expect(existsSync(join(dataDir, 'new-dir', '.write-test'))).toBe(false)
  })

  it('should fall back to memory when the directory cannot be created', () => {
    const blocker = join(dataDir, 'not-a-dir')
    writeFileSync(blocker, 'x')

    expect(probeStorage(join(blocker, 'data'))).toBe('memory')
  })

  it('should skip the probe for an explicit mode', () => {
    expect(createStorageBackend(dataDir, 'memory').kind).toBe('memory')
    expect(createStorageBackend(dataDir, 'file').kind).toBe('file')
    expect(createStorageBackend(dataDir).kind).toBe('file')
  })
})
