import { describe, it, expect } from 'vitest'
import { sanitizeName } from '../sanitizeName.js'

describe('sanitizeName', () => {
  it('should drop punctuation and join words with underscores', () => {
    expect(sanitizeName('Dr. Kim (물리)')).toBe('Dr_Kim_물리')
  })

  it('should collapse runs of separators and trim them', () => {
    expect(sanitizeName('  --hello__world--  ')).toBe('hello_world')
  })

  it('should keep Hangul and digits', () => {
    expect(sanitizeName('김선생 2호')).toBe('김선생_2호')
  })

  it('should return an empty string when nothing is left', () => {
    expect(sanitizeName('!!!')).toBe('')
  })

  it('should be idempotent', () => {
    for (const raw of ['Dr. Kim (물리)', 'a - b _ c', '__x__', '화학 실험 조교!', '']) {
      const once = sanitizeName(raw)
      expect(sanitizeName(once)).toBe(once)
    }
  })
})
