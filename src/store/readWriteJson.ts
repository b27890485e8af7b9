/**
 * JSON 파일 읽기/쓰기
 *
 * 쓰기는 원자적이다 (임시 파일에 쓴 뒤 rename).
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync, rmSync } from 'fs'
import { dirname } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { JsonReadOptions, JsonWriteOptions } from './types.js'

const logger = createLogger('json-io')

/**
 * JSON 파일을 읽는다
 *
 * 파일이 없거나, 파싱에 실패하거나, validate 를 통과하지 못하면 defaultValue 를 돌려준다.
 */
export function readJson<T>(filepath: string, options: JsonReadOptions<T>): T {
  if (!existsSync(filepath)) {
    return options.defaultValue
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(filepath, 'utf-8'))
    if (!options.validate(parsed)) {
      logger.warn(`Unexpected JSON shape, treating as empty: ${filepath}`)
      return options.defaultValue
    }
    return parsed
  } catch (e) {
    logger.warn(`Failed to read JSON: ${filepath} (${getErrorMessage(e)})`)
    return options.defaultValue
  }
}

export function serializeJson(data: unknown, indent = 2): string {
  return JSON.stringify(data, null, indent)
}

/**
 * JSON 파일을 쓴다. 실패하면 예외를 던지며 기존 파일은 그대로 남는다.
 */
export function writeJson(filepath: string, data: unknown, options?: JsonWriteOptions): void {
  const content = serializeJson(data, options?.indent)
  ensureDir(dirname(filepath))

  const tempPath = `${filepath}.tmp`
  try {
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } catch (e) {
    rmSync(tempPath, { force: true })
    throw e
  }
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
