/**
 * Vitest 전역 설정
 * 모든 테스트가 끝나면 테스트 데이터 디렉토리를 지운다
 *
 * TUTOR_DATA_DIR 은 vitest.config.ts 에서 임시 디렉토리로 설정된다.
 */

import { rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { afterAll } from 'vitest'

const DATA_DIR = process.env.TUTOR_DATA_DIR || join(tmpdir(), 'tutor-forge-test-data')

// 임시 디렉토리가 아니면 지우지 않는다
const isSafeDir = DATA_DIR.startsWith(tmpdir()) || DATA_DIR.includes('tutor-forge-test')

afterAll(() => {
  if (!isSafeDir) {
    console.warn(`[setup] Refusing to clean non-temp data dir: ${DATA_DIR}`)
    return
  }
  if (existsSync(DATA_DIR)) {
    rmSync(DATA_DIR, { recursive: true, force: true })
  }
})
