#!/usr/bin/env node
/**
 * @entry tutor CLI 진입점
 */

import { createProgram } from './program.js'
import { getLogLevel, setLogLevel } from '../shared/logger.js'
import { printError } from '../shared/error.js'

// 명령 출력과 섞이지 않도록 info 로그는 --verbose 나 LOG_LEVEL 로만 켠다
if (getLogLevel() === 'info' && !process.env.LOG_LEVEL) {
  setLogLevel('warn')
}

createProgram()
  .parseAsync()
  .catch((e: unknown) => {
    printError(e)
    process.exitCode = 1
  })
