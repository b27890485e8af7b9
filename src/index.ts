/**
 * @entry tutor-forge 라이브러리
 */

export * from './types/index.js'
export * from './persona/index.js'
export * from './preset/index.js'
export * from './prompt/index.js'
export * from './chat/index.js'
export * from './speech/index.js'
export * from './store/index.js'
export * from './config/index.js'
export {
  AppError,
  isAppError,
  printError,
  ok,
  err,
  isOk,
  isErr,
  unwrapOr,
  map,
  fromThrowable,
  createLogger,
  setLogLevel,
  getLogLevel,
  type ErrorCategory,
  type ErrorCode,
  type Result,
  type LogLevel,
} from './shared/index.js'
