/**
 * @entry Shared 공용 기반 모듈
 *
 * 업무 로직에 의존하지 않는 도구 함수
 *
 * - Result<T,E>: 값으로 다루는 성공 / 실패 (ok/err/isOk/isErr/unwrapOr/map/fromThrowable)
 * - AppError: 코드와 분류가 있는 오류 (printError)
 * - Logger: createLogger/setLogLevel/logError
 * - ID: generateId/isValidUUID
 * - 시간: now/formatTime/formatRelative/parseTimestamp/daysAgo
 */

// Result
export { type Result, ok, err, isOk, isErr, unwrapOr, map, fromThrowable } from './result.js'

// 오류
export { type ErrorCode, type ErrorCategory, AppError, isAppError, printError } from './error.js'

// 로그
export {
  type LogLevel,
  type Logger,
  type ErrorContext,
  setLogLevel,
  getLogLevel,
  createLogger,
  logger,
  logError,
} from './logger.js'

// ID
export { generateId, isValidUUID } from './generateId.js'

// unknown 오류 값
export { isError, getErrorMessage, getErrorCode } from './assertError.js'

// 시간
export { now, formatTime, formatRelative, parseTimestamp, daysAgo } from './formatTime.js'
