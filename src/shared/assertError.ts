/**
 * unknown 으로 잡힌 값에서 오류 정보를 꺼내는 도우미
 */

export function isError(value: unknown): value is Error {
  return value instanceof Error
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/** Node 시스템 오류 코드 (ENOENT, EACCES ...) */
export function getErrorCode(error: unknown): string | undefined {
  if (isError(error) && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
