/**
 * 통합 오류 처리
 * 오류 분류, 코드, 해결 제안
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 오류 분류 ============

export type ErrorCategory =
  | 'VALIDATION' // 필드 누락 / 범위 초과
  | 'STORAGE' // 저장소 I/O, 파싱 실패
  | 'EXTERNAL' // 채팅/음성 API 실패
  | 'CONFIG' // 자격 증명 누락 등 설정 문제
  | 'UNKNOWN'

export type ErrorCode =
  | 'ERR_VALIDATION'
  | 'ERR_STORAGE'
  | 'ERR_NOT_FOUND'
  | 'ERR_AUTH'
  | 'ERR_QUOTA'
  | 'ERR_EXTERNAL'
  | 'ERR_CONFIG'
  | 'ERR_UNKNOWN'

const CODE_CATEGORY: Record<ErrorCode, ErrorCategory> = {
  ERR_VALIDATION: 'VALIDATION',
  ERR_STORAGE: 'STORAGE',
  ERR_NOT_FOUND: 'STORAGE',
  ERR_AUTH: 'EXTERNAL',
  ERR_QUOTA: 'EXTERNAL',
  ERR_EXTERNAL: 'EXTERNAL',
  ERR_CONFIG: 'CONFIG',
  ERR_UNKNOWN: 'UNKNOWN',
}

// ============ AppError ============

export class AppError extends Error {
  readonly category: ErrorCategory

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details: string[] = [],
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'AppError'
    this.category = CODE_CATEGORY[code]
  }

  /** 터미널 출력용 */
  format(): string {
    const lines: string[] = ['']
    lines.push(`${chalk.red('✗')} ${chalk.bold('오류')} [${categoryColors[this.category](categoryLabels[this.category])}]`)
    lines.push(chalk.dim(`  코드: ${this.code}`))
    lines.push(`  ${this.message}`)
    for (const detail of this.details) {
      lines.push(chalk.dim('    - ') + detail)
    }
    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  해결 방법:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }
    lines.push('')
    return lines.join('\n')
  }

  // ============ 팩토리 ============

  static validation(message: string, details: string[] = []): AppError {
    return new AppError('ERR_VALIDATION', message, details, '필수 필드와 값 범위를 확인하세요')
  }

  static storage(message: string, cause?: unknown): AppError {
    return new AppError(
      'ERR_STORAGE',
      `${message}: ${getErrorMessage(cause)}`,
      [],
      '데이터 디렉토리의 쓰기 권한과 남은 공간을 확인하세요',
      { cause }
    )
  }

  static missingCredentials(service: string, envVar: string): AppError {
    return new AppError(
      'ERR_CONFIG',
      `${service} API key is not configured`,
      [],
      `${envVar} 환경 변수나 .tutor-forge.yaml 에 키를 설정하세요`
    )
  }

  static external(code: 'ERR_AUTH' | 'ERR_QUOTA' | 'ERR_EXTERNAL', message: string, cause?: unknown): AppError {
    const suggestions: Record<typeof code, string> = {
      ERR_AUTH: 'API 키가 유효한지 확인하세요',
      ERR_QUOTA: '요청 한도나 계정 잔액을 확인한 뒤 잠시 후 다시 시도하세요',
      ERR_EXTERNAL: '네트워크 연결을 확인하고 다시 시도하세요',
    }
    return new AppError(code, message, [], suggestions[code], { cause })
  }

  static unknown(cause: unknown): AppError {
    return new AppError('ERR_UNKNOWN', getErrorMessage(cause), [], undefined, { cause })
  }
}

const categoryLabels: Record<ErrorCategory, string> = {
  VALIDATION: '검증',
  STORAGE: '저장소',
  EXTERNAL: '외부 서비스',
  CONFIG: '설정',
  UNKNOWN: '알 수 없음',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  VALIDATION: chalk.yellow,
  STORAGE: chalk.red,
  EXTERNAL: chalk.magenta,
  CONFIG: chalk.yellow,
  UNKNOWN: chalk.gray,
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError
}

/** 터미널에 오류 출력 */
export function printError(error: unknown): void {
  const appError = isAppError(error) ? error : AppError.unknown(error)
  console.error(appError.format())
}
