/**
 * 로깅
 *
 * - 레벨: debug / info / warn / error / silent
 * - 스코프가 있으면 [scope] 를 붙인다
 * - 환경 변수: LOG_LEVEL, DEBUG=1, SILENT=1
 * - NODE_ENV=test 에서는 기본적으로 출력하지 않음
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
type OutputLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<OutputLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<OutputLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

let currentLevel: LogLevel = initLogLevel()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function clock(): string {
  const now = new Date()
  const pad = (n: number) => n.toString().padStart(2, '0')
  return chalk.dim(`${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`)
}

function formatLogLine(level: OutputLevel, scope: string, message: string): string {
  const label = LEVEL_COLORS[level](LEVEL_LABELS[level])
  if (!scope) {
    return `${clock()} ${label} ${message}`
  }
  return `${clock()} ${label} ${chalk.cyan(`[${scope}]`)} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope = ''): Logger {
  function write(level: OutputLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return
    const line = formatLogLine(level, scope, message)
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    sink(line, ...args)
  }

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  }
}

export const logger = createLogger()

/** 오류 진단용 부가 정보 */
export interface ErrorContext {
  personaId?: string
  presetName?: string
  file?: string
  [key: string]: unknown
}

/**
 * 컨텍스트와 스택 앞부분을 붙여 오류를 기록한다
 *
 * @example
 * logError(logger, 'Failed to write personas', err, { file: TEACHERS_FILE })
 */
export function logError(
  target: Logger,
  message: string,
  error: unknown,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : String(error)
  const data: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(context ?? {})) {
    if (value !== undefined) data[key] = value
  }
  if (error instanceof Error && error.stack) {
    data.stack = error.stack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    target.error(`${message}: ${errorMessage}`, data)
  } else {
    target.error(`${message}: ${errorMessage}`)
  }
}
