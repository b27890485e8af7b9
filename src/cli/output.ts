/**
 * CLI 사용자 출력
 * 터미널 사용자에게 보여주는 간결한 출력. 타임스탬프 없음.
 *
 * 진단 로그는 shared/logger.ts 를 쓴다.
 */

import chalk from 'chalk'
import { table } from 'table'

// ============ 기본 출력 ============

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ 구조화 출력 ============

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

export interface ListItem {
  label: string
  value: string | number | undefined
  dim?: boolean
}

/** 키-값 목록 */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    const value = String(item.value ?? '-')
    console.log(`${prefix}${label} ${item.dim ? chalk.dim(value) : value}`)
  }
}

export function bulletList(items: string[], bullet = '•', indent = 2): void {
  const prefix = ' '.repeat(indent)
  for (const item of items) {
    console.log(`${prefix}${chalk.dim(bullet)} ${item}`)
  }
}

/** 점수 막대 (0~100) */
export function scoreBar(score: number, width = 20): string {
  const filled = Math.round((Math.max(0, Math.min(100, score)) / 100) * width)
  return chalk.green('█'.repeat(filled)) + chalk.dim('░'.repeat(width - filled))
}

// ============ 표 ============

export function printTable(headers: string[], rows: string[][]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  (데이터 없음)'))
    return
  }
  console.log(table([headers.map(h => chalk.bold(h)), ...rows]))
}
