/**
 * 시간 처리 (date-fns)
 */

import { format, formatDistanceToNow, isValid, parseISO, subDays } from 'date-fns'
import { ko } from 'date-fns/locale'

export function now(): string {
  return new Date().toISOString()
}

export function formatTime(isoString: string, pattern = 'yyyy-MM-dd HH:mm'): string {
  const date = parseISO(isoString)
  return isValid(date) ? format(date, pattern) : isoString
}

// "3분 전"
export function formatRelative(isoString: string): string {
  const date = parseISO(isoString)
  return isValid(date) ? formatDistanceToNow(date, { addSuffix: true, locale: ko }) : isoString
}

/** 파싱할 수 없는 값이면 null */
export function parseTimestamp(value: string): Date | null {
  const date = parseISO(value)
  return isValid(date) ? date : null
}

export function daysAgo(days: number, from: Date = new Date()): Date {
  return subDays(from, days)
}
