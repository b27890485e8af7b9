/**
 * 학생 메시지에 대한 튜터 응답
 *
 * 외부 API 실패는 여기서 대체 응답으로 바뀐다. 호출자에게 예외가 넘어가지 않는다.
 */

import { createLogger, logError } from '../shared/logger.js'
import { composeLessonRequest } from '../prompt/composePrompt.js'
import type { AppError } from '../shared/error.js'
import type { PersonaRecord } from '../types/persona.js'
import type { ChatClient, ChatMessage, ChatReply, ChatRole, ChatTurn } from './types.js'

const logger = createLogger('chat')

export const DEFAULT_HISTORY_WINDOW = 10
export const UNAVAILABLE_REPLY = '죄송합니다. AI 서비스에 연결할 수 없습니다.'
const FAILURE_REPLY_PREFIX = '죄송합니다. 응답을 생성하는 중 오류가 발생했습니다'

export interface RespondInput {
  message: string
  systemPrompt: string
  history?: ChatTurn[]
}

export interface RespondOptions {
  /** 요청에 포함할 최근 기록 수 */
  historyWindow?: number
}

function isChatRole(role: string): role is ChatRole {
  return role === 'user' || role === 'assistant'
}

/**
 * 최근 window 개의 기록을 자른 뒤 user / assistant 만 남긴다
 */
export function selectRecentHistory(history: ChatTurn[], window = DEFAULT_HISTORY_WINDOW): ChatMessage[] {
  const recent = window > 0 ? history.slice(-window) : []
  return recent.flatMap(turn => (isChatRole(turn.role) ? [{ role: turn.role, content: turn.content }] : []))
}

export function fallbackReply(error: AppError): ChatReply {
  return { text: `${FAILURE_REPLY_PREFIX}: ${error.message}`, error }
}

export async function respondToMessage(
  client: ChatClient | null,
  input: RespondInput,
  options: RespondOptions = {}
): Promise<ChatReply> {
  if (!client) {
    logger.warn('Chat client is not configured')
    return { text: UNAVAILABLE_REPLY }
  }

  const messages: ChatMessage[] = [
    ...selectRecentHistory(input.history ?? [], options.historyWindow),
    { role: 'user', content: input.message },
  ]

  const result = await client.complete({ systemPrompt: input.systemPrompt, messages })
  if (!result.ok) {
    logError(logger, 'Chat request failed', result.error, { model: client.model, code: result.error.code })
    return fallbackReply(result.error)
  }
  return { text: result.value }
}

/** 주제 하나로 5단계 수업 내용을 만든다. 기록은 보내지 않는다. */
export async function generateLesson(
  client: ChatClient | null,
  topic: string,
  persona: PersonaRecord
): Promise<ChatReply> {
  const { systemPrompt, message } = composeLessonRequest(topic, persona)
  return respondToMessage(client, { message, systemPrompt, history: [] })
}

/** 채팅 API 에 연결할 수 있는지. 클라이언트가 없으면 false. */
export async function checkChatStatus(client: ChatClient | null): Promise<boolean> {
  if (!client) return false
  const available = await client.checkAvailable()
  logger.debug(`Chat API ${available ? 'available' : 'not available'} (model: ${client.model})`)
  return available
}
