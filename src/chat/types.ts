import type { AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'

export type ChatRole = 'user' | 'assistant'

export interface ChatMessage {
  role: ChatRole
  content: string
}

/** 화면 대화 기록의 한 줄. user / assistant 이외의 역할은 요청에서 빠진다. */
export interface ChatTurn {
  role: string
  content: string
}

export interface ChatRequest {
  systemPrompt: string
  messages: ChatMessage[]
}

/**
 * 채팅 LLM 어댑터
 *
 * 실패는 Result 로 돌려주고 재시도하지 않는다.
 */
export interface ChatClient {
  readonly model: string
  complete(request: ChatRequest): Promise<Result<string, AppError>>
  /** API 에 연결할 수 있는지 */
  checkAvailable(): Promise<boolean>
}

export interface ChatReply {
  text: string
  /** 대체 응답을 돌려준 경우 원인 */
  error?: AppError
}
