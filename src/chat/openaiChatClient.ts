/**
 * OpenAI 호환 채팅 클라이언트
 *
 * openai SDK 로 OpenAI 또는 호환 API(LM Studio, Ollama, vLLM 등)를 호출한다.
 */

import OpenAI from 'openai'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import type { ChatConfig } from '../config/schema.js'
import type { ChatClient, ChatMessage, ChatRequest } from './types.js'

const logger = createLogger('chat')

/** API 오류를 AppError 로 분류 */
export function toChatError(error: unknown, baseURL?: string): AppError {
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return AppError.external('ERR_AUTH', `Chat API rejected the credentials (${error.status})`, error)
  }
  if (error instanceof OpenAI.RateLimitError) {
    return AppError.external('ERR_QUOTA', `Chat API rate limit or quota exceeded: ${error.message}`, error)
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return AppError.external('ERR_EXTERNAL', `Connection failed: ${baseURL ?? 'api.openai.com'} - ${error.message}`, error)
  }
  if (error instanceof OpenAI.APIError) {
    return AppError.external('ERR_EXTERNAL', `Chat API error (${error.status ?? 'unknown'}): ${error.message}`, error)
  }
  return AppError.external('ERR_EXTERNAL', error instanceof Error ? error.message : String(error), error)
}

export function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content }
    case 'assistant':
      return { role: 'assistant', content: message.content }
  }
}

export function createOpenAIChatClient(config: ChatConfig): Result<ChatClient, AppError> {
  if (!config.apiKey) {
    return err(AppError.missingCredentials('Chat', 'TUTOR_CHAT_API_KEY'))
  }

  const client = new OpenAI({ baseURL: config.baseURL, apiKey: config.apiKey })

  return ok({
    model: config.model,

    async complete(request: ChatRequest): Promise<Result<string, AppError>> {
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
        { role: 'system', content: request.systemPrompt },
        ...request.messages.map(toMessageParam),
      ]
      const startTime = Date.now()

      try {
        const completion = await client.chat.completions.create({
          model: config.model,
          messages,
          max_tokens: config.maxTokens,
          temperature: config.temperature,
        })
        const durationMs = Date.now() - startTime
        logger.debug(`Completed (${(durationMs / 1000).toFixed(1)}s, model: ${config.model})`)
        return ok(completion.choices[0]?.message?.content ?? '')
      } catch (error: unknown) {
        return err(toChatError(error, config.baseURL))
      }
    },

    async checkAvailable(): Promise<boolean> {
      try {
        await client.models.list()
        return true
      } catch (e) {
        logger.debug(`Chat API not available: ${e instanceof Error ? e.message : String(e)}`)
        return false
      }
    },
  })
}
