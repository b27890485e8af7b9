/**
 * OpenAI 음성 합성 클라이언트
 *
 * speed 만 API 에 전달된다. pitch / volume 은 재생하는 쪽에서 적용한다.
 */

import OpenAI from 'openai'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { toChatError } from '../chat/openaiChatClient.js'
import type { ChatConfig, SpeechConfig } from '../config/schema.js'
import type { VoiceSettings } from '../types/persona.js'
import type { SpeechClient } from './types.js'

const logger = createLogger('speech')

/** API 가 받는 speed 범위 */
const API_SPEED_RANGE = { min: 0.25, max: 4 } as const

export function createOpenAISpeechClient(
  speech: SpeechConfig,
  connection: Pick<ChatConfig, 'apiKey' | 'baseURL'>
): Result<SpeechClient, AppError> {
  if (!speech.enabled) {
    return err(new AppError('ERR_CONFIG', 'Speech synthesis is disabled', [], 'speech.enabled 를 true 로 설정하세요'))
  }
  if (!connection.apiKey) {
    return err(AppError.missingCredentials('Speech', 'TUTOR_CHAT_API_KEY'))
  }

  const client = new OpenAI({ baseURL: connection.baseURL, apiKey: connection.apiKey })

  return ok({
    async synthesize(text: string, voice: VoiceSettings): Promise<Result<Buffer, AppError>> {
      const speed = Math.min(API_SPEED_RANGE.max, Math.max(API_SPEED_RANGE.min, voice.speed))
      try {
        const response = await client.audio.speech.create({
          model: speech.model,
          voice: speech.voice,
          input: text,
          speed,
          response_format: 'mp3',
        })
        const audio = Buffer.from(await response.arrayBuffer())
        logger.debug(`Synthesized ${audio.length} bytes (${speech.model}/${speech.voice})`)
        return ok(audio)
      } catch (error: unknown) {
        return err(toChatError(error, connection.baseURL))
      }
    },
  })
}
