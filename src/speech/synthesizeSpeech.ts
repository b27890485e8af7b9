import { createLogger, logError } from '../shared/logger.js'
import { cleanTextForSpeech } from './cleanTextForSpeech.js'
import type { VoiceSettings } from '../types/persona.js'
import type { SpeechClient, SpeechOutcome } from './types.js'

const logger = createLogger('speech')

/**
 * 텍스트를 정리한 뒤 서버에서 합성한다. 클라이언트가 없거나 실패하면 client-side 로 넘긴다.
 */
export async function synthesizeSpeech(
  client: SpeechClient | null,
  text: string,
  voice: VoiceSettings
): Promise<SpeechOutcome> {
  const cleaned = cleanTextForSpeech(text)
  if (!client || !cleaned) {
    return { kind: 'client-side', text: cleaned }
  }

  const result = await client.synthesize(cleaned, voice)
  if (!result.ok) {
    logError(logger, 'Speech synthesis failed, falling back to client-side', result.error, {
      code: result.error.code,
    })
    return { kind: 'client-side', text: cleaned }
  }
  return { kind: 'audio', audio: result.value, autoPlay: voice.auto_play }
}
