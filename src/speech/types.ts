import type { AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'
import type { VoiceSettings } from '../types/persona.js'

/** 음성 합성 어댑터. 입력 텍스트는 이미 정리된 상태다. */
export interface SpeechClient {
  synthesize(text: string, voice: VoiceSettings): Promise<Result<Buffer, AppError>>
}

export type SpeechOutcome =
  | { kind: 'audio'; audio: Buffer; autoPlay: boolean }
  /** 서버 합성을 쓰지 못했다. 클라이언트(브라우저)가 text 를 직접 읽는다. */
  | { kind: 'client-side'; text: string }
