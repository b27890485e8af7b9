import { describe, it, expect } from 'vitest'
import { cleanTextForSpeech } from '../cleanTextForSpeech.js'
import { synthesizeSpeech } from '../synthesizeSpeech.js'
import { createOpenAISpeechClient } from '../openaiSpeechClient.js'
import { AppError } from '../../shared/error.js'
import { ok, err, type Result } from '../../shared/result.js'
import { VOICE_DEFAULTS } from '../../persona/ranges.js'
import type { SpeechClient } from '../types.js'
import type { VoiceSettings } from '../../types/persona.js'

class FakeSpeechClient implements SpeechClient {
  readonly calls: Array<{ text: string; voice: VoiceSettings }> = []

  constructor(private readonly result: Result<Buffer, AppError>) {}

  async synthesize(text: string, voice: VoiceSettings): Promise<Result<Buffer, AppError>> {
    this.calls.push({ text, voice })
    return this.result
  }
}

describe('cleanTextForSpeech', () => {
  it('should strip board markup, math delimiters and icons', () => {
    expect(cleanTextForSpeech('## 뉴턴의 법칙\n**중요**: [RED]F = ma[/RED] 그리고 $E=mc^2$ 🎓')).toBe(
      '뉴턴의 법칙 중요: F = ma 그리고 E=mc^2'
    )
  })

  it('should unwrap every color tag', () => {
    expect(cleanTextForSpeech('[BLUE]$v = at$[/BLUE], [GREEN]가속도[/GREEN], [CIRCLE]질량[/CIRCLE]')).toBe(
      'v = at, 가속도, 질량'
    )
  })

  it('should remove joined emoji sequences', () => {
    expect(cleanTextForSpeech('\u{1F468}‍\u{1F3EB} 안녕하세요 ⚙️')).toBe('안녕하세요')
  })

  it('should collapse whitespace', () => {
    expect(cleanTextForSpeech('  첫 줄\n\n\t둘째   줄  ')).toBe('첫 줄 둘째 줄')
  })

  it('should leave plain text alone', () => {
    expect(cleanTextForSpeech('그러니까, 힘은 질량 곱하기 가속도예요.')).toBe('그러니까, 힘은 질량 곱하기 가속도예요.')
  })
})

describe('synthesizeSpeech', () => {
  it('should hand off to the client side without a speech client', async () => {
    expect(await synthesizeSpeech(null, '**안녕**', VOICE_DEFAULTS)).toEqual({ kind: 'client-side', text: '안녕' })
  })

  it('should not call the client for text that cleans to nothing', async () => {
    const client = new FakeSpeechClient(ok(Buffer.from('mp3')))

    expect(await synthesizeSpeech(client, '🎓', VOICE_DEFAULTS)).toEqual({ kind: 'client-side', text: '' })
    expect(client.calls).toEqual([])
  })

  it('should return audio with the auto-play flag', async () => {
    const audio = Buffer.from('mp3-bytes')
    const client = new FakeSpeechClient(ok(audio))
    const voice = { ...VOICE_DEFAULTS, auto_play: false }

    const outcome = await synthesizeSpeech(client, '## 관성', voice)

    expect(outcome).toEqual({ kind: 'audio', audio, autoPlay: false })
    expect(client.calls).toEqual([{ text: '관성', voice }])
  })

  it('should fall back to the client side when synthesis fails', async () => {
    const client = new FakeSpeechClient(err(AppError.external('ERR_EXTERNAL', 'timeout')))

    expect(await synthesizeSpeech(client, '관성', VOICE_DEFAULTS)).toEqual({ kind: 'client-side', text: '관성' })
  })
})

describe('createOpenAISpeechClient', () => {
  const speech = { enabled: true, model: 'tts-1', voice: 'nova' } as const

  it('should refuse when speech is disabled', () => {
    const result = createOpenAISpeechClient({ ...speech, enabled: false }, { apiKey: 'test-key' })

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Speech synthesis is disabled')
  })

  it('should require an API key', () => {
    const result = createOpenAISpeechClient(speech, {})

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('ERR_CONFIG')
  })

  it('should create a client with a key', () => {
    expect(createOpenAISpeechClient(speech, { apiKey: 'test-key' }).ok).toBe(true)
  })
})
