import { z } from 'zod'

export const storageConfigSchema = z.object({
  /** 비어 있으면 TUTOR_DATA_DIR, 그다음 ./data */
  dataDir: z.string().optional(),
  /** 보관할 최대 페르소나 수 (기본 20) */
  maxPersonas: z.number().int().positive().default(20),
  /** auto: 시작할 때 쓰기 가능 여부를 확인해서 file / memory 중 선택 */
  mode: z.enum(['auto', 'file', 'memory']).default('auto'),
})

export const chatConfigSchema = z.object({
  /** OpenAI 호환 API 주소, 비어 있으면 SDK 기본값 */
  baseURL: z.string().optional(),
  apiKey: z.string().optional(),
  model: z.string().default('gpt-4o-mini'),
  maxTokens: z.number().int().positive().default(2000),
  temperature: z.number().min(0).max(2).default(0.7),
  /** 요청에 포함할 최근 대화 수 (기본 10) */
  historyWindow: z.number().int().nonnegative().default(10),
})

export const SPEECH_MODELS = ['tts-1', 'tts-1-hd'] as const
export const SPEECH_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const

export const speechConfigSchema = z.object({
  /** false 면 항상 클라이언트 측 합성으로 넘긴다 */
  enabled: z.boolean().default(true),
  model: z.enum(SPEECH_MODELS).default('tts-1'),
  voice: z.enum(SPEECH_VOICES).default('nova'),
})

export const configSchema = z.object({
  storage: storageConfigSchema.default({}),
  chat: chatConfigSchema.default({}),
  speech: speechConfigSchema.default({}),
})

export type StorageConfig = z.infer<typeof storageConfigSchema>
export type ChatConfig = z.infer<typeof chatConfigSchema>
export type SpeechConfig = z.infer<typeof speechConfigSchema>
export type SpeechModel = (typeof SPEECH_MODELS)[number]
export type SpeechVoice = (typeof SPEECH_VOICES)[number]
export type Config = z.infer<typeof configSchema>
