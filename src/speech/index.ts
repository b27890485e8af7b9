export type { SpeechClient, SpeechOutcome } from './types.js'
export { cleanTextForSpeech } from './cleanTextForSpeech.js'
export { createOpenAISpeechClient } from './openaiSpeechClient.js'
export { synthesizeSpeech } from './synthesizeSpeech.js'
