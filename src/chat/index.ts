export type { ChatClient, ChatMessage, ChatReply, ChatRequest, ChatRole, ChatTurn } from './types.js'
export { createOpenAIChatClient, toChatError } from './openaiChatClient.js'
export {
  DEFAULT_HISTORY_WINDOW,
  checkChatStatus,
  UNAVAILABLE_REPLY,
  fallbackReply,
  generateLesson,
  respondToMessage,
  selectRecentHistory,
  type RespondInput,
  type RespondOptions,
} from './respondToMessage.js'
