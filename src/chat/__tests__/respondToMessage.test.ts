import { describe, it, expect } from 'vitest'
import OpenAI from 'openai'
import {
  DEFAULT_HISTORY_WINDOW,
  UNAVAILABLE_REPLY,
  checkChatStatus,
  generateLesson,
  respondToMessage,
  selectRecentHistory,
} from '../respondToMessage.js'
import { createOpenAIChatClient, toChatError, toMessageParam } from '../openaiChatClient.js'
import { AppError } from '../../shared/error.js'
import { ok, err, type Result } from '../../shared/result.js'
import { draftToPersona } from '../../persona/buildPersona.js'
import { buildLessonMessage, composeSystemPrompt } from '../../prompt/composePrompt.js'
import type { ChatClient, ChatRequest, ChatTurn } from '../types.js'

class FakeChatClient implements ChatClient {
  readonly model = 'fake-model'
  readonly requests: ChatRequest[] = []

  constructor(
    private readonly reply: Result<string, AppError> = ok('좋은 질문이에요!'),
    private readonly available = true
  ) {}

  async complete(request: ChatRequest): Promise<Result<string, AppError>> {
    this.requests.push(request)
    return this.reply
  }

  async checkAvailable(): Promise<boolean> {
    return this.available
  }
}

function turns(count: number): ChatTurn[] {
  return Array.from({ length: count }, (_, i) => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `m${i}`,
  }))
}

describe('selectRecentHistory', () => {
  it('should keep the last ten turns by default', () => {
    expect(DEFAULT_HISTORY_WINDOW).toBe(10)
    expect(selectRecentHistory(turns(15)).map(m => m.content)).toEqual([
      'm5', 'm6', 'm7', 'm8', 'm9', 'm10', 'm11', 'm12', 'm13', 'm14',
    ])
  })

  it('should drop other roles after windowing', () => {
    const history: ChatTurn[] = [
      { role: 'user', content: 'a' },
      { role: 'system', content: 'b' },
      { role: 'assistant', content: 'c' },
    ]
    expect(selectRecentHistory(history, 2)).toEqual([{ role: 'assistant', content: 'c' }])
  })

  it('should send no history for a non-positive window', () => {
    expect(selectRecentHistory(turns(4), 0)).toEqual([])
  })
})

describe('respondToMessage', () => {
  it('should send the windowed history followed by the new message', async () => {
    const client = new FakeChatClient()

    const reply = await respondToMessage(client, {
      message: '관성이 뭐예요?',
      systemPrompt: 'system',
      history: turns(15),
    })

    expect(reply).toEqual({ text: '좋은 질문이에요!' })
    const request = client.requests[0]
    expect(request?.systemPrompt).toBe('system')
    expect(request?.messages).toHaveLength(11)
    expect(request?.messages[0]?.content).toBe('m5')
    expect(request?.messages[10]).toEqual({ role: 'user', content: '관성이 뭐예요?' })
  })

  it('should honour a custom window', async () => {
    const client = new FakeChatClient()
    await respondToMessage(client, { message: 'q', systemPrompt: 's', history: turns(6) }, { historyWindow: 2 })

    expect(client.requests[0]?.messages.map(m => m.content)).toEqual(['m4', 'm5', 'q'])
  })

  it('should return a fallback reply when the request fails', async () => {
    const failure = AppError.external('ERR_QUOTA', 'quota exceeded')
    const client = new FakeChatClient(err(failure))

    const reply = await respondToMessage(client, { message: 'q', systemPrompt: 's' })

    expect(reply.text).toBe('죄송합니다. 응답을 생성하는 중 오류가 발생했습니다: quota exceeded')
    expect(reply.error?.code).toBe('ERR_QUOTA')
  })

  it('should answer with a fixed message without a client', async () => {
    expect(await respondToMessage(null, { message: 'q', systemPrompt: 's' })).toEqual({ text: UNAVAILABLE_REPLY })
  })
})

describe('checkChatStatus', () => {
  it('should report unavailable without a client', async () => {
    expect(await checkChatStatus(null)).toBe(false)
  })

  it('should ask the client', async () => {
    expect(await checkChatStatus(new FakeChatClient())).toBe(true)
    expect(await checkChatStatus(new FakeChatClient(ok(''), false))).toBe(false)
  })
})

describe('generateLesson', () => {
  it('should send only the lesson request', async () => {
    const client = new FakeChatClient(ok('수업 내용'))
    const persona = draftToPersona({ name: '김선생' })

    const reply = await generateLesson(client, '뉴턴의 법칙', persona)

    expect(reply.text).toBe('수업 내용')
    expect(client.requests[0]).toEqual({
      systemPrompt: composeSystemPrompt(persona),
      messages: [{ role: 'user', content: buildLessonMessage('뉴턴의 법칙') }],
    })
  })
})

describe('createOpenAIChatClient', () => {
  const config = { model: 'gpt-4o-mini', maxTokens: 2000, temperature: 0.7, historyWindow: 10 }

  it('should require an API key', () => {
    const result = createOpenAIChatClient(config)

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('ERR_CONFIG')
  })

  it('should create a client with a key', () => {
    const result = createOpenAIChatClient({ ...config, apiKey: 'test-key' })

    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.model).toBe('gpt-4o-mini')
  })
})

describe('toMessageParam', () => {
  it('should keep the role and content of each turn', () => {
    expect(toMessageParam({ role: 'user', content: '질문' })).toEqual({ role: 'user', content: '질문' })
    expect(toMessageParam({ role: 'assistant', content: '답변' })).toEqual({ role: 'assistant', content: '답변' })
  })
})

describe('toChatError', () => {
  it('should classify credential errors', () => {
    const error = new OpenAI.AuthenticationError(401, undefined, 'bad key', undefined)
    expect(toChatError(error).code).toBe('ERR_AUTH')
  })

  it('should classify rate limits', () => {
    const error = new OpenAI.RateLimitError(429, undefined, 'slow down', undefined)
    expect(toChatError(error).code).toBe('ERR_QUOTA')
  })

  it('should treat anything else as an external failure', () => {
    const error = toChatError(new Error('boom'))
    expect(error.code).toBe('ERR_EXTERNAL')
    expect(error.message).toBe('boom')
  })
})
