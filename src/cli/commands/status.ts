import { Command } from 'commander'
import chalk from 'chalk'
import { getContext } from '../context.js'
import { success, error, header, list } from '../output.js'
import { checkChatStatus, createOpenAIChatClient } from '../../chat/index.js'

export function registerStatusCommand(program: Command) {
  program
    .command('status')
    .description('채팅 API 연결 상태 확인')
    .action(async () => {
      const { config, store } = await getContext()

      header('상태')
      list([
        { label: '저장소', value: store.storageKind },
        { label: '채팅 모델', value: config.chat.model },
        { label: 'API 주소', value: config.chat.baseURL ?? 'api.openai.com' },
        { label: '음성 합성', value: config.speech.enabled ? `${config.speech.model} / ${config.speech.voice}` : '꺼짐' },
      ])
      console.log()

      const created = createOpenAIChatClient(config.chat)
      if (!created.ok) {
        console.error(created.error.format())
        process.exitCode = 1
        return
      }
      if (!(await checkChatStatus(created.value))) {
        error(`Cannot reach the chat API (${chalk.dim(config.chat.model)})`)
        process.exitCode = 1
        return
      }
      success('Chat API is available')
    })
}
