import { writeFileSync } from 'fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { getContext, findPersona } from '../context.js'
import { error, info, success, warn } from '../output.js'
import { composeSystemPrompt } from '../../prompt/index.js'
import { createOpenAIChatClient, generateLesson, respondToMessage } from '../../chat/index.js'
import { createOpenAISpeechClient, synthesizeSpeech } from '../../speech/index.js'
import { getErrorMessage } from '../../shared/assertError.js'

interface ChatOptions {
  lesson?: boolean
  speak?: string
}

export function registerChatCommand(program: Command) {
  program
    .command('chat <personaId> <message>')
    .description('페르소나에게 메시지 하나 보내기')
    .option('--lesson', 'message 를 주제로 5단계 수업 만들기')
    .option('--speak <file>', '응답을 음성(mp3)으로 저장')
    .action(async (personaId: string, message: string, options: ChatOptions) => {
      const { config, store } = await getContext()
      const persona = findPersona(store, personaId)
      if (!persona) {
        error(`Persona not found: ${personaId}`)
        process.exitCode = 1
        return
      }

      const created = createOpenAIChatClient(config.chat)
      if (!created.ok) {
        console.error(created.error.format())
      }
      const client = created.ok ? created.value : null

      const reply = options.lesson
        ? await generateLesson(client, message, persona)
        : await respondToMessage(
            client,
            { message, systemPrompt: composeSystemPrompt(persona), history: [] },
            { historyWindow: config.chat.historyWindow }
          )

      console.log(`${chalk.bold(persona.name)}: ${reply.text}`)
      if (reply.error) process.exitCode = 1

      if (!options.speak) return

      const speech = createOpenAISpeechClient(config.speech, config.chat)
      const outcome = await synthesizeSpeech(speech.ok ? speech.value : null, reply.text, persona.voice_settings)
      if (outcome.kind === 'client-side') {
        warn('Speech synthesis is not available, use client-side speech for:')
        info(outcome.text)
        return
      }
      try {
        writeFileSync(options.speak, outcome.audio)
      } catch (e) {
        error(`Failed to write ${options.speak}: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      success(`Saved speech to ${options.speak}`)
    })
}
