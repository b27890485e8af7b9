import { Command } from 'commander'
import { getContext, findPersona } from '../context.js'
import { error } from '../output.js'
import { composeLessonRequest, composeSystemPrompt } from '../../prompt/index.js'

export function registerPromptCommands(program: Command) {
  const prompt = program.command('prompt').description('페르소나로 만든 프롬프트 보기')

  prompt
    .command('system <personaId>')
    .description('시스템 프롬프트 출력')
    .action(async (personaId: string) => {
      const { store } = await getContext()
      const persona = findPersona(store, personaId)
      if (!persona) {
        error(`Persona not found: ${personaId}`)
        process.exitCode = 1
        return
      }
      console.log(composeSystemPrompt(persona))
    })

  prompt
    .command('lesson <personaId> <topic>')
    .description('수업 요청 프롬프트 출력 (시스템 프롬프트 + 수업 구성)')
    .action(async (personaId: string, topic: string) => {
      const { store } = await getContext()
      const persona = findPersona(store, personaId)
      if (!persona) {
        error(`Persona not found: ${personaId}`)
        process.exitCode = 1
        return
      }
      const request = composeLessonRequest(topic, persona)
      console.log(request.systemPrompt)
      console.log()
      console.log(request.message)
    })
}
