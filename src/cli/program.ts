/**
 * tutor CLI 명령 구성
 *
 *   tutor persona create -n "김선생" -p "화학 실험 조교"
 *   tutor preset suggest -s 화학 -l 고등학교
 *   tutor prompt system <personaId>
 *   tutor chat <personaId> "뉴턴의 제2법칙이 뭔가요?"
 *   tutor data backup
 *   tutor status
 */

import { Command } from 'commander'
import { setLogLevel } from '../shared/logger.js'
import { registerPersonaCommands } from './commands/persona.js'
import { registerPresetCommands } from './commands/preset.js'
import { registerPromptCommands } from './commands/prompt.js'
import { registerChatCommand } from './commands/chat.js'
import { registerDataCommands } from './commands/data.js'
import { registerStatusCommand } from './commands/status.js'

export const CLI_VERSION = '0.1.0'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('tutor')
    .description('AI 튜터 페르소나 설정 도구')
    .version(CLI_VERSION)
    .option('-v, --verbose', '진단 로그 출력')
    .hook('preAction', thisCommand => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug')
    })

  registerPersonaCommands(program)
  registerPresetCommands(program)
  registerPromptCommands(program)
  registerChatCommand(program)
  registerDataCommands(program)
  registerStatusCommand(program)

  return program
}
