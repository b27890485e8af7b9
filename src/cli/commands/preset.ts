import { readFileSync, writeFileSync } from 'fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { getContext, findPersona } from '../context.js'
import { success, error, info, header, list, bulletList, printTable } from '../output.js'
import { TRAIT_LABELS } from '../../persona/ranges.js'
import { TRAIT_NAMES } from '../../types/persona.js'
import { getErrorMessage } from '../../shared/assertError.js'
import { sanitizeName } from '../../persona/sanitizeName.js'

function readInput(file: string): string | null {
  try {
    return readFileSync(file, 'utf-8')
  } catch (e) {
    error(`Cannot read ${file}: ${getErrorMessage(e)}`)
    process.exitCode = 1
    return null
  }
}

export function registerPresetCommands(program: Command) {
  const preset = program.command('preset').description('프리셋 관리')

  preset
    .command('list')
    .description('내장 / 사용자 프리셋 목록')
    .action(async () => {
      const { catalog } = await getContext()
      const { builtin, user } = catalog.listByOrigin()
      const row = (name: string, origin: string) => {
        const config = catalog.getPreset(name)
        return [name, origin, config?.subject ?? '', config?.level ?? '', config?.description ?? '']
      }
      printTable(
        ['이름', '종류', '과목', '수준', '설명'],
        [...builtin.map(name => row(name, '내장')), ...user.map(name => row(name, chalk.cyan('사용자')))]
      )
    })

  preset
    .command('show <name>')
    .description('프리셋 설정과 성격 프로필')
    .action(async (name: string) => {
      const { catalog } = await getContext()
      const config = catalog.getPreset(name)
      const profile = catalog.describePersonality(name)
      if (!config || !profile) {
        error(`Preset not found: ${name}`)
        process.exitCode = 1
        return
      }

      header(name)
      list([
        { label: '종류', value: catalog.isBuiltin(name) ? '내장' : '사용자' },
        { label: '과목', value: config.subject },
        { label: '수준', value: config.level },
        { label: '설명', value: config.description || undefined },
      ])

      header('성격')
      for (const trait of TRAIT_NAMES) {
        const score = config.personality[trait]
        if (score !== undefined) console.log(`  ${TRAIT_LABELS[trait].label.padEnd(10)} ${score}`)
      }

      header('프로필')
      list([
        { label: '수업 방식', value: profile.teachingStyle },
        { label: '상호작용', value: profile.interactionLevel },
        { label: '난이도', value: profile.difficultyLevel },
        { label: '말투', value: profile.communicationStyle },
        { label: '유머', value: profile.humorTendency },
      ])
    })

  preset
    .command('suggest')
    .description('과목과 수준으로 프리셋 추천')
    .option('-s, --subject <subject>', '과목', '')
    .option('-l, --level <level>', '수준 (예: 고등학교)', '')
    .action(async (options: { subject: string; level: string }) => {
      const { catalog } = await getContext()
      const names = catalog.suggest(options.subject, options.level)
      if (names.length === 0) {
        info('No matching presets')
        return
      }
      bulletList(names)
    })

  preset
    .command('save <name>')
    .description('저장된 페르소나 설정으로 사용자 프리셋 만들기')
    .requiredOption('-f, --from <personaId>', '기준 페르소나 ID')
    .action(async (name: string, options: { from: string }) => {
      const { store, catalog } = await getContext()
      const persona = findPersona(store, options.from)
      if (!persona) {
        error(`Persona not found: ${options.from}`)
        process.exitCode = 1
        return
      }
      const result = catalog.createPresetFromPersona(persona, name)
      if (!result.ok) {
        console.error(result.error.format())
        process.exitCode = 1
        return
      }
      success(`Saved preset ${chalk.bold(name)}`)
    })

  preset
    .command('delete <name>')
    .description('사용자 프리셋 삭제 (내장 프리셋은 삭제 불가)')
    .action(async (name: string) => {
      const { catalog } = await getContext()
      if (catalog.isBuiltin(name)) {
        error(`Built-in preset cannot be deleted: ${name}`)
        process.exitCode = 1
        return
      }
      if (!catalog.deleteUserPreset(name)) {
        error('Failed to delete preset')
        process.exitCode = 1
        return
      }
      success(`Deleted preset ${name}`)
    })

  preset
    .command('export <name>')
    .description('프리셋을 JSON 으로 내보내기')
    .option('-o, --output <file>', '저장할 파일 (기본: preset_<이름>.json)')
    .action(async (name: string, options: { output?: string }) => {
      const { catalog } = await getContext()
      const json = catalog.exportPreset(name)
      if (json === null) {
        error(`Preset not found: ${name}`)
        process.exitCode = 1
        return
      }
      const file = options.output ?? `preset_${sanitizeName(name) || 'export'}.json`
      try {
        writeFileSync(file, json, 'utf-8')
      } catch (e) {
        error(`Failed to write ${file}: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      success(`Exported to ${file}`)
    })

  preset
    .command('import <file>')
    .description('JSON 파일에서 프리셋 가져오기')
    .action(async (file: string) => {
      const { catalog } = await getContext()
      const json = readInput(file)
      if (json === null) return
      const result = catalog.importPreset(json)
      if (!result.ok) {
        console.error(result.error.format())
        process.exitCode = 1
        return
      }
      success(`Imported preset ${chalk.bold(result.value)}`)
    })

  preset
    .command('validate <file>')
    .description('프리셋 설정 파일 검사 (preset_config 또는 설정 객체)')
    .action(async (file: string) => {
      const { catalog } = await getContext()
      const json = readInput(file)
      if (json === null) return

      let data: unknown
      try {
        data = JSON.parse(json)
      } catch (e) {
        error(`Invalid JSON: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      const config =
        typeof data === 'object' && data !== null && 'preset_config' in data ? data.preset_config : data
      const check = catalog.validate(config)
      if (check.ok) {
        success('Preset is valid')
        return
      }
      error(`Preset has ${check.errors.length} problem(s)`)
      bulletList(check.errors, '-')
      process.exitCode = 1
    })
}
