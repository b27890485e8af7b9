import { readFileSync, writeFileSync } from 'fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { getContext, findPersona } from '../context.js'
import { success, error, info, warn, header, list, printTable, scoreBar } from '../output.js'
import { draftToPersona, getDefaultDraft, sanitizeName, validatePersona } from '../../persona/index.js'
import { LEVEL_LABELS, SUBJECTS, TRAIT_LABELS, normalizeLevel } from '../../persona/ranges.js'
import { EDUCATION_LEVELS, TRAIT_NAMES, type TraitName, type TutorDraft } from '../../types/persona.js'
import { formatRelative, formatTime } from '../../shared/formatTime.js'
import { getErrorMessage } from '../../shared/assertError.js'

interface CreateOptions {
  name: string
  title?: string
  background?: string
  subject?: string
  level?: string
  preset?: string
  trait: string[]
  speed?: string
  pitch?: string
  volume?: string
  autoPlay: boolean
  generalKnowledge: boolean
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function isTraitName(value: string): value is TraitName {
  return (TRAIT_NAMES as readonly string[]).includes(value)
}

/** "friendliness=80" 형식을 특성 점수로 */
function parseTraits(pairs: string[]): { traits: Partial<Record<TraitName, number>>; problems: string[] } {
  const traits: Partial<Record<TraitName, number>> = {}
  const problems: string[] = []
  for (const pair of pairs) {
    const [key = '', raw = ''] = pair.split('=')
    const score = Number(raw)
    if (!isTraitName(key)) {
      problems.push(`unknown trait: ${key}`)
    } else if (raw.trim() === '' || Number.isNaN(score)) {
      problems.push(`personality.${key} must be a number`)
    } else {
      traits[key] = score
    }
  }
  return { traits, problems }
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const n = Number(value)
  return Number.isNaN(n) ? undefined : n
}

const VOICE_OPTIONS = ['speed', 'pitch', 'volume'] as const

/** 음성 옵션을 초안에 반영한다. 숫자가 아닌 값은 문제 목록에 넣는다. */
function buildDraft(options: CreateOptions, base: TutorDraft): { draft: TutorDraft; problems: string[] } {
  const draft: TutorDraft = { ...base, name: options.name }
  const problems: string[] = []
  if (options.title !== undefined) draft.title = options.title
  if (options.background !== undefined) draft.background = options.background
  if (options.subject !== undefined) draft.subject = options.subject
  if (options.level !== undefined) draft.level = options.level

  const voice = { ...draft.voice_settings, auto_play: options.autoPlay }
  for (const key of VOICE_OPTIONS) {
    const raw = options[key]
    if (raw === undefined) continue
    const value = parseNumber(raw)
    if (value === undefined) problems.push(`voice_settings.${key} must be a number`)
    else voice[key] = value
  }
  draft.voice_settings = voice
  draft.use_general_knowledge = options.generalKnowledge

  // draftToPersona 는 모르는 레벨을 기본값으로 바꾸므로 먼저 확인한다
  if (draft.level !== undefined && normalizeLevel(draft.level) === null) {
    problems.push(`level must be one of ${EDUCATION_LEVELS.join(', ')}`)
  }
  return { draft, problems }
}

export function registerPersonaCommands(program: Command) {
  const persona = program.command('persona').description('튜터 페르소나 관리')

  persona
    .command('create')
    .description('새 튜터 페르소나 만들기')
    .requiredOption('-n, --name <name>', '튜터 이름')
    .option('--title <title>', '호칭 (예: 교수님)')
    .option('--background <text>', '경력 / 소개')
    .option('-s, --subject <subject>', `과목 (${SUBJECTS.join(', ')} 또는 직접 입력)`)
    .option('-l, --level <level>', '교육 수준 (elementary, middle_school, high_school, university, graduate 또는 한국어 라벨)')
    .option('-p, --preset <preset>', '시작할 프리셋')
    .option('-t, --trait <trait=score>', '성격 특성 (여러 번 사용 가능)', collect, [])
    .option('--speed <n>', '음성 속도 (0.5~2.0)')
    .option('--pitch <n>', '음성 높이 (0.5~2.0)')
    .option('--volume <n>', '음량 (0.0~1.0)')
    .option('--no-auto-play', '음성 자동 재생 끄기')
    .option('--no-general-knowledge', '참고 자료만 사용')
    .action(async (options: CreateOptions) => {
      const { store, catalog } = await getContext()

      let base = getDefaultDraft()
      if (options.preset) {
        if (!catalog.getPreset(options.preset)) {
          error(`Preset not found: ${options.preset}`)
          process.exitCode = 1
          return
        }
        base = catalog.apply(options.preset, base)
      }

      const { draft, problems: draftProblems } = buildDraft(options, base)
      const { traits, problems } = parseTraits(options.trait)
      draft.personality = { ...draft.personality, ...traits }

      const record = draftToPersona(draft)
      const check = validatePersona(record)
      const errors = [...draftProblems, ...problems, ...check.errors]
      if (errors.length > 0) {
        error('Invalid persona')
        for (const e of errors) console.log(chalk.gray(`  - ${e}`))
        process.exitCode = 1
        return
      }

      if (!store.savePersona(record)) {
        error('Failed to save persona')
        process.exitCode = 1
        return
      }
      success(`Created persona ${chalk.bold(record.name)} ${chalk.dim(record.id)}`)
      if (store.storageKind === 'memory') {
        warn('In-memory storage: this persona will not be kept after exit')
      }
    })

  persona
    .command('list')
    .description('저장된 페르소나 목록 (최신순)')
    .option('-n, --limit <n>', '표시할 개수', '10')
    .action(async (options: { limit: string }) => {
      const { store } = await getContext()
      const personas = store.listRecentPersonas(parseNumber(options.limit) ?? 10)
      if (personas.length === 0) {
        info('No personas yet. Create one with `tutor persona create -n <name>`')
        return
      }
      printTable(
        ['ID', '이름', '과목', '수준', '생성'],
        personas.map(p => [
          p.id.slice(0, 8),
          `${p.name} ${chalk.dim(p.title)}`,
          p.subject,
          LEVEL_LABELS[p.level],
          formatRelative(p.created_at),
        ])
      )
    })

  persona
    .command('show <id>')
    .description('페르소나 상세 정보')
    .action(async (id: string) => {
      const { store } = await getContext()
      const record = findPersona(store, id)
      if (!record) {
        error(`Persona not found: ${id}`)
        process.exitCode = 1
        return
      }

      header(`${record.name} ${record.title}`)
      list([
        { label: 'ID', value: record.id, dim: true },
        { label: '과목', value: record.subject },
        { label: '수준', value: LEVEL_LABELS[record.level] },
        { label: '소개', value: record.background || undefined },
        { label: '생성', value: formatTime(record.created_at) },
        { label: '일반 지식 사용', value: record.use_general_knowledge ? '예' : '아니오' },
        {
          label: '음성',
          value: `속도 ${record.voice_settings.speed} · 높이 ${record.voice_settings.pitch} · 음량 ${record.voice_settings.volume}`,
        },
      ])

      header('성격')
      for (const trait of TRAIT_NAMES) {
        const score = record.personality[trait]
        console.log(`  ${TRAIT_LABELS[trait].label.padEnd(10)} ${scoreBar(score)} ${score}`)
      }
      if (record.document_refs.length > 0) {
        header('참고 자료')
        for (const doc of record.document_refs) console.log(`  ${doc.name} ${chalk.dim(`(${doc.size} bytes)`)}`)
      }
    })

  persona
    .command('delete <id>')
    .description('페르소나 삭제')
    .action(async (id: string) => {
      const { store } = await getContext()
      const record = findPersona(store, id)
      if (!record) {
        info(`Persona not found, nothing to delete: ${id}`)
        return
      }
      if (!store.deletePersona(record.id)) {
        error('Failed to delete persona')
        process.exitCode = 1
        return
      }
      success(`Deleted persona ${record.name}`)
    })

  persona
    .command('export <id>')
    .description('페르소나를 JSON 으로 내보내기')
    .option('-o, --output <file>', '저장할 파일 (기본: <이름>_<날짜>.json)')
    .action(async (id: string, options: { output?: string }) => {
      const { store } = await getContext()
      const record = findPersona(store, id)
      const json = record ? store.exportPersona(record.id) : null
      if (!record || json === null) {
        error(`Persona not found: ${id}`)
        process.exitCode = 1
        return
      }
      const file =
        options.output ?? `${sanitizeName(record.name) || 'tutor'}_${formatTime(record.created_at, 'yyyyMMdd')}.json`
      try {
        writeFileSync(file, json, 'utf-8')
      } catch (e) {
        error(`Failed to write ${file}: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      success(`Exported to ${file}`)
    })

  persona
    .command('import <file>')
    .description('JSON 파일에서 페르소나 가져오기 (새 ID 발급)')
    .action(async (file: string) => {
      const { store } = await getContext()
      let json: string
      try {
        json = readFileSync(file, 'utf-8')
      } catch (e) {
        error(`Cannot read ${file}: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      const result = store.importPersona(json)
      if (!result.ok) {
        console.error(result.error.format())
        process.exitCode = 1
        return
      }
      success(`Imported persona ${chalk.bold(result.value.name)} ${chalk.dim(result.value.id)}`)
    })

  persona
    .command('clean')
    .description('오래된 페르소나 정리')
    .option('-d, --days <days>', '이 일수보다 오래된 것을 삭제', '30')
    .action(async (options: { days: string }) => {
      const { store } = await getContext()
      const days = parseNumber(options.days)
      if (days === undefined || days < 0) {
        error(`Invalid --days: ${options.days}`)
        process.exitCode = 1
        return
      }
      const removed = store.cleanOldPersonas(days)
      if (removed === 0) {
        info(`No personas older than ${days} days`)
      } else {
        success(`Removed ${removed} persona(s) older than ${days} days`)
      }
    })
}
