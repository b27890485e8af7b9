import { readFileSync, writeFileSync } from 'fs'
import { Command } from 'commander'
import { getContext } from '../context.js'
import { success, error, header, list } from '../output.js'
import { formatTime, now } from '../../shared/formatTime.js'
import { getErrorMessage } from '../../shared/assertError.js'

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  return `${(bytes / 1024).toFixed(1)} KB`
}

export function registerDataCommands(program: Command) {
  const data = program.command('data').description('백업 / 복원 / 저장소 통계')

  data
    .command('backup')
    .description('페르소나와 사용자 프리셋을 JSON 파일 하나로 백업')
    .option('-o, --output <file>', '저장할 파일 (기본: tutor_backup_<날짜>.json)')
    .action(async (options: { output?: string }) => {
      const { store } = await getContext()
      const file = options.output ?? `tutor_backup_${formatTime(now(), 'yyyyMMdd_HHmmss')}.json`
      try {
        writeFileSync(file, store.exportAll(), 'utf-8')
      } catch (e) {
        error(`Failed to write ${file}: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      success(`Backup written to ${file}`)
    })

  data
    .command('restore <file>')
    .description('백업 파일로 전체 교체')
    .action(async (file: string) => {
      const { store } = await getContext()
      let snapshot: string
      try {
        snapshot = readFileSync(file, 'utf-8')
      } catch (e) {
        error(`Cannot read ${file}: ${getErrorMessage(e)}`)
        process.exitCode = 1
        return
      }
      const result = store.restoreAll(snapshot)
      if (!result.ok) {
        console.error(result.error.format())
        process.exitCode = 1
        return
      }
      const stats = store.stats()
      success(`Restored ${stats.persona_count} persona(s) and ${stats.preset_count} preset(s)`)
    })

  data
    .command('stats')
    .description('저장소 통계')
    .action(async () => {
      const { store } = await getContext()
      const stats = store.stats()
      header(`저장소 (${store.storageKind})`)
      list([
        { label: '페르소나', value: `${stats.persona_count} / ${store.maxPersonas}` },
        { label: '사용자 프리셋', value: stats.preset_count },
        { label: '페르소나 파일', value: formatBytes(stats.personas_size_bytes) },
        { label: '프리셋 파일', value: formatBytes(stats.presets_size_bytes) },
        { label: '합계', value: formatBytes(stats.total_size_bytes) },
      ])
    })
}
