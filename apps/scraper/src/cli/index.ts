#!/usr/bin/env node
import { loadEnv } from '../config/env.js'
import { runRunCommand } from './commands/run.js'
import { runStagesCommand } from './commands/stages.js'
import { asNumber, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Branchline scraper CLI')
  console.log('')
  console.log('Commands:')
  console.log('  run --pipeline <module> --seed <id> [--output <file.csv>] [--limit <n>] [--update]')
  console.log('      [--cache fs|memory|redis|none] [--cache-dir <dir>] [--quiet]')
  console.log('  run --pipeline <module> --url <url> --processor <id> [...same options]')
  console.log('  stages --pipeline <module>')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  loadEnv()

  let exitCode = 2

  switch (command) {
    case 'run':
      exitCode = await runRunCommand({
        pipeline: asString(flags.pipeline),
        seed: asString(flags.seed),
        url: asString(flags.url),
        processor: asString(flags.processor),
        output: asString(flags.output),
        limit: asNumber(flags.limit),
        update: flags.update === true,
        cache: asString(flags.cache),
        cacheDir: asString(flags['cache-dir']),
        quiet: flags.quiet === true,
      })
      break
    case 'stages':
      exitCode = await runStagesCommand({ pipeline: asString(flags.pipeline) })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
