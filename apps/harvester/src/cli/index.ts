#!/usr/bin/env node
import '../env.js'
import { classifyError, EXIT_CODES } from '../errors.js'
import { runExtractCommand } from './commands/extract.js'
import { runIngestCommand } from './commands/ingest.js'
import { asInteger, asList, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('GPU listing harvester')
  console.log('')
  console.log('Commands:')
  console.log('  ingest [--terms "rtx,radeon rx"] [--max-pages 3] [--all-pages] [--json]')
  console.log('  extract --title "<listing title>" [--description "<text>"]')
  console.log('')
  console.log('Settings come from the environment (see .env.example).')
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return EXIT_CODES.OK
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return EXIT_CODES.OK
  }

  switch (command) {
    case 'ingest': {
      const terms = asList(flags.terms)
      const maxPages = asInteger(flags['max-pages'])
      return runIngestCommand({
        ...(terms ? { terms } : {}),
        ...(maxPages !== undefined ? { maxPages } : {}),
        ...(flags['all-pages'] === true ? { allPages: true } : {}),
        json: flags.json === true,
      })
    }
    case 'extract': {
      const description = asString(flags.description)
      return runExtractCommand({
        title: asString(flags.title),
        ...(description ? { description } : {}),
      })
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return EXIT_CODES.INVALID_INPUT
  }
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    const classified = classifyError(error)
    console.error(classified.message)
    process.exit(classified.exitCode)
  })
