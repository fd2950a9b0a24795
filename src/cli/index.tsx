#!/usr/bin/env tsx
import { render } from 'ink'
import React from 'react'
import { App } from '../ui/App.tsx'
import { debugLog } from '../debug/logger.ts'
import { parseArgs, parseCursorLine } from './args.ts'
import { configCommand, initCommand } from './commands/settings.ts'

const { command, positionals, debug } = parseArgs(process.argv.slice(2))

debugLog.info('backplan CLI started', {
  args: process.argv.slice(2),
  nodeVersion: process.version,
  platform: process.platform,
})

function showHelp() {
  console.log(`
backplan - schedule a project's subtasks backward from its due date

Usage:
  backplan new <file> [line]   Ask for a project and insert it into an outline file
                               after the subtree at <line> (1-based; default: end of file)
  backplan preview             Ask for a project and print it without writing anything
  backplan config [dir]        Show the settings that apply to a directory
  backplan init [dir]          Write a .backplan.json with the current template
  backplan help                Show this help message
  backplan version             Show version

Options:
  --help, -h         Show help
  --version, -v      Show version
  --debug, -d        Show the debug log panel
`)
}

function showVersion() {
  console.log('backplan v0.1.0')
}

async function runApp(props: { command: 'new' | 'preview'; filePath?: string; cursorLine: number | null }) {
  const { waitUntilExit } = render(
    <App {...props} today={new Date()} debug={debug} />,
  )
  await waitUntilExit()
}

async function main() {
  switch (command) {
    case 'new':
      await runApp({
        command: 'new',
        filePath: positionals[0],
        cursorLine: parseCursorLine(positionals[1]),
      })
      break

    case 'preview':
      await runApp({ command: 'preview', cursorLine: null })
      break

    case 'config':
      process.exitCode = configCommand(positionals)
      break

    case 'init':
      process.exitCode = initCommand(positionals)
      break

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp()
      break

    case 'version':
    case '--version':
    case '-v':
      showVersion()
      break

    default:
      console.log(`Unknown command: ${command}`)
      console.log('Run "backplan help" for usage information.')
      process.exit(1)
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err)
  debugLog.error('CLI failed', { message })
  console.error('Error:', message)
  process.exit(1)
})
