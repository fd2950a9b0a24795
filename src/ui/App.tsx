import React, { useEffect, useState } from 'react'
import { Box, Text, useApp } from 'ink'
import { dirname, resolve } from 'path'
import { loadConfig } from '../config/config.ts'
import { loadProjectSettings } from '../config/project-settings.ts'
import { toPlanConfig } from '../config/types.ts'
import type { PlanConfig } from '../core/plan/types.ts'
import { OutlineFileHost } from '../outline/file-host.ts'
import { DEFAULT_TODO_KEYWORDS } from '../outline/document.ts'
import { DebugLog } from './components/index.ts'
import { debugLog } from '../debug/logger.ts'
import { assertNever } from '../utils/type-guards.ts'
import { NewProjectFlow, type ProjectTarget } from './NewProject/index.tsx'

// ============================================================================
// Types
// ============================================================================

type AppProps = {
  command: 'new' | 'preview'
  filePath?: string
  /** Zero-based cursor line, or null to append at the end */
  cursorLine: number | null
  today: Date
  debug?: boolean
}

type ReadyState = {
  config: PlanConfig
  target: ProjectTarget
  notices: string[]
  warnings: string[]
}

type AppState =
  | { phase: 'loading' }
  | ({ phase: 'ready' } & ReadyState)
  | { phase: 'error'; error: string }

/**
 * Resolve settings for the target file and open it. Any failure here is
 * reported before the first prompt.
 */
function prepare(props: AppProps): AppState {
  const result = loadConfig()
  if (result.status === 'error') {
    return { phase: 'error', error: result.error }
  }

  const notices = result.status === 'created' ? [result.message] : []
  const warnings: string[] = []
  let settings = result.config

  if (props.command === 'new' && props.filePath) {
    const path = resolve(props.filePath)
    const project = loadProjectSettings(settings, dirname(path))
    if (project.error) {
      return { phase: 'error', error: project.error }
    }
    settings = project.config
    warnings.push(...project.warnings)
    if (project.found) {
      debugLog.info('Directory settings applied', { path: project.settingsPath, overrides: project.overrides })
    }
  }

  if (settings.logToFile) {
    debugLog.enableFileLogging()
  }

  const config = toPlanConfig(settings)

  if (props.command === 'preview') {
    return { phase: 'ready', config, target: { kind: 'preview' }, notices, warnings }
  }

  if (!props.filePath) {
    return { phase: 'error', error: 'No outline file given. Usage: backplan new <file> [line]' }
  }

  const todoKeywords = [...DEFAULT_TODO_KEYWORDS, config.defaultTodo]
  if (config.projectTodo.kind === 'custom') todoKeywords.push(config.projectTodo.state)

  const host = new OutlineFileHost(resolve(props.filePath), { todoKeywords })
  if (props.cursorLine !== null && props.cursorLine >= host.document.lineCount) {
    warnings.push(`Line ${props.cursorLine + 1} is past the end of the file; using the last line.`)
  }

  return {
    phase: 'ready',
    config,
    target: { kind: 'document', host, label: props.filePath, cursorLine: props.cursorLine },
    notices,
    warnings,
  }
}

// ============================================================================
// Component
// ============================================================================

export function App(props: AppProps) {
  const { command, debug = false } = props
  const { exit } = useApp()
  const [state, setState] = useState<AppState>({ phase: 'loading' })

  useEffect(() => {
    debugLog.setEnabled(debug)
    if (debug) {
      debugLog.info('Debug mode enabled')
      debugLog.info('App starting', { command })
    }
  }, [debug, command])

  useEffect(() => {
    try {
      const next = prepare(props)
      for (const warning of next.phase === 'ready' ? next.warnings : []) {
        debugLog.warn(warning)
      }
      setState(next)
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err)
      setState({ phase: 'error', error })
    }
    // Props are fixed for the lifetime of the CLI process
  }, [])

  // The CLI entry point prints the message and sets the exit code
  useEffect(() => {
    if (state.phase === 'error') exit(new Error(state.error))
  }, [state, exit])

  const renderPhase = (): React.ReactNode => {
    switch (state.phase) {
      case 'loading':
        return <Text color="cyan">Loading backplan...</Text>

      case 'error':
        return null

      case 'ready':
        return (
          <Box flexDirection="column">
            {state.notices.map((notice, i) => (
              <Text key={`notice-${i}`} dimColor>
                {notice}
              </Text>
            ))}
            {state.warnings.map((warning, i) => (
              <Text key={`warning-${i}`} color="yellow">
                {warning}
              </Text>
            ))}
            <NewProjectFlow config={state.config} target={state.target} today={props.today} />
          </Box>
        )

      default:
        return assertNever(state)
    }
  }

  return (
    <Box flexDirection="column" padding={1}>
      {renderPhase()}
      {debug && <DebugLog maxLines={6} />}
    </Box>
  )
}
