import React, { useEffect, useState } from 'react'
import { Box, Text, useApp } from 'ink'
import type { PlanConfig } from '../../core/plan/types.ts'
import {
  createProject,
  previewProject,
  type ProjectAnswers,
} from '../../core/create-project.ts'
import type { DocumentHost } from '../../outline/document.ts'
import { debugLog } from '../../debug/logger.ts'
import { assertNever } from '../../utils/type-guards.ts'
import { TextInput, TreePreview } from '../components/index.ts'

// ============================================================================
// Types
// ============================================================================

export type ProjectTarget =
  | { kind: 'preview' }
  | { kind: 'document'; host: DocumentHost; label: string; cursorLine: number | null }

type NewProjectFlowProps = {
  config: PlanConfig
  target: ProjectTarget
  today: Date
}

type FlowState =
  | { step: 'name' }
  | { step: 'category'; name: string }
  | { step: 'due'; name: string; category: string }
  | { step: 'done'; lines: string[]; insertedAt: number | null }
  | { step: 'failed'; error: Error }

// ============================================================================
// Component
// ============================================================================

export function NewProjectFlow({ config, target, today }: NewProjectFlowProps) {
  const { exit } = useApp()
  const [state, setState] = useState<FlowState>({ step: 'name' })
  const [input, setInput] = useState('')

  useEffect(() => {
    if (state.step === 'done') exit()
    if (state.step === 'failed') exit(state.error)
  }, [state, exit])

  const finish = (answers: ProjectAnswers) => {
    try {
      if (target.kind === 'preview') {
        const { lines } = previewProject(answers, { config, today })
        setState({ step: 'done', lines, insertedAt: null })
        return
      }

      const result = createProject(answers, {
        config,
        today,
        host: target.host,
        cursorLine: target.cursorLine,
      })
      setState({ step: 'done', lines: result.lines, insertedAt: result.insertedAt })
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      debugLog.error('Project creation aborted', { message: error.message })
      setState({ step: 'failed', error })
    }
  }

  const submit = (value: string) => {
    setInput('')
    switch (state.step) {
      case 'name':
        setState({ step: 'category', name: value })
        return
      case 'category':
        setState({ step: 'due', name: state.name, category: value })
        return
      case 'due':
        finish({ name: state.name, category: state.category, dueDate: value })
        return
      case 'done':
      case 'failed':
        return
      default:
        return assertNever(state)
    }
  }

  switch (state.step) {
    case 'name':
      return (
        <TextInput label="Project name" value={input} onChange={setInput} onSubmit={submit} />
      )

    case 'category':
      return (
        <TextInput
          label="Category"
          hint="blank uses the project name"
          value={input}
          onChange={setInput}
          onSubmit={submit}
          placeholder={state.name}
        />
      )

    case 'due':
      return (
        <TextInput
          label="Due date"
          hint="YYYY-MM-DD, +3d, -1w, fri, today"
          value={input}
          onChange={setInput}
          onSubmit={submit}
        />
      )

    case 'done':
      return (
        <Box flexDirection="column">
          <TreePreview lines={state.lines} />
          {target.kind === 'document' && state.insertedAt !== null && (
            <Text color="green">
              Inserted {state.lines.length} lines into {target.label} at line {state.insertedAt + 1}
            </Text>
          )}
        </Box>
      )

    case 'failed':
      return null

    default:
      return assertNever(state)
  }
}
