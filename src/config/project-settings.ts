import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs'
import { join, dirname } from 'path'
import type { BackplanConfig, ProjectSettingKey } from './types.ts'
import { PROJECT_SETTING_KEYS, SubtaskSpecSchema } from './types.ts'
import { formatZodError } from './config.ts'
import { parseTodoPolicy, serializeTodoPolicy } from '../core/plan/todo-policy.ts'
import { isRecord } from '../utils/type-guards.ts'

export const SETTINGS_FILE_NAME = '.backplan.json'
const ALLOWED_KEYS = new Set<string>(PROJECT_SETTING_KEYS)

export type ProjectSettingsResult = {
  config: BackplanConfig
  found: boolean
  settingsPath: string
  overrides: Partial<BackplanConfig>
  warnings: string[]
  error?: string
}

/**
 * Load directory-scoped overrides from .backplan.json next to an outline file.
 * Global-only settings (logToFile) are always preserved from the base config.
 */
export function loadProjectSettings(
  baseConfig: BackplanConfig,
  directory: string,
): ProjectSettingsResult {
  const settingsPath = join(directory, SETTINGS_FILE_NAME)

  if (!existsSync(settingsPath)) {
    return {
      config: baseConfig,
      found: false,
      settingsPath,
      overrides: {},
      warnings: [],
    }
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'))

    if (!isRecord(parsed)) {
      return {
        config: baseConfig,
        found: true,
        settingsPath,
        overrides: {},
        warnings: [],
        error: `${SETTINGS_FILE_NAME} must contain a JSON object.`,
      }
    }

    const raw = parsed
    const overrides: Partial<BackplanConfig> = {}
    const warnings: string[] = []

    if ('subtasks' in raw) {
      const subtasks = SubtaskSpecSchema.array().safeParse(raw.subtasks)
      if (subtasks.success) {
        overrides.subtasks = subtasks.data
      } else {
        warnings.push(`subtasks ignored: ${formatZodError(subtasks.error)}.`)
      }
    }

    // Any value is accepted here; unusable ones disable the project keyword
    if ('masterTodo' in raw) {
      overrides.masterTodo = raw.masterTodo
      if (typeof raw.masterTodo !== 'boolean' && typeof raw.masterTodo !== 'string') {
        warnings.push('masterTodo should be a boolean or a string; the project headline gets no keyword.')
      }
    }

    if ('defaultTodo' in raw) {
      const todo = raw.defaultTodo
      if (typeof todo === 'string') {
        overrides.defaultTodo = todo.trim()
      } else {
        warnings.push('defaultTodo must be a string.')
      }
    }

    if ('useDeadline' in raw) {
      if (typeof raw.useDeadline === 'boolean') {
        overrides.useDeadline = raw.useDeadline
      } else {
        warnings.push('useDeadline must be a boolean.')
      }
    }

    if ('allowWeekends' in raw) {
      if (typeof raw.allowWeekends === 'boolean') {
        overrides.allowWeekends = raw.allowWeekends
      } else {
        warnings.push('allowWeekends must be a boolean.')
      }
    }

    const unknownKeys = Object.keys(raw).filter((key) => !ALLOWED_KEYS.has(key))
    if (unknownKeys.length > 0) {
      warnings.push(`Ignored unknown (or global) settings: ${unknownKeys.join(', ')}.`)
    }

    return {
      config: { ...baseConfig, ...overrides },
      found: true,
      settingsPath,
      overrides,
      warnings,
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return {
      config: baseConfig,
      found: true,
      settingsPath,
      overrides: {},
      warnings: [],
      error: `Failed to read ${SETTINGS_FILE_NAME}: ${message}`,
    }
  }
}

export type SaveProjectSettingsResult = {
  success: boolean
  settingsPath: string
  error?: string
}

/**
 * Save directory-scoped settings to .backplan.json.
 * Only the keys a directory may override are written; masterTodo is written
 * in its canonical form (false, true or a trimmed keyword).
 */
export function saveProjectSettings(
  directory: string,
  settings: Partial<BackplanConfig>,
): SaveProjectSettingsResult {
  const settingsPath = join(directory, SETTINGS_FILE_NAME)

  const projectSettings: Partial<Record<ProjectSettingKey, unknown>> = {}
  for (const key of PROJECT_SETTING_KEYS) {
    if (settings[key] !== undefined) {
      projectSettings[key] = settings[key]
    }
  }
  if ('masterTodo' in projectSettings) {
    projectSettings.masterTodo = serializeTodoPolicy(parseTodoPolicy(projectSettings.masterTodo))
  }

  try {
    const dir = dirname(settingsPath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    writeFileSync(settingsPath, JSON.stringify(projectSettings, null, 2) + '\n', 'utf-8')

    return {
      success: true,
      settingsPath,
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return {
      success: false,
      settingsPath,
      error: `Failed to save ${SETTINGS_FILE_NAME}: ${message}`,
    }
  }
}
