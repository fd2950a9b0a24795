// Configuration management for backplan
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import type { ZodError } from 'zod'
import {
  type BackplanConfig,
  BackplanConfigSchema,
  DEFAULT_CONFIG,
} from './types.ts'
import { getConfigPath, getPlatformDisplayName } from './paths.ts'
import { isRecord } from '../utils/type-guards.ts'

/**
 * Fill in settings added since the file was written. Existing values are
 * left alone, even invalid ones; validation reports those.
 */
export function applyConfigUpgrades(raw: Record<string, unknown>): {
  config: Record<string, unknown>
  updated: boolean
} {
  let updated = false
  const next: Record<string, unknown> = { ...raw }

  for (const [key, value] of Object.entries(DEFAULT_CONFIG)) {
    if (next[key] === undefined) {
      next[key] = value
      updated = true
    }
  }

  return { config: next, updated }
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    .join('; ')
}

export type ConfigLoadResult =
  | { status: 'loaded'; config: BackplanConfig }
  | { status: 'created'; config: BackplanConfig; message: string }
  | { status: 'error'; error: string }

/**
 * Load config from ~/.backplan/config.json
 * If it doesn't exist, create it with defaults
 */
export function loadConfig(configPath: string = getConfigPath()): ConfigLoadResult {
  try {
    if (existsSync(configPath)) {
      const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      if (!isRecord(parsed)) {
        return { status: 'error', error: `Config at ${configPath} must contain a JSON object.` }
      }

      const { config: upgraded, updated } = applyConfigUpgrades(parsed)
      const validated = BackplanConfigSchema.safeParse(upgraded)
      if (!validated.success) {
        return {
          status: 'error',
          error: `Invalid config at ${configPath}: ${formatZodError(validated.error)}`,
        }
      }

      if (updated) {
        const saveResult = saveConfig(validated.data, configPath)
        if (!saveResult.success) {
          return { status: 'error', error: saveResult.error ?? 'Failed to save config' }
        }
      }
      return { status: 'loaded', config: validated.data }
    }

    // Config doesn't exist - create it
    const newConfig: BackplanConfig = { ...DEFAULT_CONFIG }
    const saveResult = saveConfig(newConfig, configPath)
    if (!saveResult.success) {
      return { status: 'error', error: saveResult.error ?? 'Failed to create config' }
    }

    const message =
      `Created config at ${configPath}\n` +
      `Detected platform: ${getPlatformDisplayName()}\n` +
      `Edit the subtask table there to change the template.`

    return { status: 'created', config: newConfig, message }
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err)
    return { status: 'error', error: `Failed to load config: ${error}` }
  }
}

/**
 * Save config to ~/.backplan/config.json
 */
export function saveConfig(
  config: BackplanConfig,
  configPath: string = getConfigPath(),
): {
  success: boolean
  error?: string
} {
  try {
    const configDir = dirname(configPath)
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true })
    }

    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8')
    return { success: true }
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err)
    return { success: false, error: `Failed to save config: ${error}` }
  }
}
