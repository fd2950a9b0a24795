// Settings CLI commands
// `backplan config` shows the effective settings, `backplan init` seeds a directory override file

import { join, resolve } from 'path'
import { existsSync } from 'fs'
import { loadConfig } from '../../config/config.ts'
import { getConfigPath } from '../../config/paths.ts'
import { loadProjectSettings, saveProjectSettings, SETTINGS_FILE_NAME } from '../../config/project-settings.ts'
import type { BackplanConfig } from '../../config/types.ts'

export type CommandIO = {
  log: (message: string) => void
  error: (message: string) => void
  configPath?: string
}

const defaultIO: CommandIO = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
}

function getConfig(io: CommandIO): BackplanConfig | null {
  const result = loadConfig(io.configPath ?? getConfigPath())
  if (result.status === 'error') {
    io.error(`Config error: ${result.error}`)
    return null
  }
  if (result.status === 'created') {
    io.log(result.message)
  }
  return result.config
}

/**
 * Print the settings that apply to a directory (global config merged with
 * its .backplan.json, if any).
 */
export function configCommand(args: string[], io: CommandIO = defaultIO): number {
  const config = getConfig(io)
  if (!config) return 1

  const directory = resolve(args[0] ?? '.')
  const project = loadProjectSettings(config, directory)
  if (project.error) {
    io.error(project.error)
    return 1
  }

  io.log(`Global config: ${io.configPath ?? getConfigPath()}`)
  io.log(
    project.found
      ? `Directory settings: ${project.settingsPath}`
      : `Directory settings: none (${SETTINGS_FILE_NAME} not found in ${directory})`,
  )
  for (const warning of project.warnings) {
    io.error(`Warning: ${warning}`)
  }
  io.log(JSON.stringify(project.config, null, 2))
  return 0
}

/**
 * Write a .backplan.json holding the current template so it can be edited
 * per directory. Refuses to overwrite an existing file.
 */
export function initCommand(args: string[], io: CommandIO = defaultIO): number {
  const config = getConfig(io)
  if (!config) return 1

  const directory = resolve(args[0] ?? '.')
  const settingsPath = join(directory, SETTINGS_FILE_NAME)
  if (existsSync(settingsPath)) {
    io.error(`${settingsPath} already exists`)
    return 1
  }

  const result = saveProjectSettings(directory, config)
  if (!result.success) {
    io.error(result.error ?? `Failed to write ${result.settingsPath}`)
    return 1
  }

  io.log(`Wrote ${result.settingsPath}`)
  return 0
}
