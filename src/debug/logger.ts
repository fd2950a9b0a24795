// Debug logging for backplan
// Keeps recent entries for the debug panel and optionally appends them to a session log file

import { existsSync, mkdirSync, appendFileSync } from 'fs'
import { join } from 'path'
import { getLogsDir } from '../config/paths.ts'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogEntry = {
  timestamp: Date
  level: LogLevel
  message: string
  data?: unknown
}

type LogSubscriber = (entry: LogEntry) => void

/**
 * Format a date as a filename-safe timestamp: YYYY-MM-DD_HH-MM-SS
 */
function formatSessionTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
}

export function formatLogEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5)
  let line = `[${entry.timestamp.toISOString()}] ${level} ${entry.message}`

  if (entry.data !== undefined) {
    let dataStr: string
    try {
      dataStr = JSON.stringify(entry.data, null, 2) ?? String(entry.data)
    } catch {
      dataStr = '[Data not serializable]'
    }
    line += '\n' + dataStr.split('\n').map((l) => `    ${l}`).join('\n')
  }

  return line
}

export class DebugLogger {
  private subscribers: Set<LogSubscriber> = new Set()
  private logs: LogEntry[] = []
  private readonly maxLogs: number
  private _enabled = false

  private _sessionStartTime: Date
  private _logFilePath: string | null = null
  private readonly logsDir: string

  constructor(options: { logsDir?: string; maxLogs?: number } = {}) {
    this._sessionStartTime = new Date()
    this.logsDir = options.logsDir ?? getLogsDir()
    this.maxLogs = options.maxLogs ?? 100
  }

  get enabled(): boolean {
    return this._enabled
  }

  get logFilePath(): string | null {
    return this._logFilePath
  }

  setEnabled(enabled: boolean): void {
    this._enabled = enabled
  }

  /**
   * Start a session log file. Returns false (and reports to stderr) when the
   * logs directory is not writable; the CLI keeps running without a file.
   */
  enableFileLogging(): boolean {
    if (this._logFilePath) return true

    try {
      if (!existsSync(this.logsDir)) {
        mkdirSync(this.logsDir, { recursive: true })
      }

      const path = join(
        this.logsDir,
        `session_${formatSessionTimestamp(this._sessionStartTime)}.log`,
      )
      const header = [
        '='.repeat(80),
        'BACKPLAN SESSION LOG',
        `Started: ${this._sessionStartTime.toISOString()}`,
        '='.repeat(80),
        '',
      ].join('\n')

      appendFileSync(path, header + '\n')
      this._logFilePath = path
      this.info('File logging enabled', { logFile: path })
      return true
    } catch (err) {
      console.error('Failed to enable file logging:', err)
      return false
    }
  }

  private writeToFile(entry: LogEntry): void {
    if (!this._logFilePath) return

    try {
      appendFileSync(this._logFilePath, formatLogEntry(entry) + '\n')
    } catch (err) {
      // Stop after the first failure so every later entry doesn't repeat it
      this._logFilePath = null
      console.error('Session log write failed, file logging disabled:', err)
    }
  }

  subscribe(callback: LogSubscriber): () => void {
    this.subscribers.add(callback)
    return () => {
      this.subscribers.delete(callback)
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  clear(): void {
    this.logs = []
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      data,
    }

    this.writeToFile(entry)

    // The in-memory ring only feeds the debug panel
    if (!this._enabled) return

    this.logs.push(entry)
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs)
    }

    for (const subscriber of this.subscribers) {
      subscriber(entry)
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data)
  }
}

// Singleton instance
export const debugLog = new DebugLogger()
