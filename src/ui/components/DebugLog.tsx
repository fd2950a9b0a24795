import React, { useState, useEffect } from 'react'
import { Box, Text } from 'ink'
import { debugLog, type LogEntry, type LogLevel } from '../../debug/logger.ts'

type DebugLogProps = {
  maxLines?: number
}

const levelColors: Record<LogLevel, string> = {
  debug: 'gray',
  info: 'cyan',
  warn: 'yellow',
  error: 'red',
}

const levelLabels: Record<LogLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function formatTimestamp(date: Date): string {
  const h = date.getHours().toString().padStart(2, '0')
  const m = date.getMinutes().toString().padStart(2, '0')
  const s = date.getSeconds().toString().padStart(2, '0')
  return `${h}:${m}:${s}`
}

function formatData(data: unknown): string {
  if (data === undefined) return ''
  let str: string
  try {
    str = typeof data === 'string' ? data : JSON.stringify(data)
  } catch {
    return ' [Object]'
  }
  return str.length > 60 ? ` ${str.slice(0, 60)}...` : ` ${str}`
}

/**
 * Tail of the debug log, shown under the prompts when --debug is passed.
 */
export function DebugLog({ maxLines = 6 }: DebugLogProps) {
  const [logs, setLogs] = useState<LogEntry[]>(() => debugLog.getLogs())

  useEffect(() => {
    return debugLog.subscribe((entry) => {
      setLogs((prev) => [...prev, entry].slice(-maxLines))
    })
  }, [maxLines])

  const visibleLogs = logs.slice(-maxLines)

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Text bold dimColor>
        Debug Log
      </Text>
      {visibleLogs.length === 0 ? (
        <Text dimColor>No log entries yet...</Text>
      ) : (
        visibleLogs.map((entry, i) => (
          <Box key={`${entry.timestamp.getTime()}-${i}`}>
            <Text dimColor>{formatTimestamp(entry.timestamp)} </Text>
            <Text color={levelColors[entry.level]}>[{levelLabels[entry.level]}]</Text>
            <Text> {entry.message}</Text>
            <Text dimColor>{formatData(entry.data)}</Text>
          </Box>
        ))
      )}
    </Box>
  )
}
