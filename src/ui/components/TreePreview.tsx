import React from 'react'
import { Box, Text } from 'ink'

type TreePreviewProps = {
  lines: string[]
}

function lineColor(line: string): string | undefined {
  if (/^\*+ /.test(line)) return 'cyan'
  if (line.startsWith(':')) return 'gray'
  if (/^(DEADLINE|SCHEDULED):/.test(line)) return 'magenta'
  return undefined
}

export function TreePreview({ lines }: TreePreviewProps) {
  return (
    <Box flexDirection="column" paddingX={1}>
      {lines.map((line, i) => (
        <Text key={i} color={lineColor(line)}>
          {line}
        </Text>
      ))}
    </Box>
  )
}
