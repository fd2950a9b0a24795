import React from 'react'
import { Box, Text } from 'ink'
import InkTextInput from 'ink-text-input'

type TextInputProps = {
  label: string
  hint?: string
  value: string
  onChange: (value: string) => void
  onSubmit: (value: string) => void
  placeholder?: string
  focus?: boolean
}

/**
 * One prompt line. Empty answers are submitted as-is; the caller decides
 * what blank means (category falls back to the name, a blank date is today).
 */
export function TextInput({
  label,
  hint,
  value,
  onChange,
  onSubmit,
  placeholder,
  focus = true,
}: TextInputProps) {
  return (
    <Box flexDirection="column">
      <Box>
        <Text color="cyan" bold>
          {label}
        </Text>
        {hint && <Text dimColor> ({hint})</Text>}
      </Box>
      <Box>
        <Text color="gray">{'❯ '}</Text>
        <InkTextInput
          value={value}
          onChange={onChange}
          onSubmit={onSubmit}
          placeholder={placeholder ?? ''}
          focus={focus}
        />
      </Box>
    </Box>
  )
}
