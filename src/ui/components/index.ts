export { TextInput } from './TextInput.tsx'
export { DebugLog } from './DebugLog.tsx'
export { TreePreview } from './TreePreview.tsx'
