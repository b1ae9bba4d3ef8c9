export { align, split, strip, UNBOUNDED } from './utils/align.js'
export { checkConsistency, NO_RETURN } from './utils/consistency.js'
export { formatTypeLabel, formatPrototype, formatUsage } from './utils/markup.js'
export { FunctionEntry } from './lib/FunctionEntry.js'
export { ClassEntry, type HighlightedMember } from './lib/ClassEntry.js'
export { VariableEntry } from './lib/VariableEntry.js'
export { getDefaultMode, SHORT_DOCSTRINGS_ENV } from './lib/DocumentationMode.js'
export {
	MetadataLoader,
	findEntry,
	DocumentationMetadataSchema,
	type DocumentedEntry,
	type DocumentationMetadata,
} from './lib/MetadataLoader.js'
export { SettingsManager, DocSettingsSchema, type DocSettings } from './lib/SettingsManager.js'
export {
	UsageError,
	type UsageErrorCode,
	type DocumentationMode,
	type EntryOptions,
	type FunctionEntryOptions,
	type NamedValueDoc,
	type Prototype,
} from './types/documentation.js'
