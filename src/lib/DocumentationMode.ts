import type { DocumentationMode, EntryOptions } from '../types/documentation.js'

/** Environment variable that switches every entry without an explicit mode to short docstrings */
export const SHORT_DOCSTRINGS_ENV = 'DOCFMT_SHORT_DOCSTRINGS'

/**
 * Mode used when an entry is created without one
 */
export function getDefaultMode(): DocumentationMode {
	return process.env[SHORT_DOCSTRINGS_ENV] === 'true' ? 'short' : 'full'
}

export function resolveMode(options: EntryOptions = {}): DocumentationMode {
	return options.mode ?? getDefaultMode()
}

/**
 * Combine short and long description, separated by a blank line.
 * Short docstrings keep the short description only.
 */
export function joinDescription(
	shortDescription: string,
	longDescription: string | undefined,
	mode: DocumentationMode,
): string {
	if (mode === 'short' || longDescription === undefined) {
		return shortDescription
	}
	return `${shortDescription}\n\n${longDescription}`
}

