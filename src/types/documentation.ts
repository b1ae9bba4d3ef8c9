// Documentation entry types

/**
 * How entries are rendered: `full` builds the aligned block with prototypes,
 * parameters and consistency notices, `short` returns the short description only
 */
export type DocumentationMode = 'full' | 'short'

export interface EntryOptions {
	mode?: DocumentationMode
}

export interface FunctionEntryOptions extends EntryOptions {
	/** Member functions are rendered 4 columns narrower since they are nested one level deeper */
	isMember?: boolean
}

/**
 * One documented way to call a function
 */
export interface Prototype {
	/** Comma-separated parameter names, e.g. "a, b" */
	variables: string
	/** Comma-separated return names; '' marks a constructor, 'None' no return value */
	returnValue: string
}

/**
 * Documentation of a single parameter or return value
 */
export interface NamedValueDoc {
	name: string
	typeLabel: string
	description: string
}

// Error types
export type UsageErrorCode =
	| 'PROTOTYPE_OUT_OF_RANGE'
	| 'DUPLICATE_CONSTRUCTOR'
	| 'MISSING_CONSTRUCTOR'
	| 'EMPTY_NAME'
	| 'INVALID_METADATA'

/**
 * Error thrown when an entry is used in a way it does not support,
 * e.g. asking for a prototype that was never added
 */
export class UsageError extends Error {
	constructor(
		public code: UsageErrorCode,
		message: string,
	) {
		super(message)
		this.name = 'UsageError'
		// Maintain proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, UsageError)
		}
	}
}
