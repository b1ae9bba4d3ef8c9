import { align, split } from '../utils/align.js'
import { formatTypeLabel } from '../utils/markup.js'
import { joinDescription, resolveMode } from './DocumentationMode.js'
import { UsageError, type DocumentationMode, type EntryOptions } from '../types/documentation.js'

/**
 * Documentation of a global or member variable
 */
export class VariableEntry {
	readonly name: string
	readonly typeLabel: string
	readonly description: string
	readonly mode: DocumentationMode

	private rendered: string | undefined

	constructor(
		name: string,
		typeLabel: string,
		shortDescription: string,
		longDescription?: string,
		options: EntryOptions = {},
	) {
		if (!name) {
			throw new UsageError('EMPTY_NAME', 'A documented variable needs a name')
		}
		this.name = name
		this.typeLabel = typeLabel
		this.mode = resolveMode(options)
		this.description = joinDescription(shortDescription, longDescription, this.mode)
	}

	/**
	 * First line of the description, used in class summaries
	 */
	get summary(): string {
		return split(this.description, '\n')[0] ?? ''
	}

	/**
	 * Render `type  <-- description`, aligned to `width` columns.
	 * The first call fixes the result, later calls return the cached string.
	 */
	render(width = 72): string {
		if (this.rendered === undefined) {
			this.rendered =
				this.mode === 'short'
					? this.description
					: align(`${formatTypeLabel(this.typeLabel)}  <-- ${this.description}`, 0, width)
		}
		return this.rendered
	}
}
