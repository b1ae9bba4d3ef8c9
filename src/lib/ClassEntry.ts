import { align } from '../utils/align.js'
import { FunctionEntry } from './FunctionEntry.js'
import { VariableEntry } from './VariableEntry.js'
import { joinDescription, resolveMode } from './DocumentationMode.js'
import { UsageError, type DocumentationMode, type EntryOptions } from '../types/documentation.js'

export type HighlightedMember =
	| { kind: 'function'; entry: FunctionEntry }
	| { kind: 'variable'; entry: VariableEntry }

/**
 * Documentation of a class: its description, an optional constructor and a
 * summary of highlighted methods and attributes. Other members are documented
 * with their own entries.
 */
export class ClassEntry {
	readonly name: string
	readonly description: string
	readonly mode: DocumentationMode

	private constructorEntry: FunctionEntry | undefined
	private readonly highlights: HighlightedMember[] = []
	private rendered: string | undefined

	constructor(name: string, shortDescription: string, longDescription?: string, options: EntryOptions = {}) {
		if (!name) {
			throw new UsageError('EMPTY_NAME', 'A documented class needs a name')
		}
		this.name = name
		this.mode = resolveMode(options)
		this.description = joinDescription(shortDescription, longDescription, this.mode)
	}

	/**
	 * Copy of the stored constructor documentation; changing or rendering it
	 * does not affect this class
	 */
	get constructorDoc(): FunctionEntry | undefined {
		return this.constructorEntry?.clone()
	}

	get highlightedFunctions(): FunctionEntry[] {
		return this.highlights.flatMap((member) => (member.kind === 'function' ? [member.entry] : []))
	}

	get highlightedVariables(): VariableEntry[] {
		return this.highlights.flatMap((member) => (member.kind === 'variable' ? [member.entry] : []))
	}

	/**
	 * Attach the constructor documentation; can only be done once.
	 * A copy is stored, renamed to the class name.
	 */
	addConstructor(constructorDoc: FunctionEntry): this {
		if (this.constructorEntry) {
			throw new UsageError(
				'DUPLICATE_CONSTRUCTOR',
				`The class documentation of '${this.name}' can have only a single constructor documentation`,
			)
		}
		this.constructorEntry = constructorDoc.asConstructorOf(this.name)
		return this
	}

	/**
	 * Add a method or attribute to the highlighted section
	 */
	highlight(member: FunctionEntry | VariableEntry): this {
		if (member instanceof FunctionEntry) {
			this.highlights.push({ kind: 'function', entry: member })
		} else {
			this.highlights.push({ kind: 'variable', entry: member })
		}
		return this
	}

	/**
	 * Parameter names of the constructor prototype at `index`
	 * @throws UsageError if no constructor was added or the index is out of range
	 */
	kwlist(index: number): string[] {
		if (!this.constructorEntry) {
			throw new UsageError(
				'MISSING_CONSTRUCTOR',
				`The class documentation of '${this.name}' does not have constructor documentation`,
			)
		}
		return this.constructorEntry.kwlist(index)
	}

	usage(): string {
		return this.constructorEntry?.usage() ?? ''
	}

	printUsage(stream: NodeJS.WritableStream = process.stderr): void {
		this.constructorEntry?.printUsage(stream)
	}

	/**
	 * Generate the documentation string. The first call fixes the result.
	 */
	render(width = 72): string {
		if (this.rendered === undefined) {
			this.rendered = this.mode === 'short' ? this.description : this.renderFull(width)
		}
		return this.rendered
	}

	private renderFull(width: number): string {
		let doc = `${align(this.description, 0, width)}\n`

		if (this.constructorEntry) {
			doc += `\n${align('**Constructor Documentation:**', 0, width)}\n\n`
			doc += `${this.constructorEntry.render(width, 4)}\n`
		}

		doc += `\n${align('**Class Members:**', 0, width)}\n\n`

		const functions = this.highlightedFunctions
		if (functions.length > 0) {
			doc += `\n${align('**Highlighted Methods:**', 2, width)}\n\n`
			for (const fn of functions) {
				doc += `${align(`* :func:\`${fn.name}\``, 2, width)}${align(fn.summary, 4, width)}\n`
			}
		}

		const variables = this.highlightedVariables
		if (variables.length > 0) {
			doc += `\n${align('**Highlighted Attributes:**', 2, width)}\n\n`
			for (const variable of variables) {
				doc += `${align(`* :obj:\`${variable.name}\``, 2, width)}${align(variable.summary, 4, width)}\n`
			}
		}

		return doc
	}
}
