import { align, split, strip, UNBOUNDED } from '../utils/align.js'
import { checkConsistency, NO_RETURN } from '../utils/consistency.js'
import { formatNamedValue, formatPrototype, formatUsage } from '../utils/markup.js'
import { joinDescription, resolveMode } from './DocumentationMode.js'
import {
	UsageError,
	type DocumentationMode,
	type FunctionEntryOptions,
	type NamedValueDoc,
	type Prototype,
} from '../types/documentation.js'

/**
 * Documentation of a function, method or constructor
 *
 * Prototypes, parameters and return values are added after construction.
 * Rendering checks that every name used in a prototype is documented and the
 * other way around; mismatches end up as `.. todo::` notices in the output.
 */
export class FunctionEntry {
	readonly description: string
	readonly mode: DocumentationMode

	private entryName: string
	private isMember: boolean
	private readonly prototypeList: Prototype[] = []
	private readonly parameterList: NamedValueDoc[] = []
	private readonly returnList: NamedValueDoc[] = []
	private readonly kwlists: string[][] = []
	private rendered: string | undefined

	constructor(
		name: string,
		shortDescription: string,
		longDescription?: string,
		options: FunctionEntryOptions = {},
	) {
		if (!name) {
			throw new UsageError('EMPTY_NAME', 'A documented function needs a name')
		}
		this.entryName = name
		this.isMember = options.isMember ?? false
		this.mode = resolveMode(options)
		this.description = joinDescription(shortDescription, longDescription, this.mode)
	}

	get name(): string {
		return this.entryName
	}

	get isMemberFunction(): boolean {
		return this.isMember
	}

	get prototypes(): readonly Prototype[] {
		return this.prototypeList
	}

	get parameters(): readonly NamedValueDoc[] {
		return this.parameterList
	}

	get returns(): readonly NamedValueDoc[] {
		return this.returnList
	}

	/**
	 * First line of the description, used in class summaries
	 */
	get summary(): string {
		return split(this.description, '\n')[0] ?? ''
	}

	/**
	 * Add a way to call this function
	 * @param variables Comma-separated parameter names, e.g. "a, b"
	 * @param returnValue Comma-separated return names; keep 'None' for functions without a
	 *   return value and pass '' to document a constructor
	 */
	addPrototype(variables: string, returnValue: string = NO_RETURN): this {
		this.kwlists.push(split(variables, ',').map((variable) => strip(variable)))
		this.prototypeList.push({ variables, returnValue })
		return this
	}

	addParameter(name: string, typeLabel: string, description: string): this {
		this.parameterList.push({ name, typeLabel, description })
		return this
	}

	addReturn(name: string, typeLabel: string, description: string): this {
		this.returnList.push({ name, typeLabel, description })
		return this
	}

	/**
	 * Parameter names of the prototype at `index`, in declaration order
	 * @throws UsageError if no such prototype was added
	 */
	kwlist(index: number): string[] {
		const names = Number.isInteger(index) && index >= 0 ? this.kwlists[index] : undefined
		if (!names) {
			throw new UsageError(
				'PROTOTYPE_OUT_OF_RANGE',
				`The prototype for the given index ${index} is not found (${this.kwlists.length} prototype(s) available)`,
			)
		}
		return [...names]
	}

	/**
	 * Generate the documentation string. The first call fixes the result,
	 * later calls return the cached string regardless of their arguments.
	 * @param width Maximum line width; member functions use 4 columns less
	 * @param indent Column every line starts at
	 */
	render(width = 72, indent = 0): string {
		if (this.rendered === undefined) {
			this.rendered = this.mode === 'short' ? this.description : this.renderFull(width, indent)
		}
		return this.rendered
	}

	/**
	 * Plain list of the ways to call this function, empty for short docstrings
	 */
	usage(): string {
		if (this.mode === 'short') {
			return ''
		}

		let text = '\nUsage (for details, see help):\n'
		if (this.prototypeList.length === 0) {
			text += `${align('Error: The usage of this function is unknown', 0, UNBOUNDED)}\n`
		}
		for (const { variables, returnValue } of this.prototypeList) {
			text += `${align(formatUsage(this.entryName, variables, returnValue), 0, UNBOUNDED)}\n`
		}
		return `${text}\n`
	}

	/**
	 * Write the usage synopsis to a diagnostic stream
	 */
	printUsage(stream: NodeJS.WritableStream = process.stderr): void {
		const text = this.usage()
		if (text) {
			stream.write(text)
		}
	}

	/**
	 * Independent copy with its own prototypes, documentation and name lists.
	 * The render cache is not copied.
	 */
	clone(): FunctionEntry {
		const copy = new FunctionEntry(this.entryName, this.description, undefined, {
			isMember: this.isMember,
			mode: this.mode,
		})
		copy.prototypeList.push(...this.prototypeList.map((prototype) => ({ ...prototype })))
		copy.parameterList.push(...this.parameterList.map((parameter) => ({ ...parameter })))
		copy.returnList.push(...this.returnList.map((returned) => ({ ...returned })))
		copy.kwlists.push(...this.kwlists.map((names) => [...names]))
		return copy
	}

	/**
	 * Copy renamed to `className` and rendered as a top-level function,
	 * since the class indents its constructor documentation itself
	 */
	asConstructorOf(className: string): FunctionEntry {
		const copy = this.clone()
		copy.entryName = className
		copy.isMember = false
		return copy
	}

	private renderFull(width: number, indent: number): string {
		const textWidth = this.isMember ? width - 4 : width
		let doc = ''

		const [first] = this.prototypeList
		if (!first) {
			doc = `${align(
				'.. todo:: Please use ``FunctionEntry.addPrototype`` to add at least one prototypical way to call this function',
				indent,
				UNBOUNDED,
			)}\n`
		} else if (this.prototypeList.length === 1) {
			// only one way to call
			doc = `${align(formatPrototype(this.entryName, first.variables, first.returnValue), indent, UNBOUNDED)}\n`
		} else {
			for (const { variables, returnValue } of this.prototypeList) {
				doc += `${align(`* ${formatPrototype(this.entryName, variables, returnValue)}`, indent, UNBOUNDED)}\n`
			}
		}

		doc += `\n${align(this.description, indent, textWidth)}\n`

		doc += checkConsistency(
			this.prototypeList.map((prototype) => prototype.variables),
			this.parameterList.map((parameter) => parameter.name),
			'parameter',
		)
		doc += checkConsistency(
			this.prototypeList.map((prototype) => prototype.returnValue),
			this.returnList.map((returned) => returned.name),
			'return value',
		)

		if (this.parameterList.length > 0) {
			doc += `\n${align('**Parameters:**', indent, textWidth)}\n\n`
			for (const { name, typeLabel, description } of this.parameterList) {
				doc += formatNamedValue(name, typeLabel, description, indent, textWidth)
			}
		}

		if (this.returnList.length > 0) {
			doc += `\n${align('**Returns:**', indent, textWidth)}\n\n`
			for (const { name, typeLabel, description } of this.returnList) {
				doc += formatNamedValue(name, typeLabel, description, indent, textWidth)
			}
		}

		return doc
	}
}
