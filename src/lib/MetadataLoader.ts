import fs from 'fs-extra'
import { z } from 'zod'
import { getLogger } from '../utils/logger-context.js'
import { ClassEntry } from './ClassEntry.js'
import { FunctionEntry } from './FunctionEntry.js'
import { VariableEntry } from './VariableEntry.js'
import { UsageError, type DocumentationMode } from '../types/documentation.js'

const NamedValueSchema = z.object({
	name: z.string().min(1, 'Name cannot be empty'),
	type: z.string(),
	description: z.string(),
})

const PrototypeSchema = z.object({
	variables: z.string(),
	returns: z.string().optional().describe("Comma-separated return names; '' for constructors, omitted for 'None'"),
})

export const FunctionMetadataSchema = z.object({
	name: z.string().min(1, 'Function name cannot be empty'),
	short: z.string(),
	long: z.string().optional(),
	member: z.boolean().optional(),
	prototypes: z.array(PrototypeSchema).default([]),
	parameters: z.array(NamedValueSchema).default([]),
	returns: z.array(NamedValueSchema).default([]),
})

export const VariableMetadataSchema = z.object({
	name: z.string().min(1, 'Variable name cannot be empty'),
	type: z.string(),
	short: z.string(),
	long: z.string().optional(),
})

export const ClassMetadataSchema = z.object({
	name: z.string().min(1, 'Class name cannot be empty'),
	short: z.string(),
	long: z.string().optional(),
	constructorDoc: FunctionMetadataSchema.optional(),
	highlights: z.array(z.string()).default([]),
})

export const DocumentationMetadataSchema = z.object({
	functions: z.array(FunctionMetadataSchema).default([]),
	variables: z.array(VariableMetadataSchema).default([]),
	classes: z.array(ClassMetadataSchema).default([]),
})

export type FunctionMetadata = z.infer<typeof FunctionMetadataSchema>
export type VariableMetadata = z.infer<typeof VariableMetadataSchema>
export type ClassMetadata = z.infer<typeof ClassMetadataSchema>
export type DocumentationMetadata = z.infer<typeof DocumentationMetadataSchema>

export type DocumentedEntry =
	| { kind: 'function'; entry: FunctionEntry }
	| { kind: 'variable'; entry: VariableEntry }
	| { kind: 'class'; entry: ClassEntry }

/**
 * Builds documentation entries from a JSON description of functions,
 * variables and classes
 */
export class MetadataLoader {
	constructor(private readonly mode?: DocumentationMode) {}

	async loadFile(filePath: string): Promise<DocumentedEntry[]> {
		let content: unknown
		try {
			content = await fs.readJson(filePath)
		} catch (error) {
			if ((error as { code?: string }).code === 'ENOENT') {
				throw new UsageError('INVALID_METADATA', `Metadata file not found: ${filePath}`)
			}
			const message = error instanceof Error ? error.message : 'Unknown error'
			throw new UsageError('INVALID_METADATA', `Invalid metadata file ${filePath}: ${message}`)
		}
		getLogger().debug(`Loaded documentation metadata from ${filePath}`)
		return this.build(content)
	}

	/**
	 * Validate `content` and create entries in file order: functions, variables, classes
	 */
	build(content: unknown): DocumentedEntry[] {
		const result = DocumentationMetadataSchema.safeParse(content)
		if (!result.success) {
			const issues = result.error.issues.map(issue => {
				const issuePath = issue.path.length > 0 ? issue.path.join('.') : 'root'
				return `  - ${issuePath}: ${issue.message}`
			})
			throw new UsageError('INVALID_METADATA', `Metadata validation failed:\n${issues.join('\n')}`)
		}

		const metadata = result.data
		const functions = metadata.functions.map(fn => this.buildFunction(fn))
		const variables = metadata.variables.map(variable =>
			new VariableEntry(variable.name, variable.type, variable.short, variable.long, { mode: this.mode })
		)
		const classes = metadata.classes.map(cls => this.buildClass(cls, functions, variables))

		getLogger().debug(
			`Built ${functions.length} function(s), ${variables.length} variable(s) and ${classes.length} class(es)`
		)

		return [
			...functions.map((entry): DocumentedEntry => ({ kind: 'function', entry })),
			...variables.map((entry): DocumentedEntry => ({ kind: 'variable', entry })),
			...classes.map((entry): DocumentedEntry => ({ kind: 'class', entry })),
		]
	}

	private buildFunction(metadata: FunctionMetadata): FunctionEntry {
		const entry = new FunctionEntry(metadata.name, metadata.short, metadata.long, {
			isMember: metadata.member ?? false,
			mode: this.mode,
		})
		for (const prototype of metadata.prototypes) {
			entry.addPrototype(prototype.variables, prototype.returns)
		}
		for (const parameter of metadata.parameters) {
			entry.addParameter(parameter.name, parameter.type, parameter.description)
		}
		for (const returned of metadata.returns) {
			entry.addReturn(returned.name, returned.type, returned.description)
		}
		return entry
	}

	private buildClass(metadata: ClassMetadata, functions: FunctionEntry[], variables: VariableEntry[]): ClassEntry {
		const entry = new ClassEntry(metadata.name, metadata.short, metadata.long, { mode: this.mode })
		if (metadata.constructorDoc) {
			entry.addConstructor(this.buildFunction(metadata.constructorDoc))
		}
		for (const name of metadata.highlights) {
			const member = functions.find(fn => fn.name === name) ?? variables.find(variable => variable.name === name)
			if (!member) {
				throw new UsageError(
					'INVALID_METADATA',
					`Class '${metadata.name}' highlights '${name}', which is neither a documented function nor variable`,
				)
			}
			entry.highlight(member)
		}
		return entry
	}
}

/**
 * Find an entry by name
 */
export function findEntry(entries: DocumentedEntry[], name: string): DocumentedEntry | undefined {
	return entries.find(documented => documented.entry.name === name)
}
