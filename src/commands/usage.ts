import { MetadataLoader, findEntry } from '../lib/MetadataLoader.js'
import { UsageError } from '../types/documentation.js'

/**
 * UsageCommand: usage synopsis of a function, or of a class constructor
 */
export class UsageCommand {
	async execute(options: { file: string; name: string }): Promise<string> {
		const entries = await new MetadataLoader('full').loadFile(options.file)
		const documented = findEntry(entries, options.name)
		if (!documented || documented.kind === 'variable') {
			throw new UsageError('INVALID_METADATA', `No function or class named '${options.name}' in ${options.file}`)
		}
		return documented.entry.usage()
	}
}
