import { MetadataLoader, findEntry } from '../lib/MetadataLoader.js'
import { UsageError } from '../types/documentation.js'

/**
 * KwlistCommand: parameter names of one prototype of a function or class constructor
 */
export class KwlistCommand {
	async execute(options: { file: string; name: string; index?: number }): Promise<string[]> {
		const entries = await new MetadataLoader().loadFile(options.file)
		const documented = findEntry(entries, options.name)
		if (!documented || documented.kind === 'variable') {
			throw new UsageError('INVALID_METADATA', `No function or class named '${options.name}' in ${options.file}`)
		}
		return documented.entry.kwlist(options.index ?? 0)
	}
}
