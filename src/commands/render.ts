import { getLogger } from '../utils/logger-context.js'
import { SettingsManager, type DocSettingsInput } from '../lib/SettingsManager.js'
import { MetadataLoader } from '../lib/MetadataLoader.js'
import { UsageError } from '../types/documentation.js'

export interface RenderOptions {
	file: string
	width?: number
	short?: boolean
	name?: string[]
	projectRoot?: string
}

/**
 * RenderCommand: render the documentation entries described in a metadata file
 *
 * Width, mode and the entry filter come from docfmt.config.json, overridden by
 * the command line options. Entries are separated by a blank line.
 */
export class RenderCommand {
	private readonly settingsManager: SettingsManager

	constructor(settingsManager?: SettingsManager) {
		this.settingsManager = settingsManager ?? new SettingsManager()
	}

	async execute(options: RenderOptions): Promise<string> {
		const logger = getLogger()
		const overrides: DocSettingsInput = {}
		if (options.width !== undefined) overrides.width = options.width
		if (options.short) overrides.mode = 'short'
		if (options.name && options.name.length > 0) overrides.entries = options.name

		const settings = await this.settingsManager.loadSettings(options.projectRoot, overrides)
		const entries = await new MetadataLoader(settings.mode).loadFile(options.file)

		const selected = settings.entries
			? settings.entries.map(name => {
				const found = entries.find(documented => documented.entry.name === name)
				if (!found) {
					throw new UsageError('INVALID_METADATA', `No entry named '${name}' in ${options.file}`)
				}
				return found
			})
			: entries

		logger.debug(`Rendering ${selected.length} entr${selected.length === 1 ? 'y' : 'ies'} at width ${settings.width} (${settings.mode})`)
		return selected.map(documented => documented.entry.render(settings.width)).join('\n\n')
	}
}
