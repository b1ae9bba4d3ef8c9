import { readFile } from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import deepmerge from 'deepmerge'
import { getLogger } from '../utils/logger-context.js'
import { getDefaultMode } from './DocumentationMode.js'

export const SETTINGS_FILE = 'docfmt.config.json'
export const LOCAL_SETTINGS_FILE = 'docfmt.config.local.json'

/**
 * Zod schema for rendering settings
 */
export const DocSettingsSchema = z.object({
	width: z
		.number()
		.int('Width must be a whole number of columns')
		.min(8, 'Width must be at least 8 columns')
		.default(72)
		.describe('Maximum line width of rendered documentation'),
	mode: z
		.enum(['full', 'short'])
		.optional()
		.describe('Render full documentation or short descriptions only. Defaults to DOCFMT_SHORT_DOCSTRINGS'),
	entries: z
		.array(z.string().min(1, 'Entry name cannot be empty'))
		.optional()
		.describe('Only render the entries with these names'),
})

/**
 * Same fields without defaults, for validating partial files before they are merged
 */
export const DocSettingsSchemaNoDefaults = DocSettingsSchema.extend({
	width: z.number().int('Width must be a whole number of columns').min(8, 'Width must be at least 8 columns').optional(),
})

export type DocSettingsInput = z.infer<typeof DocSettingsSchemaNoDefaults>

export interface DocSettings {
	width: number
	mode: 'full' | 'short'
	entries?: string[] | undefined
}

/**
 * Loads docfmt.config.json and docfmt.config.local.json from a project root
 */
export class SettingsManager {
	/**
	 * Load settings with priority: cliOverrides > local file > base file > defaults.
	 * Missing files are not an error.
	 */
	async loadSettings(projectRoot?: string, cliOverrides?: DocSettingsInput): Promise<DocSettings> {
		const logger = getLogger()
		const root = projectRoot ?? process.cwd()

		const baseSettings = await this.loadSettingsFile(root, SETTINGS_FILE)
		const localSettings = await this.loadSettingsFile(root, LOCAL_SETTINGS_FILE)

		let merged = this.mergeSettings(baseSettings, localSettings)
		if (cliOverrides && Object.keys(cliOverrides).length > 0) {
			logger.debug('CLI overrides to apply:', cliOverrides)
			merged = this.mergeSettings(merged, cliOverrides)
		}

		try {
			const parsed = DocSettingsSchema.parse(merged)
			const settings: DocSettings = {
				width: parsed.width,
				mode: parsed.mode ?? getDefaultMode(),
				entries: parsed.entries,
			}
			logger.debug('Final settings:', settings)
			return settings
		} catch (error) {
			if (error instanceof z.ZodError) {
				throw this.formatAllZodErrors(error, '<merged settings>')
			}
			throw error
		}
	}

	private async loadSettingsFile(projectRoot: string, filename: string): Promise<DocSettingsInput> {
		const settingsPath = path.join(projectRoot, filename)

		let content: string
		try {
			content = await readFile(settingsPath, 'utf-8')
		} catch (error) {
			if ((error as { code?: string }).code === 'ENOENT') {
				getLogger().debug(`No settings file found at ${settingsPath}, using defaults`)
				return {}
			}
			throw error
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(content)
		} catch (error) {
			throw new Error(
				`Failed to parse settings file at ${settingsPath}: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
			)
		}

		try {
			return DocSettingsSchemaNoDefaults.strict().parse(parsed)
		} catch (error) {
			if (error instanceof z.ZodError) {
				throw this.formatAllZodErrors(error, filename)
			}
			throw error
		}
	}

	/**
	 * Deep merge with arrays replaced instead of concatenated
	 */
	private mergeSettings(base: DocSettingsInput, override: DocSettingsInput): DocSettingsInput {
		return deepmerge<DocSettingsInput>(base, override, {
			arrayMerge: (_destinationArray, sourceArray) => sourceArray,
		})
	}

	private formatAllZodErrors(error: z.ZodError, settingsPath: string): Error {
		const errorMessages = error.issues.map(issue => {
			const issuePath = issue.path.length > 0 ? issue.path.join('.') : 'root'
			return `  - ${issuePath}: ${issue.message}`
		})

		return new Error(`Settings validation failed at ${settingsPath}:\n${errorMessages.join('\n')}`)
	}
}
