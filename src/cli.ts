#!/usr/bin/env node
import { program, InvalidArgumentError } from 'commander'
import { fileURLToPath } from 'url'
import { realpathSync } from 'fs'
import fs from 'fs-extra'
import { z } from 'zod'
import { logger, createStderrLogger } from './utils/logger.js'
import { withLogger } from './utils/logger-context.js'
import { RenderCommand } from './commands/render.js'
import { UsageCommand } from './commands/usage.js'
import { KwlistCommand } from './commands/kwlist.js'

const PackageInfoSchema = z.object({
	name: z.string(),
	version: z.string(),
	description: z.string().default(''),
})

const packageJson = PackageInfoSchema.parse(fs.readJsonSync(fileURLToPath(new URL('../package.json', import.meta.url))))

function parseInteger(value: string): number {
	const parsed = parseInt(value, 10)
	if (isNaN(parsed) || String(parsed) !== value) {
		throw new InvalidArgumentError('Not a whole number.')
	}
	return parsed
}

function collect(value: string, previous: string[] = []): string[] {
	return [...previous, value]
}

// Progress and errors go to stderr so rendered documentation can be piped
const stderrLogger = createStderrLogger()

program
	.name('docfmt')
	.description(packageJson.description)
	.version(packageJson.version)
	.option('--debug', 'Enable debug output (default: based on DOCFMT_DEBUG env var)')
	.hook('preAction', (thisCommand) => {
		const options = thisCommand.opts<{ debug?: boolean }>()
		const debugEnabled = options.debug ?? process.env.DOCFMT_DEBUG === 'true'
		logger.setDebug(debugEnabled)
		stderrLogger.setDebug(debugEnabled)
	})

program
	.command('render')
	.description('Render the documentation entries of a metadata file')
	.argument('<file>', 'JSON file describing functions, variables and classes')
	.option('-w, --width <columns>', 'Maximum line width', parseInteger)
	.option('--short', 'Only output the short descriptions')
	.option('-n, --name <entry>', 'Only render this entry (repeatable)', collect)
	.action(async (file: string, options: { width?: number; short?: boolean; name?: string[] }) => {
		try {
			const output = await withLogger(stderrLogger, () => new RenderCommand().execute({ file, ...options }))
			process.stdout.write(`${output}\n`)
		} catch (error) {
			logger.error(`Failed to render documentation: ${error instanceof Error ? error.message : 'Unknown error'}`)
			process.exit(1)
		}
	})

program
	.command('usage')
	.description('Print how a function or class constructor can be called')
	.argument('<file>', 'JSON file describing functions, variables and classes')
	.argument('<name>', 'Function or class name')
	.action(async (file: string, name: string) => {
		try {
			const usage = await withLogger(stderrLogger, () => new UsageCommand().execute({ file, name }))
			process.stderr.write(usage)
		} catch (error) {
			logger.error(`Failed to print usage: ${error instanceof Error ? error.message : 'Unknown error'}`)
			process.exit(1)
		}
	})

program
	.command('kwlist')
	.description('List the parameter names of one prototype')
	.argument('<file>', 'JSON file describing functions, variables and classes')
	.argument('<name>', 'Function or class name')
	.argument('[index]', 'Prototype index', parseInteger, 0)
	.option('--json', 'Output as JSON')
	.action(async (file: string, name: string, index: number, options: { json?: boolean }) => {
		try {
			const names = await withLogger(stderrLogger, () => new KwlistCommand().execute({ file, name, index }))
			process.stdout.write(options.json ? `${JSON.stringify(names)}\n` : `${names.join('\n')}\n`)
		} catch (error) {
			logger.error(`Failed to list parameters: ${error instanceof Error ? error.message : 'Unknown error'}`)
			process.exit(1)
		}
	})

// Parse CLI arguments only when run directly, not when imported for testing
const isRunDirectly = process.argv[1] && ((): boolean => {
	try {
		const scriptPath = realpathSync(process.argv[1] ?? '')
		const modulePath = fileURLToPath(import.meta.url)
		return scriptPath === modulePath
	} catch {
		// If we can't resolve the path, assume we should run
		return true
	}
})()

if (isRunDirectly) {
	try {
		await program.parseAsync()
	} catch (error) {
		logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
		process.exit(1)
	}
}

export { program }
