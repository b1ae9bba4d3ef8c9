import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface LoggerOptions {
	forceColor?: boolean | undefined
	debug?: boolean
}

export interface Logger {
	error: (message: string, ...args: unknown[]) => void
	debug: (message: string, ...args: unknown[]) => void
	setDebug: (enabled: boolean) => void
}

type Sink = (line: string) => void

// Stream-specific chalk instances
const stdoutChalk = new Chalk({ level: chalk.level })
const stderrChalk = new Chalk({ level: chalk.level })

function formatMessage(message: string, ...args: unknown[]): string {
	const formattedArgs = args.map(arg =>
		typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
	)
	return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

function formatWithSymbol(message: string, symbol: string, colorFn: (str: string) => string): string {
	if (message.trim()) {
		return colorFn(`${symbol} ${message}`)
	} else {
		return ''
	}
}

let globalDebugEnabled = false

/* eslint-disable no-console */
const toStdout: Sink = line => console.log(line)
const toStderr: Sink = line => console.error(line)
/* eslint-enable no-console */

// Main logger: debug lines on stdout, errors on stderr; its debug flag is the process-wide default
export const logger: Logger = {
	error: (message: string, ...args: unknown[]): void => {
		toStderr(formatWithSymbol(formatMessage(message, ...args), '✖', stderrChalk.red))
	},
	debug: (message: string, ...args: unknown[]): void => {
		if (globalDebugEnabled) {
			toStdout(formatWithSymbol(formatMessage(message, ...args), '…', stdoutChalk.gray))
		}
	},
	setDebug: (enabled: boolean): void => {
		globalDebugEnabled = enabled
	},
}

/**
 * Creates a logger that writes everything to stderr.
 * Used when stdout carries rendered documentation that may be piped.
 */
export function createStderrLogger(options: LoggerOptions = {}): Logger {
	const colors: ChalkInstance =
		options.forceColor !== undefined ? new Chalk({ level: options.forceColor ? 3 : 0 }) : stderrChalk
	let debugEnabled = options.debug ?? globalDebugEnabled

	return {
		error: (message: string, ...args: unknown[]): void => {
			toStderr(formatWithSymbol(formatMessage(message, ...args), '✖', colors.red))
		},
		debug: (message: string, ...args: unknown[]): void => {
			if (debugEnabled) {
				toStderr(formatWithSymbol(formatMessage(message, ...args), '…', colors.gray))
			}
		},
		setDebug: (enabled: boolean): void => {
			debugEnabled = enabled
		},
	}
}
