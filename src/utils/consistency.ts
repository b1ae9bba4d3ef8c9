import { align, split, strip, UNBOUNDED } from './align.js'

/** Placeholder return value of a prototype that returns nothing */
export const NO_RETURN = 'None'

function todo(message: string): string {
	return `\n${align(`.. todo:: ${message}`, 0, UNBOUNDED)}\n`
}

function joinNames(names: Set<string>, exclude: string[] = []): string {
	return [...names]
		.filter((name) => name.length > 0 && !exclude.includes(name))
		.sort()
		.join(', ')
}

/**
 * Compare the names used in prototypes against the documented names
 *
 * Both lists hold comma-separated names. Returns one `.. todo::` line for names
 * that are used but not documented and one for names that are documented but
 * never used; an empty string when both sides agree.
 */
export function checkConsistency(declared: string[], documented: string[], kind: string): string {
	const undocumented = new Set<string>()
	const unused = new Set<string>()

	for (const names of declared) {
		for (const name of split(names, ',')) {
			undocumented.add(strip(name))
		}
	}

	for (const names of documented) {
		for (const name of split(names, ',')) {
			const stripped = strip(name)
			if (undocumented.has(stripped)) {
				undocumented.delete(stripped)
			} else {
				unused.add(stripped)
			}
		}
	}

	let warnings = ''
	const missing = joinNames(undocumented, [NO_RETURN])
	if (missing) {
		warnings += todo(`The ${kind}(s) '${missing}' are used, but not documented.`)
	}
	if (unused.size > 0) {
		warnings += todo(`The ${kind}(s) '${joinNames(unused)}' are documented, but nowhere used.`)
	}
	return warnings
}
