/**
 * Word-wrapping helpers for documentation strings
 *
 * Text is re-flowed into fixed-width lines while keeping hanging indents for
 * bullets (`*`), numbered items (`1.`) and directives (`..`).
 */

/** Width that disables wrapping, used for single-line notices */
export const UNBOUNDED = Number.POSITIVE_INFINITY

const DEFAULT_STRIP_CHARSET = ' []()|'

/**
 * Remove leading and trailing characters contained in `charset`
 */
export function strip(text: string, charset: string = DEFAULT_STRIP_CHARSET): string {
	let first = 0
	let last = text.length
	while (first < text.length && charset.includes(text.charAt(first))) {
		++first
	}
	while (last > first && charset.includes(text.charAt(last - 1))) {
		--last
	}
	return text.slice(first, last)
}

/**
 * Split `text` at every occurrence of `separator`
 *
 * Leading separators are only skipped while looking for the first split point,
 * so they stay attached to the first token. Adjacent separators further in
 * produce empty tokens.
 */
export function split(text: string, separator: string = ' '): string[] {
	let start = 0
	while (start < text.length && text.charAt(start) === separator) {
		++start
	}
	if (start === text.length) {
		return [text]
	}

	const splits: string[] = []
	let from = 0
	let index = text.indexOf(separator, start)
	while (index !== -1) {
		splits.push(text.slice(from, index))
		from = index + 1
		index = text.indexOf(separator, from)
	}
	splits.push(text.slice(from))
	return splits
}

/**
 * Extra indent for continuation lines of a source line:
 * the width of a leading marker plus the offset of the first word
 */
function hangingIndent(line: string, firstWord: string): number {
	let extra = 0
	const marker = strip(firstWord, ' ')
	if (marker === '..' || /^[0-9]/.test(marker) || marker === '*') {
		extra += marker.length + 1
	}
	const offset = line.search(/[^ ]/)
	if (offset > 0) {
		extra += offset
	}
	return extra
}

/**
 * Re-flow `text` so that every line starts at column `indent` and stays below
 * `width` columns. Each source line starts a new output line.
 *
 * A word that does not fit on an empty line is emitted alone and may overflow.
 * Every word is followed by a single space.
 */
export function align(text: string, indent: number, width: number): string {
	let aligned = ''
	let currentIndent = indent
	let continuesLine = true

	for (const line of split(text, '\n')) {
		const words = split(line)
		const newIndent = line.length > 0 ? indent + hangingIndent(line, words[0] ?? '') : indent
		let length = 0

		for (const word of words) {
			if (aligned.length === 0 || length + word.length >= width || !continuesLine) {
				if (aligned.length > 0) {
					aligned += '\n'
				}
				aligned += ' '.repeat(currentIndent)
				length = currentIndent
				continuesLine = true
			}
			currentIndent = newIndent
			aligned += `${word} `
			length += word.length + 1
		}

		currentIndent = indent
		continuesLine = false
	}

	return aligned
}
