/**
 * Small markup fragments shared by the documentation entries
 */
import { align } from './align.js'
import { NO_RETURN } from './consistency.js'

/**
 * A type label that already is a cross-reference such as :py:class:`Foo`
 * is written as-is, any other label is emphasized
 */
export function formatTypeLabel(typeLabel: string): string {
	if (typeLabel.includes(':') && typeLabel.includes('`')) {
		return typeLabel
	}
	return `*${typeLabel}*`
}

/**
 * Summary line of one prototype in the rendered documentation
 */
export function formatPrototype(name: string, variables: string, returnValue: string): string {
	if (returnValue === '') {
		return `**${name}** (${variables})`
	}
	if (returnValue === NO_RETURN) {
		return `${name}(${variables})`
	}
	return `${name}(${variables}) -> ${returnValue}`
}

/**
 * Plain call synopsis without markup
 */
export function formatUsage(name: string, variables: string, returnValue: string): string {
	if (returnValue === '' || returnValue === NO_RETURN) {
		return `${name}(${variables})`
	}
	return `${name}(${variables}) -> ${returnValue}`
}

/**
 * ``name`` : *type* line followed by the description indented one level deeper
 */
export function formatNamedValue(
	name: string,
	typeLabel: string,
	description: string,
	indent: number,
	width: number,
): string {
	const header = align(`\`\`${name}\`\` : ${formatTypeLabel(typeLabel)}`, indent, width)
	return `${header}\n\n${align(description, indent + 4, width)}\n\n`
}
