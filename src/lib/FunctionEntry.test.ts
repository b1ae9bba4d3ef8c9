import { describe, it, expect } from 'vitest'
import { PassThrough } from 'node:stream'
import { FunctionEntry } from './FunctionEntry.js'
import { UsageError } from '../types/documentation.js'

function createAddEntry(): FunctionEntry {
	return new FunctionEntry('add', 'Adds two numbers')
		.addPrototype('x, y', 'sum')
		.addParameter('x', 'int', 'first operand')
		.addParameter('y', 'int', 'second operand')
		.addReturn('sum', 'int', 'the sum')
}

describe('FunctionEntry', () => {
	describe('render', () => {
		it('renders prototype, description, parameters and returns', () => {
			expect(createAddEntry().render()).toBe(
				'add(x, y) -> sum \n' +
				'\nAdds two numbers \n' +
				'\n**Parameters:** \n\n' +
				'``x`` : *int* \n\n    first operand \n\n' +
				'``y`` : *int* \n\n    second operand \n\n' +
				'\n**Returns:** \n\n' +
				'``sum`` : *int* \n\n    the sum \n\n'
			)
		})

		it('omits the return arrow when nothing is returned', () => {
			const entry = new FunctionEntry('reset', 'Resets the state')
				.addPrototype('force')
				.addParameter('force', 'bool', 'reset even if busy')

			expect(entry.render().split('\n')[0]).toBe('reset(force) ')
		})

		it('renders a constructor prototype in bold without arrow', () => {
			const entry = new FunctionEntry('Point', 'Creates a point').addPrototype('', '')

			expect(entry.render()).toBe('**Point** () \n\nCreates a point \n')
		})

		it('lists several prototypes as bullets in insertion order', () => {
			const entry = new FunctionEntry('load', 'Loads data')
				.addPrototype('path')
				.addPrototype('path, mode', 'data')
				.addParameter('path', 'str', 'file to load')
				.addParameter('mode', 'str', 'open mode')
				.addReturn('data', 'bytes', 'the content')

			const bullets = entry.render().split('\n').filter(line => line.startsWith('* '))
			expect(bullets).toEqual(['* load(path) ', '* load(path, mode) -> data '])
		})

		it('asks for a prototype when none was added', () => {
			const entry = new FunctionEntry('noop', 'Does nothing')

			expect(entry.render()).toBe(
				'.. todo:: Please use ``FunctionEntry.addPrototype`` to add at least one prototypical way to call this function \n' +
				'\nDoes nothing \n'
			)
		})

		it('adds todo notices for undocumented and unused names', () => {
			const entry = new FunctionEntry('scale', 'Scales a value')
				.addPrototype('value, factor', 'result')
				.addParameter('value', 'float', 'the value')
				.addParameter('offset', 'float', 'not part of any prototype')

			const doc = entry.render()
			expect(doc).toContain("\n.. todo:: The parameter(s) 'factor' are used, but not documented. \n")
			expect(doc).toContain("\n.. todo:: The parameter(s) 'offset' are documented, but nowhere used. \n")
			expect(doc).toContain("\n.. todo:: The return value(s) 'result' are used, but not documented. \n")
		})

		it('contains no todo notice when everything is documented', () => {
			expect(createAddEntry().render()).not.toContain('.. todo::')
		})

		it('writes cross-reference types without emphasis', () => {
			const entry = new FunctionEntry('move', 'Moves a point')
				.addPrototype('p')
				.addParameter('p', ':py:class:`Point`', 'the point')

			expect(entry.render()).toContain('``p`` : :py:class:`Point` \n')
		})

		it('indents every line by the given indent', () => {
			const entry = new FunctionEntry('g', 'Desc')
				.addPrototype('v')
				.addParameter('v', 'str', 'value')

			expect(entry.render(72, 4)).toBe(
				'    g(v) \n' +
				'\n    Desc \n' +
				'\n    **Parameters:** \n\n' +
				'    ``v`` : *str* \n\n        value \n\n'
			)
		})

		it('wraps member functions 4 columns narrower', () => {
			const description = 'aaaa bbbb cccc dddd'
			const member = new FunctionEntry('f', description, undefined, { isMember: true }).addPrototype('')
			const free = new FunctionEntry('f', description).addPrototype('')

			expect(member.render(20)).toBe('f() \n\naaaa bbbb cccc \ndddd \n')
			expect(free.render(20)).toBe('f() \n\naaaa bbbb cccc dddd \n')
		})

		it('joins short and long description with a blank line', () => {
			const entry = new FunctionEntry('f', 'Short', 'Long').addPrototype('')

			expect(entry.description).toBe('Short\n\nLong')
			expect(entry.render()).toBe('f() \n\nShort \n \nLong \n')
		})

		it('returns the cached result on later calls', () => {
			const entry = createAddEntry()
			const first = entry.render()

			expect(entry.render(10, 8)).toBe(first)
		})
	})

	describe('kwlist', () => {
		it('returns the trimmed names of a prototype', () => {
			const entry = new FunctionEntry('f', 'F').addPrototype(' a ,b,  c ').addPrototype('d')

			expect(entry.kwlist(0)).toEqual(['a', 'b', 'c'])
			expect(entry.kwlist(1)).toEqual(['d'])
		})

		it('throws a UsageError for an index without prototype', () => {
			const entry = new FunctionEntry('f', 'F').addPrototype('a')

			expect(() => entry.kwlist(1)).toThrow(UsageError)
			expect(() => entry.kwlist(-1)).toThrow(UsageError)
			expect(() => entry.kwlist(1)).toThrow('The prototype for the given index 1 is not found')
		})

		it('returns a copy that does not change the entry', () => {
			const entry = new FunctionEntry('f', 'F').addPrototype('a, b')
			entry.kwlist(0).push('c')

			expect(entry.kwlist(0)).toEqual(['a', 'b'])
		})
	})

	describe('usage', () => {
		it('lists one line per prototype', () => {
			const entry = new FunctionEntry('f', 'F').addPrototype('a').addPrototype('a, b', 'c').addPrototype('', '')

			expect(entry.usage()).toBe('\nUsage (for details, see help):\nf(a) \nf(a, b) -> c \nf() \n\n')
		})

		it('reports an unknown usage without prototypes', () => {
			expect(new FunctionEntry('f', 'F').usage()).toBe(
				'\nUsage (for details, see help):\nError: The usage of this function is unknown \n\n'
			)
		})

		it('writes the synopsis to the given stream', () => {
			const stream = new PassThrough()
			createAddEntry().printUsage(stream)

			expect(String(stream.read())).toBe('\nUsage (for details, see help):\nadd(x, y) -> sum \n\n')
		})
	})

	describe('clone', () => {
		it('copies prototypes and name lists independently', () => {
			const entry = createAddEntry()
			const copy = entry.clone().addPrototype('z')

			expect(copy.kwlist(0)).toEqual(['x', 'y'])
			expect(copy.kwlist(1)).toEqual(['z'])
			expect(() => entry.kwlist(1)).toThrow(UsageError)
			expect(entry.prototypes).toHaveLength(1)
		})

		it('renames a constructor copy and renders it as a free function', () => {
			const init = new FunctionEntry('__init__', 'Creates', undefined, { isMember: true }).addPrototype('a', '')
			const ctor = init.asConstructorOf('Widget')

			expect(ctor.name).toBe('Widget')
			expect(ctor.isMemberFunction).toBe(false)
			expect(init.name).toBe('__init__')
			expect(init.isMemberFunction).toBe(true)
		})
	})

	describe('short mode', () => {
		it('renders only the short description', () => {
			const entry = new FunctionEntry('add', 'Adds two numbers', 'With a long explanation', { mode: 'short' })
				.addPrototype('x, y', 'sum')
				.addParameter('x', 'int', 'first operand')

			expect(entry.render()).toBe('Adds two numbers')
			expect(entry.usage()).toBe('')
		})

		it('still provides the parameter names', () => {
			const entry = new FunctionEntry('add', 'Adds', undefined, { mode: 'short' }).addPrototype('x, y')

			expect(entry.kwlist(0)).toEqual(['x', 'y'])
		})

		it('is used by default when DOCFMT_SHORT_DOCSTRINGS is set', () => {
			process.env.DOCFMT_SHORT_DOCSTRINGS = 'true'
			const entry = new FunctionEntry('add', 'Adds two numbers', 'Long').addPrototype('x, y')

			expect(entry.mode).toBe('short')
			expect(entry.render()).toBe('Adds two numbers')
		})
	})

	it('rejects an empty name', () => {
		expect(() => new FunctionEntry('', 'Nameless')).toThrow(UsageError)
	})
})
