import { describe, it, expect, vi, beforeEach } from 'vitest'
import { readFile } from 'fs/promises'
import fs from 'fs-extra'
import { RenderCommand } from './render.js'

vi.mock('fs-extra')
vi.mock('fs/promises')
vi.mock('../utils/logger-context.js', () => ({
	getLogger: () => ({
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}))

const metadata = {
	functions: [
		{
			name: 'add',
			short: 'Adds two numbers',
			long: 'Both operands are integers.',
			prototypes: [{ variables: 'x, y', returns: 'sum' }],
			parameters: [
				{ name: 'x', type: 'int', description: 'first operand' },
				{ name: 'y', type: 'int', description: 'second operand' },
			],
			returns: [{ name: 'sum', type: 'int', description: 'the sum' }],
		},
	],
	variables: [{ name: 'origin', type: 'Point', short: 'The origin' }],
}

describe('RenderCommand', () => {
	let command: RenderCommand

	beforeEach(() => {
		command = new RenderCommand()
		vi.mocked(readFile).mockRejectedValue({ code: 'ENOENT' })
		vi.mocked(fs.readJson).mockResolvedValue(metadata)
	})

	it('renders every entry separated by a blank line', async () => {
		const output = await command.execute({ file: '/docs/api.json', projectRoot: '/project' })

		expect(output).toBe(
			'add(x, y) -> sum \n' +
			'\nAdds two numbers \n \nBoth operands are integers. \n' +
			'\n**Parameters:** \n\n' +
			'``x`` : *int* \n\n    first operand \n\n' +
			'``y`` : *int* \n\n    second operand \n\n' +
			'\n**Returns:** \n\n' +
			'``sum`` : *int* \n\n    the sum \n\n' +
			'\n\n' +
			'*Point*  <-- The origin '
		)
	})

	it('renders short descriptions with --short', async () => {
		const output = await command.execute({ file: '/docs/api.json', projectRoot: '/project', short: true })

		expect(output).toBe('Adds two numbers\n\nThe origin')
	})

	it('renders the selected entries in the given order', async () => {
		const output = await command.execute({
			file: '/docs/api.json',
			projectRoot: '/project',
			short: true,
			name: ['origin', 'add'],
		})

		expect(output).toBe('The origin\n\nAdds two numbers')
	})

	it('uses the width from the settings file', async () => {
		vi.mocked(readFile)
			.mockResolvedValueOnce(JSON.stringify({ width: 12, entries: ['origin'] }))
			.mockRejectedValueOnce({ code: 'ENOENT' })

		const output = await command.execute({ file: '/docs/api.json', projectRoot: '/project' })

		expect(output).toBe('*Point*  \n<-- The \norigin ')
	})

	it('fails for an unknown entry name', async () => {
		await expect(
			command.execute({ file: '/docs/api.json', projectRoot: '/project', name: ['missing'] })
		).rejects.toThrow("No entry named 'missing' in /docs/api.json")
	})
})
