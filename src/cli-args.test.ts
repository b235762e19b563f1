import { describe, test, expect } from 'vitest'
import { ConfigError } from './errors'
import { parseCommand, parseTradeArgs } from './cli-args'

describe('parseCommand', () => {
	test('no arguments opens the interactive menu', () => {
		expect(parseCommand([])).toEqual({ kind: 'interactive' })
	})

	test('recognises help aliases', () => {
		expect(parseCommand(['--help'])).toEqual({ kind: 'help' })
		expect(parseCommand(['-h'])).toEqual({ kind: 'help' })
	})

	test('update takes an optional URL', () => {
		expect(parseCommand(['update'])).toEqual({ kind: 'update', url: undefined })
		expect(parseCommand(['update', '--url', 'https://example.com/dump'])).toEqual({
			kind: 'update',
			url: 'https://example.com/dump',
		})
	})

	test('import requires exactly one directory', () => {
		expect(parseCommand(['import', './dump'])).toEqual({ kind: 'import', dir: './dump' })
		expect(() => parseCommand(['import'])).toThrow('import expects exactly one directory')
	})

	test('rejects unknown commands', () => {
		expect(() => parseCommand(['fly'])).toThrow(ConfigError)
	})
})

describe('parseTradeArgs', () => {
	test('maps --from and --to onto each side', () => {
		const query = parseTradeArgs(['--from', 'Alpha', '--to', 'Beta'])

		expect(query.sources.systemName).toBe('Alpha')
		expect(query.destinations.systemName).toBe('Beta')
	})

	test('applies shared filters to both sides', () => {
		const query = parseTradeArgs(['--near', 'Alpha', '--radius', '12.5', '--no-permit', '--max-star-distance', '2000'])

		for (const side of [query.sources, query.destinations]) {
			expect(side).toEqual({
				near: 'Alpha',
				radius: 12.5,
				allowPermit: false,
				maxDistanceToStar: 2000,
				systemName: undefined,
			})
		}
	})

	test('collects scan overrides', () => {
		const { overrides } = parseTradeArgs(['--top', '5', '--workers', '3', '--threshold', '1000', '--paired', '--emit-no-trade'])

		expect(overrides).toEqual({
			topK: 5,
			workerCount: 3,
			autoParallelThreshold: 1000,
			taskTimeoutMs: undefined,
			partitioning: 'paired',
			emitNoTrade: true,
		})
	})

	test('rejects non-integer counts', () => {
		expect(() => parseTradeArgs(['--top', 'ten'])).toThrow('--top expects an integer, got "ten"')
		expect(() => parseTradeArgs(['--workers', '2.5'])).toThrow(ConfigError)
	})

	test('requires --near with --radius', () => {
		expect(() => parseTradeArgs(['--radius', '10'])).toThrow('--radius requires --near')
	})
})
