import { describe, test, expect } from 'vitest'
import { formatAge, formatCredits, formatDistance, formatEta, renderTable } from './table'

describe('renderTable', () => {
	test('draws borders, header and padded cells', () => {
		const output = renderTable(
			{
				columns: [
					{ header: 'Name', width: 6 },
					{ header: 'Qty', width: 5, align: 'right' },
				],
			},
			[['Tea', '12']],
		)

		expect(output.split('\n')).toEqual([
			'┌──────┬─────┐',
			'│Name  │  Qty│',
			'├──────┼─────┤',
			'│Tea   │   12│',
			'└──────┴─────┘',
		])
	})

	test('renders without a frame', () => {
		const output = renderTable(
			{
				columns: [
					{ header: 'Name', width: 4 },
					{ header: 'Qty', width: 3, align: 'right' },
				],
				borderStyle: 'none',
			},
			[['Tea', '7']],
		)

		expect(output.split('\n')).toEqual([' Name Qty ', '        ', ' Tea    7 '])
	})

	test('truncates long cells with an ellipsis', () => {
		const output = renderTable({ columns: [{ header: 'Name', width: 5 }], borderStyle: 'none' }, [['Palladium']])

		expect(output.split('\n')[2]).toBe(' Pall… ')
	})

	test('centers cells', () => {
		const output = renderTable({ columns: [{ header: 'ab', width: 6, align: 'center' }], borderStyle: 'none' }, [])

		expect(output.split('\n')[0]).toBe('   ab   ')
	})
})

describe('formatCredits', () => {
	const cases: [number, string][] = [
		[950, '950'],
		[9999, '9999'],
		[12_345, '12.3K'],
		[2_500_000, '2.5M'],
		[-15_000, '-15.0K'],
		[0, '0'],
	]

	test.each(cases)('formats %d as %s', (amount, expected) => {
		expect(formatCredits(amount)).toBe(expected)
	})
})

describe('formatDistance', () => {
	test('uses two decimals', () => {
		expect(formatDistance(7.071)).toBe('7.07 ly')
	})
})

describe('formatAge', () => {
	const cases: [number | null, string][] = [
		[null, 'never'],
		[0, '0m'],
		[59, '59m'],
		[60, '1h'],
		[135, '2h15m'],
		[47 * 60 + 59, '47h59m'],
		[48 * 60, '2d'],
		[10 * 24 * 60, '10d'],
	]

	test.each(cases)('formats %s minutes as %s', (minutes, expected) => {
		expect(formatAge(minutes)).toBe(expected)
	})
})

describe('formatEta', () => {
	test('formats milliseconds as m:ss', () => {
		expect(formatEta(0)).toBe('0:00')
		expect(formatEta(65_400)).toBe('1:05')
		expect(formatEta(754_000)).toBe('12:34')
	})

	test('shows a placeholder when unknown', () => {
		expect(formatEta(undefined)).toBe('--:--')
	})
})
