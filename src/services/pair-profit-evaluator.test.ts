import { describe, test, expect } from 'vitest'
import type { Station, StationPrice } from '../types'
import { bestTrade } from './pair-profit-evaluator'

// listings: [commodityId, buyPrice, sellPrice], in price map order
function station(id: number, listings: [number, number, number][]): Station {
	const prices = new Map<number, StationPrice>()
	for (const [commodityId, buyPrice, sellPrice] of listings) {
		prices.set(commodityId, { buyPrice, sellPrice })
	}
	return { id, name: `Station ${id}`, systemId: 1, distanceToStar: null, prices }
}

describe('bestTrade', () => {
	test('picks the commodity with the largest margin', () => {
		const source = station(1, [
			[1, 100, 0],
			[2, 50, 0],
		])
		const destination = station(2, [
			[1, 0, 130],
			[2, 0, 120],
		])

		expect(bestTrade(source, destination)).toEqual({ commodityId: 2, profit: 70 })
	})

	test('ignores commodities the source does not sell', () => {
		const source = station(1, [
			[1, 0, 10],
			[2, 40, 0],
		])
		const destination = station(2, [
			[1, 0, 500],
			[2, 0, 60],
		])

		expect(bestTrade(source, destination)).toEqual({ commodityId: 2, profit: 20 })
	})

	test('ignores commodities the destination does not buy', () => {
		const source = station(1, [
			[1, 10, 0],
			[2, 10, 0],
		])
		const destination = station(2, [[1, 5, 0]])

		expect(bestTrade(source, destination)).toEqual({ commodityId: null, profit: 0 })
	})

	test('returns no trade when no margin is positive', () => {
		const source = station(1, [
			[1, 50, 0],
			[2, 30, 0],
		])
		const destination = station(2, [
			[1, 0, 50],
			[2, 0, 20],
		])

		expect(bestTrade(source, destination)).toEqual({ commodityId: null, profit: 0 })
	})

	test('keeps the first commodity reaching the best margin', () => {
		const source = station(1, [
			[7, 10, 0],
			[3, 20, 0],
		])
		const destination = station(2, [
			[3, 0, 50],
			[7, 0, 40],
		])

		expect(bestTrade(source, destination)).toEqual({ commodityId: 7, profit: 30 })
	})

	test('returns no trade for a source without prices', () => {
		expect(bestTrade(station(1, []), station(2, [[1, 0, 10]]))).toEqual({ commodityId: null, profit: 0 })
	})
})
