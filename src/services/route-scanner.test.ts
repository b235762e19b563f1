import { describe, test, expect } from 'vitest'
import type { ScanProgress, Station, StationPrice } from '../types'
import { scanRoutes } from './route-scanner'

// listings: [commodityId, buyPrice, sellPrice]
function station(id: number, listings: [number, number, number][] = []): Station {
	const prices = new Map<number, StationPrice>()
	for (const [commodityId, buyPrice, sellPrice] of listings) {
		prices.set(commodityId, { buyPrice, sellPrice })
	}
	return { id, name: `Station ${id}`, systemId: 1, distanceToStar: null, prices }
}

describe('scanRoutes', () => {
	const s1 = station(1, [[1, 10, 0]])
	const s2 = station(2, [[1, 0, 50]])
	const s3 = station(3, [[1, 0, 5]])

	test('returns the only profitable trade', () => {
		expect(scanRoutes([s1], [s2, s3], { topK: 10 })).toEqual([
			{ sourceStationId: 1, destinationStationId: 2, commodityId: 1, profitPerUnit: 40 },
		])
	})

	test('keeps no-trade pairs as zero-profit candidates when asked', () => {
		expect(scanRoutes([s1], [s2, s3], { topK: 10, emitNoTrade: true })).toEqual([
			{ sourceStationId: 1, destinationStationId: 2, commodityId: 1, profitPerUnit: 40 },
			{ sourceStationId: 1, destinationStationId: 3, commodityId: null, profitPerUnit: 0 },
		])
	})

	test('empty sources or destinations give no routes', () => {
		expect(scanRoutes([], [s2, s3], { topK: 10 })).toEqual([])
		expect(scanRoutes([s1], [], { topK: 10 })).toEqual([])
	})

	test('K of zero gives no routes', () => {
		expect(scanRoutes([s1], [s2], { topK: 0 })).toEqual([])
	})

	test('never pairs a station with itself', () => {
		const both = station(1, [
			[1, 10, 0],
			[2, 0, 100],
		])
		const other = station(2, [
			[2, 20, 0],
			[1, 0, 30],
		])

		const routes = scanRoutes([both, other], [both, other], { topK: 10, emitNoTrade: true })

		expect(routes).toEqual([
			{ sourceStationId: 2, destinationStationId: 1, commodityId: 2, profitPerUnit: 80 },
			{ sourceStationId: 1, destinationStationId: 2, commodityId: 1, profitPerUnit: 20 },
		])
	})

	test('returns at most K routes, profit descending, ties in scan order', () => {
		const sources = [station(10, [[1, 10, 0]]), station(11, [[1, 20, 0]])]
		const destinations = [station(20, [[1, 0, 40]]), station(21, [[1, 0, 50]]), station(22, [[1, 0, 30]])]

		const routes = scanRoutes(sources, destinations, { topK: 4 })

		// Margins: 10->20 30, 10->21 40, 10->22 20, 11->20 20, 11->21 30, 11->22 10
		expect(routes.map((r) => [r.sourceStationId, r.destinationStationId, r.profitPerUnit])).toEqual([
			[10, 21, 40],
			[10, 20, 30],
			[11, 21, 30],
			[10, 22, 20],
		])
	})

	test('repeated scans give the same result', () => {
		const sources = [station(1, [[1, 5, 0], [2, 8, 0]]), station(2, [[1, 6, 0]])]
		const destinations = [station(3, [[1, 0, 9], [2, 0, 20]]), station(4, [[2, 0, 10]])]

		expect(scanRoutes(sources, destinations, { topK: 3 })).toEqual(scanRoutes(sources, destinations, { topK: 3 }))
	})

	test('reports progress after every source', () => {
		const reports: ScanProgress[] = []
		let now = 0
		const clock = (): number => (now += 10)

		scanRoutes([s1, station(4), station(5)], [s2], { topK: 1, onProgress: (p) => reports.push(p), clock })

		expect(reports.map((p) => p.processedSources)).toEqual([1, 2, 3])
		expect(reports.map((p) => p.percent)).toEqual([33, 67, 100])
		expect(reports[0].etaMs).toBeUndefined()
		expect(reports[2].etaMs).toBe(0)
	})
})
