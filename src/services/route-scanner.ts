// route-scanner.ts
// Sequential top-K scan over every source x destination station pair

import type { ProgressCallback, RouteCandidate, Station } from '../types'
import { DEFAULT_TOP_K } from '../constants/defaults'
import { ProgressTracker } from '../utils/progress'
import { TopKRoutes } from '../utils/top-k-routes'
import { bestTrade } from './pair-profit-evaluator'

export interface ScanOptions {
	topK?: number
	/** Keep pairs without a profitable commodity as zero-profit candidates */
	emitNoTrade?: boolean
	/** Called after each source station */
	onProgress?: ProgressCallback
	clock?: () => number
}

/**
 * Rank the most profitable single-commodity trades from `sources` to `destinations`.
 *
 * Sources and destinations are visited in input order; a station is never paired
 * with itself. Returns at most `topK` routes, profit descending, ties in the
 * order they were found.
 */
export function scanRoutes(
	sources: readonly Station[],
	destinations: readonly Station[],
	options: ScanOptions = {},
): RouteCandidate[] {
	const topK = options.topK ?? DEFAULT_TOP_K
	if (sources.length === 0 || destinations.length === 0 || topK <= 0) {
		return []
	}

	const ranking = new TopKRoutes(topK)
	const progress = options.onProgress ? new ProgressTracker(sources.length, options.clock) : null

	for (const source of sources) {
		for (const destination of destinations) {
			if (destination.id === source.id) continue

			const trade = bestTrade(source, destination)
			if (trade.commodityId === null && !options.emitNoTrade) continue

			ranking.offer({
				sourceStationId: source.id,
				destinationStationId: destination.id,
				commodityId: trade.commodityId,
				profitPerUnit: trade.profit,
			})
		}

		if (progress && options.onProgress) {
			options.onProgress(progress.advance())
		}
	}

	return ranking.toArray()
}
