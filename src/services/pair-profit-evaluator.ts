// pair-profit-evaluator.ts
// Best single commodity to buy at one station and sell at another

import type { CommodityId, Station } from '../types'

export interface BestTrade {
	commodityId: CommodityId | null
	profit: number
}

/**
 * Find the commodity with the largest per-unit margin from `source` to `destination`.
 *
 * Only commodities the source sells (buyPrice > 0) and the destination buys
 * (sellPrice > 0) count. The first commodity reaching the best margin wins ties.
 * Returns `{ commodityId: null, profit: 0 }` when no margin is positive.
 */
export function bestTrade(source: Station, destination: Station): BestTrade {
	let commodityId: CommodityId | null = null
	let profit = 0

	for (const [id, sourcePrice] of source.prices) {
		if (sourcePrice.buyPrice <= 0) continue

		const destinationPrice = destination.prices.get(id)
		if (!destinationPrice || destinationPrice.sellPrice <= 0) continue

		const margin = destinationPrice.sellPrice - sourcePrice.buyPrice
		if (margin > profit) {
			profit = margin
			commodityId = id
		}
	}

	return { commodityId, profit }
}
