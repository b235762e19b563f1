/**
 * Market Snapshot Loader
 *
 * Loads the cached tables into read-only maps for the route engine:
 * commodities, systems and stations with their price listings.
 */

import type Database from 'better-sqlite3'
import { getDb } from '../db'
import type {
	Commodity,
	CommodityId,
	MarketSnapshot,
	StarSystem,
	Station,
	StationId,
	StationPrice,
	SystemId,
} from '../types'

// ============================================================================
// Internal row types (from database queries)
// ============================================================================

interface CommodityRow {
	id: number
	name: string
	category: string | null
	average_price: number | null
}

interface SystemRow {
	id: number
	name: string
	x: number
	y: number
	z: number
	needs_permit: number
}

interface StationRow {
	id: number
	name: string
	system_id: number
	distance_to_star: number | null
}

interface PriceRow {
	station_id: number
	commodity_id: number
	buy_price: number
	sell_price: number
}

// ============================================================================
// Loading
// ============================================================================

export function loadMarketSnapshot(db: Database.Database = getDb()): MarketSnapshot {
	const commodities = new Map<CommodityId, Commodity>()
	for (const row of db.prepare<[], CommodityRow>('SELECT id, name, category, average_price FROM commodities ORDER BY id').all()) {
		commodities.set(row.id, {
			id: row.id,
			name: row.name,
			category: row.category,
			averagePrice: row.average_price,
		})
	}

	const systems = new Map<SystemId, StarSystem>()
	for (const row of db.prepare<[], SystemRow>('SELECT id, name, x, y, z, needs_permit FROM systems ORDER BY id').all()) {
		systems.set(row.id, {
			id: row.id,
			name: row.name,
			needsPermit: row.needs_permit !== 0,
			x: row.x,
			y: row.y,
			z: row.z,
		})
	}

	const pricesByStation = new Map<StationId, Map<CommodityId, StationPrice>>()
	const priceRows = db
		.prepare<[], PriceRow>('SELECT station_id, commodity_id, buy_price, sell_price FROM station_prices ORDER BY station_id, commodity_id')
		.all()
	for (const row of priceRows) {
		let prices = pricesByStation.get(row.station_id)
		if (!prices) {
			prices = new Map()
			pricesByStation.set(row.station_id, prices)
		}
		prices.set(row.commodity_id, { buyPrice: row.buy_price, sellPrice: row.sell_price })
	}

	const stations = new Map<StationId, Station>()
	for (const row of db.prepare<[], StationRow>('SELECT id, name, system_id, distance_to_star FROM stations ORDER BY id').all()) {
		stations.set(row.id, {
			id: row.id,
			name: row.name,
			systemId: row.system_id,
			distanceToStar: row.distance_to_star,
			prices: pricesByStation.get(row.id) ?? new Map(),
		})
	}

	return { commodities, systems, stations }
}

/**
 * Minutes since the last import, or null if nothing was imported
 */
export function getSnapshotAge(db: Database.Database = getDb(), now: number = Date.now()): number | null {
	const row = db.prepare<[string], { value: string }>('SELECT value FROM import_meta WHERE key = ?').get('imported_at')
	if (!row) return null

	const importedAt = Date.parse(row.value)
	if (Number.isNaN(importedAt)) return null
	return Math.floor((now - importedAt) / 60000)
}
