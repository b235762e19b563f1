// route-report.ts
// Resolves route candidates against the snapshot and renders them as a table

import type { MarketSnapshot, RouteCandidate } from '../types'
import { systemDistance } from '../services/station-filter'
import { formatCredits, formatDistance, renderTable, type Column } from './table'

export interface RouteRow {
	rank: number
	from: string
	to: string
	commodity: string
	buyPrice: number | null
	sellPrice: number | null
	profit: number
	distance: number | null // light years between the two systems
}

const COLUMNS: Column[] = [
	{ header: '#', width: 3, align: 'right' },
	{ header: 'From', width: 32 },
	{ header: 'To', width: 32 },
	{ header: 'Commodity', width: 22 },
	{ header: 'Buy', width: 8, align: 'right' },
	{ header: 'Sell', width: 8, align: 'right' },
	{ header: 'Profit', width: 8, align: 'right' },
	{ header: 'Distance', width: 11, align: 'right' },
]

function stationLabel(snapshot: MarketSnapshot, stationId: number): string {
	const station = snapshot.stations.get(stationId)
	if (!station) return `#${stationId}`
	const system = snapshot.systems.get(station.systemId)
	return system ? `${station.name} (${system.name})` : station.name
}

export function describeRoutes(routes: readonly RouteCandidate[], snapshot: MarketSnapshot): RouteRow[] {
	return routes.map((route, index) => {
		const source = snapshot.stations.get(route.sourceStationId)
		const destination = snapshot.stations.get(route.destinationStationId)
		const commodityId = route.commodityId

		const sourceSystem = source ? snapshot.systems.get(source.systemId) : undefined
		const destinationSystem = destination ? snapshot.systems.get(destination.systemId) : undefined

		let commodity = '-'
		let buyPrice: number | null = null
		let sellPrice: number | null = null
		if (commodityId !== null) {
			commodity = snapshot.commodities.get(commodityId)?.name ?? `#${commodityId}`
			buyPrice = source?.prices.get(commodityId)?.buyPrice ?? null
			sellPrice = destination?.prices.get(commodityId)?.sellPrice ?? null
		}

		return {
			rank: index + 1,
			from: stationLabel(snapshot, route.sourceStationId),
			to: stationLabel(snapshot, route.destinationStationId),
			commodity,
			buyPrice,
			sellPrice,
			profit: route.profitPerUnit,
			distance: sourceSystem && destinationSystem ? systemDistance(sourceSystem, destinationSystem) : null,
		}
	})
}

export function renderRouteTable(rows: readonly RouteRow[]): string {
	return renderTable(
		{ columns: COLUMNS },
		rows.map((row) => [
			String(row.rank),
			row.from,
			row.to,
			row.commodity,
			row.buyPrice === null ? '-' : formatCredits(row.buyPrice),
			row.sellPrice === null ? '-' : formatCredits(row.sellPrice),
			formatCredits(row.profit),
			row.distance === null ? '-' : formatDistance(row.distance),
		]),
	)
}
