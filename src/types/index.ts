// Type definitions for tradelane

export type CommodityId = number
export type SystemId = number
export type StationId = number

export interface Commodity {
	id: CommodityId
	name: string
	category: string | null
	averagePrice: number | null // display only
}

export interface StarSystem {
	id: SystemId
	name: string
	needsPermit: boolean
	x: number // light years
	y: number
	z: number
}

export interface StationPrice {
	buyPrice: number // what the station charges; 0 = not sold here
	sellPrice: number // what the station pays; 0 = not bought here
}

export interface Station {
	id: StationId
	name: string
	systemId: SystemId
	distanceToStar: number | null // light seconds
	prices: ReadonlyMap<CommodityId, StationPrice>
}

export interface RouteCandidate {
	readonly sourceStationId: StationId
	readonly destinationStationId: StationId
	readonly commodityId: CommodityId | null
	readonly profitPerUnit: number
}

export interface MarketSnapshot {
	commodities: ReadonlyMap<CommodityId, Commodity>
	systems: ReadonlyMap<SystemId, StarSystem>
	stations: ReadonlyMap<StationId, Station>
}

export type PartitionMode = 'cross' | 'paired'

export interface ScanProgress {
	processedSources: number
	totalSources: number
	percent: number
	elapsedMs: number
	etaMs: number | undefined
}

export type ProgressCallback = (progress: ScanProgress) => void
