// station-filter.ts
// Narrows the snapshot to the stations a query should consider

import { LookupError } from '../errors'
import type { MarketSnapshot, StarSystem, Station } from '../types'

export interface StationFilter {
	systemName?: string
	stationName?: string
	/** Reference system for `radius` */
	near?: string
	radius?: number // light years, inclusive
	/** false drops stations in permit-locked systems */
	allowPermit?: boolean
	maxDistanceToStar?: number // light seconds; unknown distances are kept
}

export function systemDistance(a: StarSystem, b: StarSystem): number {
	const dx = a.x - b.x
	const dy = a.y - b.y
	const dz = a.z - b.z
	return Math.sqrt(dx * dx + dy * dy + dz * dz)
}

/**
 * Case-insensitive exact system name lookup
 */
export function findSystemByName(snapshot: MarketSnapshot, name: string): StarSystem {
	const wanted = name.trim().toLowerCase()
	for (const system of snapshot.systems.values()) {
		if (system.name.toLowerCase() === wanted) return system
	}
	throw new LookupError(`Unknown system: ${name}`)
}

/**
 * Stations matching every given criterion, ascending by id
 */
export function selectStations(snapshot: MarketSnapshot, filter: StationFilter = {}): Station[] {
	const onlySystem = filter.systemName !== undefined ? findSystemByName(snapshot, filter.systemName) : null
	const origin = filter.near !== undefined ? findSystemByName(snapshot, filter.near) : null
	const stationName = filter.stationName?.trim().toLowerCase()
	const allowPermit = filter.allowPermit ?? true

	const selected: Station[] = []
	for (const station of snapshot.stations.values()) {
		const system = snapshot.systems.get(station.systemId)
		if (!system) continue

		if (onlySystem && system.id !== onlySystem.id) continue
		if (!allowPermit && system.needsPermit) continue
		if (stationName && !station.name.toLowerCase().includes(stationName)) continue
		if (origin && filter.radius !== undefined && systemDistance(origin, system) > filter.radius) continue
		if (
			filter.maxDistanceToStar !== undefined &&
			station.distanceToStar !== null &&
			station.distanceToStar > filter.maxDistanceToStar
		) {
			continue
		}

		selected.push(station)
	}

	return selected.sort((a, b) => a.id - b.id)
}
