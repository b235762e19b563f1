// dataset-importer.ts
// Validates market dump files and replaces the cached snapshot in SQLite

import * as fs from 'fs'
import * as path from 'path'
import type Database from 'better-sqlite3'
import { z } from 'zod'
import { DATASET_FILES, type DatasetFile } from '../constants/defaults'
import { DatasetError, errorMessage } from '../errors'
import { getDb } from '../db'

// ============================================================================
// DUMP FORMAT
// ============================================================================

const IdSchema = z.number().int().nonnegative()
const PriceSchema = z.number().int().nonnegative()

const CommodityDumpSchema = z.object({
	id: IdSchema,
	name: z.string().min(1),
	category: z.string().nullish(),
	average_price: z.number().nullish(),
})

const SystemDumpSchema = z.object({
	id: IdSchema,
	name: z.string().min(1),
	x: z.number(),
	y: z.number(),
	z: z.number(),
	needs_permit: z.union([z.boolean(), z.literal(0), z.literal(1)]).nullish(),
})

const ListingDumpSchema = z.object({
	commodity_id: IdSchema,
	buy_price: PriceSchema,
	sell_price: PriceSchema,
})

const StationDumpSchema = z.object({
	id: IdSchema,
	name: z.string().min(1),
	system_id: IdSchema,
	distance_to_star: z.number().nonnegative().nullish(),
	listings: z.array(ListingDumpSchema).default([]),
})

export type StationDump = z.input<typeof StationDumpSchema>

export interface DatasetDump {
	commodities: z.input<typeof CommodityDumpSchema>[]
	systems: z.input<typeof SystemDumpSchema>[]
	stations: StationDump[]
}

export interface ImportSummary {
	commodities: number
	systems: number
	stations: number
	prices: number
	skippedListings: number
}

// ============================================================================
// READING
// ============================================================================

function parseDumpFile<T extends z.ZodTypeAny>(file: DatasetFile, raw: unknown, schema: T): z.infer<T>[] {
	const result = z.array(schema).safeParse(raw)
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new DatasetError(`${DATASET_FILES[file]}: ${issue.path.join('.')}: ${issue.message}`)
	}
	return result.data
}

function readJson(filePath: string): unknown {
	if (!fs.existsSync(filePath)) {
		throw new DatasetError(`Dataset file not found: ${filePath}`)
	}
	try {
		return JSON.parse(fs.readFileSync(filePath, 'utf8'))
	} catch (e) {
		throw new DatasetError(`Could not parse ${filePath}: ${errorMessage(e)}`, { cause: e })
	}
}

/**
 * Read the three dump files from a directory
 */
export function readDatasetFiles(dir: string): DatasetDump {
	return {
		commodities: parseDumpFile('commodities', readJson(path.join(dir, DATASET_FILES.commodities)), CommodityDumpSchema),
		systems: parseDumpFile('systems', readJson(path.join(dir, DATASET_FILES.systems)), SystemDumpSchema),
		stations: parseDumpFile('stations', readJson(path.join(dir, DATASET_FILES.stations)), StationDumpSchema),
	}
}

// ============================================================================
// IMPORT
// ============================================================================

function assertUniqueIds(file: DatasetFile, records: readonly { id: number }[]): void {
	const seen = new Set<number>()
	for (const record of records) {
		if (seen.has(record.id)) {
			throw new DatasetError(`${DATASET_FILES[file]}: duplicate id ${record.id}`)
		}
		seen.add(record.id)
	}
}

/**
 * Replace the cached snapshot with `dump` in a single transaction.
 * Listings for commodities missing from the dump are skipped and counted.
 */
export function importDataset(dump: DatasetDump, db: Database.Database = getDb(), now: Date = new Date()): ImportSummary {
	const commodities = parseDumpFile('commodities', dump.commodities, CommodityDumpSchema)
	const systems = parseDumpFile('systems', dump.systems, SystemDumpSchema)
	const stations = parseDumpFile('stations', dump.stations, StationDumpSchema)

	assertUniqueIds('commodities', commodities)
	assertUniqueIds('systems', systems)
	assertUniqueIds('stations', stations)

	const systemIds = new Set(systems.map((system) => system.id))
	const commodityIds = new Set(commodities.map((commodity) => commodity.id))

	for (const station of stations) {
		if (!systemIds.has(station.system_id)) {
			throw new DatasetError(`Station ${station.id} (${station.name}) references unknown system ${station.system_id}`)
		}
	}

	const insertCommodity = db.prepare(
		'INSERT INTO commodities (id, name, category, average_price) VALUES (?, ?, ?, ?)',
	)
	const insertSystem = db.prepare(
		'INSERT INTO systems (id, name, x, y, z, needs_permit) VALUES (?, ?, ?, ?, ?, ?)',
	)
	const insertStation = db.prepare(
		'INSERT INTO stations (id, name, system_id, distance_to_star) VALUES (?, ?, ?, ?)',
	)
	const insertPrice = db.prepare(
		'INSERT OR REPLACE INTO station_prices (station_id, commodity_id, buy_price, sell_price) VALUES (?, ?, ?, ?)',
	)
	const setMeta = db.prepare('INSERT OR REPLACE INTO import_meta (key, value) VALUES (?, ?)')

	const summary: ImportSummary = {
		commodities: commodities.length,
		systems: systems.length,
		stations: stations.length,
		prices: 0,
		skippedListings: 0,
	}

	const replaceAll = db.transaction(() => {
		db.exec('DELETE FROM station_prices; DELETE FROM stations; DELETE FROM systems; DELETE FROM commodities;')

		for (const commodity of commodities) {
			insertCommodity.run(commodity.id, commodity.name, commodity.category ?? null, commodity.average_price ?? null)
		}

		for (const system of systems) {
			const needsPermit = system.needs_permit === true || system.needs_permit === 1
			insertSystem.run(system.id, system.name, system.x, system.y, system.z, needsPermit ? 1 : 0)
		}

		for (const station of stations) {
			insertStation.run(station.id, station.name, station.system_id, station.distance_to_star ?? null)

			for (const listing of station.listings) {
				if (!commodityIds.has(listing.commodity_id)) {
					summary.skippedListings++
					continue
				}
				insertPrice.run(station.id, listing.commodity_id, listing.buy_price, listing.sell_price)
				summary.prices++
			}
		}

		setMeta.run('imported_at', now.toISOString())
	})

	replaceAll()
	return summary
}

export function importDatasetFromDir(dir: string, db: Database.Database = getDb()): ImportSummary {
	return importDataset(readDatasetFiles(dir), db)
}
