import { remember } from '@epic-web/remember'
import Database from 'better-sqlite3'
import * as path from 'path'
import * as fs from 'fs'
import { resolveDataDir } from './services/settings'

export const DB_FILENAME = 'market.sqlite'

let testDb: Database.Database | null = null
let opened = false

export function initializeSchema(instance: Database.Database): void {
	instance.exec(`
		CREATE TABLE IF NOT EXISTS commodities (
			id INTEGER PRIMARY KEY,
			name TEXT NOT NULL,
			category TEXT,
			average_price INTEGER
		);

		CREATE TABLE IF NOT EXISTS systems (
			id INTEGER PRIMARY KEY,
			name TEXT NOT NULL,
			x REAL NOT NULL,
			y REAL NOT NULL,
			z REAL NOT NULL,
			needs_permit INTEGER NOT NULL DEFAULT 0
		);

		CREATE INDEX IF NOT EXISTS idx_systems_name ON systems(name COLLATE NOCASE);

		CREATE TABLE IF NOT EXISTS stations (
			id INTEGER PRIMARY KEY,
			name TEXT NOT NULL,
			system_id INTEGER NOT NULL REFERENCES systems(id),
			distance_to_star REAL
		);

		CREATE INDEX IF NOT EXISTS idx_stations_system_id ON stations(system_id);

		CREATE TABLE IF NOT EXISTS station_prices (
			station_id INTEGER NOT NULL REFERENCES stations(id),
			commodity_id INTEGER NOT NULL,
			buy_price INTEGER NOT NULL,
			sell_price INTEGER NOT NULL,
			PRIMARY KEY (station_id, commodity_id)
		);

		CREATE TABLE IF NOT EXISTS import_meta (
			key TEXT PRIMARY KEY,
			value TEXT NOT NULL
		);
	`)
}

export function openDatabase(dbPath: string): Database.Database {
	const dir = path.dirname(dbPath)
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true })
	}

	const instance = new Database(dbPath)
	instance.pragma('journal_mode = WAL')
	instance.pragma('synchronous = NORMAL')
	initializeSchema(instance)
	return instance
}

/**
 * Process-wide market cache in the data directory; replaced by setTestDatabase in tests
 */
export function getDb(): Database.Database {
	if (testDb) return testDb
	return remember('market-db', () => {
		opened = true
		return openDatabase(path.join(resolveDataDir(), DB_FILENAME))
	})
}

export function setTestDatabase(instance: Database.Database | null): void {
	testDb = instance
}

export function getDatabaseSize(dbPath: string = path.join(resolveDataDir(), DB_FILENAME)): number {
	let totalSize = 0

	for (const file of [dbPath, dbPath + '-wal', dbPath + '-shm']) {
		if (fs.existsSync(file)) {
			totalSize += fs.statSync(file).size
		}
	}

	return totalSize
}

export function closeDb(): void {
	if (testDb || !opened) return
	getDb().close()
}
