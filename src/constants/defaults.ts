import * as os from 'os'
import * as path from 'path'

// Routes kept per query
export const DEFAULT_TOP_K = 10

// Pair count (sources x destinations) above which the scan is split across workers
export const DEFAULT_PARALLEL_THRESHOLD = 100_000

const MAX_DEFAULT_WORKERS = 8

export function defaultWorkerCount(): number {
	return Math.max(1, Math.min(MAX_DEFAULT_WORKERS, os.availableParallelism()))
}

export const DEFAULT_DATA_DIR = path.join(process.cwd(), 'data')

export const DATASET_FILES = {
	commodities: 'commodities.json',
	systems: 'systems.json',
	stations: 'stations.json',
} as const

export type DatasetFile = keyof typeof DATASET_FILES

export const DATASET_FILE_KEYS: readonly DatasetFile[] = ['commodities', 'systems', 'stations']
