// Settings Service
// Scan preferences: defaults < settings.json < environment < CLI flags

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { DEFAULT_DATA_DIR, DEFAULT_PARALLEL_THRESHOLD, DEFAULT_TOP_K, defaultWorkerCount } from '../constants/defaults'
import { ConfigError, errorMessage } from '../errors'

// ============================================================================
// TYPES
// ============================================================================

export const ScanSettingsSchema = z.object({
	topK: z.number().int().positive(),
	autoParallelThreshold: z.number().int().nonnegative(),
	workerCount: z.number().int().positive(),
	partitioning: z.enum(['cross', 'paired']),
	emitNoTrade: z.boolean(),
	taskTimeoutMs: z.number().int().positive().nullable(),
	datasetUrl: z.string(),
})

export type ScanSettings = z.infer<typeof ScanSettingsSchema>

const PartialSettingsSchema = ScanSettingsSchema.partial()

export function defaultSettings(): ScanSettings {
	return {
		topK: DEFAULT_TOP_K,
		autoParallelThreshold: DEFAULT_PARALLEL_THRESHOLD,
		workerCount: defaultWorkerCount(),
		partitioning: 'cross',
		emitNoTrade: false,
		taskTimeoutMs: null,
		datasetUrl: '',
	}
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
	const dir = env.TRADELANE_DATA_DIR
	return dir ? path.resolve(dir) : DEFAULT_DATA_DIR
}

function parseIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name]
	if (raw === undefined || raw === '') return undefined
	const value = Number(raw)
	if (!Number.isInteger(value)) {
		throw new ConfigError(`${name} must be an integer, got "${raw}"`)
	}
	return value
}

/**
 * Settings overridden through TRADELANE_* environment variables
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<ScanSettings> {
	const overrides: Partial<ScanSettings> = {}

	const topK = parseIntEnv(env, 'TRADELANE_TOP_K')
	if (topK !== undefined) overrides.topK = topK

	const threshold = parseIntEnv(env, 'TRADELANE_PARALLEL_THRESHOLD')
	if (threshold !== undefined) overrides.autoParallelThreshold = threshold

	const workers = parseIntEnv(env, 'TRADELANE_WORKERS')
	if (workers !== undefined) overrides.workerCount = workers

	const timeout = parseIntEnv(env, 'TRADELANE_TASK_TIMEOUT_MS')
	if (timeout !== undefined) overrides.taskTimeoutMs = timeout > 0 ? timeout : null

	if (env.TRADELANE_DATASET_URL) overrides.datasetUrl = env.TRADELANE_DATASET_URL

	return overrides
}

export function mergeSettings(base: ScanSettings, ...layers: Partial<ScanSettings>[]): ScanSettings {
	const merged: Record<string, unknown> = { ...base }
	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			if (value !== undefined) merged[key] = value
		}
	}

	const result = ScanSettingsSchema.safeParse(merged)
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new ConfigError(`Invalid setting ${issue.path.join('.')}: ${issue.message}`)
	}
	return result.data
}

// ============================================================================
// SETTINGS FILE
// ============================================================================

export class SettingsManager {
	private settings: Partial<ScanSettings>
	private settingsPath: string

	constructor(dataDir: string = resolveDataDir()) {
		this.settingsPath = path.join(dataDir, 'settings.json')
		this.settings = this.loadSettings()
	}

	/**
	 * Effective settings with environment overrides applied
	 */
	getSettings(env: NodeJS.ProcessEnv = process.env): ScanSettings {
		return mergeSettings(defaultSettings(), this.settings, readEnvOverrides(env))
	}

	/**
	 * Values stored in settings.json only
	 */
	getStored(): Partial<ScanSettings> {
		return { ...this.settings }
	}

	set<K extends keyof ScanSettings>(key: K, value: ScanSettings[K]): void {
		const next: Partial<ScanSettings> = { ...this.settings }
		next[key] = value
		mergeSettings(defaultSettings(), next)
		this.settings = next
		this.saveSettings()
	}

	resetToDefaults(): void {
		this.settings = {}
		this.saveSettings()
	}

	private loadSettings(): Partial<ScanSettings> {
		if (!fs.existsSync(this.settingsPath)) return {}

		let data: unknown
		try {
			data = JSON.parse(fs.readFileSync(this.settingsPath, 'utf8'))
		} catch (e) {
			throw new ConfigError(`Could not read ${this.settingsPath}: ${errorMessage(e)}`, { cause: e })
		}

		const result = PartialSettingsSchema.safeParse(data)
		if (!result.success) {
			const issue = result.error.issues[0]
			throw new ConfigError(`Invalid ${this.settingsPath} (${issue.path.join('.')}): ${issue.message}`)
		}
		return result.data
	}

	private saveSettings(): void {
		fs.mkdirSync(path.dirname(this.settingsPath), { recursive: true })
		fs.writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2))
	}

	displaySettings(env: NodeJS.ProcessEnv = process.env): string {
		const s = this.getSettings(env)
		const lines = [
			['Top routes (K)', String(s.topK)],
			['Parallel threshold', `${s.autoParallelThreshold.toLocaleString('en-US')} pairs`],
			['Workers', String(s.workerCount)],
			['Partitioning', s.partitioning],
			['Keep no-trade pairs', s.emitNoTrade ? 'Yes' : 'No'],
			['Worker timeout', s.taskTimeoutMs === null ? 'none' : `${s.taskTimeoutMs} ms`],
			['Dataset URL', s.datasetUrl || '(not set)'],
		]
		return ['SETTINGS', ...lines.map(([label, value]) => `  ${label.padEnd(20)} ${value}`)].join('\n')
	}
}
