#!/usr/bin/env node
// CLI Application for tradelane: single-hop trade routes over a cached market snapshot

import 'dotenv/config'
import { input, search, select } from '@inquirer/prompts'
import * as path from 'path'
import { parseCommand, USAGE, type TradeQuery } from './cli-args'
import { closeDb, getDatabaseSize, getDb } from './db'
import { ConfigError, errorMessage } from './errors'
import { datasetDir, downloadDataset } from './services/dataset-fetcher'
import { importDatasetFromDir, type ImportSummary } from './services/dataset-importer'
import { getSnapshotAge, loadMarketSnapshot } from './services/market-loader'
import { chooseScanPath, findRoutes } from './services/parallel-route-scanner'
import { mergeSettings, resolveDataDir, SettingsManager, type ScanSettings } from './services/settings'
import { selectStations, type StationFilter } from './services/station-filter'
import type { MarketSnapshot, ScanProgress } from './types'
import { describeRoutes, formatAge, formatEta, renderRouteTable } from './ui'

// ============================================================================
// COMMANDS
// ============================================================================

function printImportSummary(summary: ImportSummary): void {
	console.log(`   📦 ${summary.commodities.toLocaleString('en-US')} commodities`)
	console.log(`   🌌 ${summary.systems.toLocaleString('en-US')} systems`)
	console.log(`   🛰️  ${summary.stations.toLocaleString('en-US')} stations, ${summary.prices.toLocaleString('en-US')} prices`)
	if (summary.skippedListings > 0) {
		console.log(`   ⚠️  ${summary.skippedListings.toLocaleString('en-US')} listings skipped (unknown commodity)`)
	}
}

function importFromDir(dir: string): void {
	console.log(`\n⏳ Importing dataset from ${dir}...`)
	const summary = importDatasetFromDir(path.resolve(dir), getDb())
	console.log('✅ Import complete!')
	printImportSummary(summary)
}

async function update(settings: ScanSettings, url: string | undefined): Promise<void> {
	const baseUrl = url ?? settings.datasetUrl
	if (!baseUrl) {
		throw new ConfigError('No dataset URL. Pass --url or set TRADELANE_DATASET_URL.')
	}

	console.log(`\n⏳ Downloading dataset from ${baseUrl}`)
	const dir = await downloadDataset(baseUrl, resolveDataDir(), {
		onFile: (file, bytes) => console.log(`   ✓ ${file} (${(bytes / 1024).toFixed(0)} KB)`),
	})
	importFromDir(dir)
}

function writeProgress(progress: ScanProgress): void {
	process.stdout.write(
		`\r   ⏳ Scanning... ${progress.percent}% (${progress.processedSources.toLocaleString('en-US')}/${progress.totalSources.toLocaleString('en-US')} stations, ETA ${formatEta(progress.etaMs)})`,
	)
}

function requireSnapshot(): MarketSnapshot {
	const age = getSnapshotAge(getDb())
	if (age === null) {
		throw new ConfigError('No market data cached. Run "tradelane update" or "tradelane import <dir>" first.')
	}

	const snapshot = loadMarketSnapshot(getDb())
	console.log(`\n📊 Snapshot: ${snapshot.stations.size.toLocaleString('en-US')} stations, imported ${formatAge(age)} ago`)
	return snapshot
}

async function trade(baseSettings: ScanSettings, query: TradeQuery): Promise<void> {
	const settings = mergeSettings(baseSettings, query.overrides)
	const snapshot = requireSnapshot()

	const sources = selectStations(snapshot, query.sources)
	const destinations = selectStations(snapshot, query.destinations)
	const scanPath = chooseScanPath(sources.length, destinations.length, settings.workerCount, settings.autoParallelThreshold)

	console.log(`   🔍 ${sources.length.toLocaleString('en-US')} sources x ${destinations.length.toLocaleString('en-US')} destinations`)
	console.log(scanPath === 'parallel' ? `   ⚡ Parallel scan on ${settings.workerCount} workers (${settings.partitioning})` : '   Sequential scan')

	const startTime = Date.now()
	const routes = await findRoutes(sources, destinations, { ...settings, onProgress: writeProgress })
	const elapsed = ((Date.now() - startTime) / 1000).toFixed(2)
	process.stdout.write(`\r   ✅ Scan complete in ${elapsed}s${' '.repeat(40)}\n\n`)

	if (routes.length === 0) {
		console.log('   No profitable routes found.\n')
		return
	}

	console.log(renderRouteTable(describeRoutes(routes, snapshot)))
	console.log('')
}

// ============================================================================
// INTERACTIVE MENU
// ============================================================================

type MenuChoice = 'trade' | 'update' | 'import' | 'settings' | 'exit'

const ANYWHERE = -1

async function promptSystem(snapshot: MarketSnapshot, message: string): Promise<string | undefined> {
	const systems = [...snapshot.systems.values()].sort((a, b) => a.name.localeCompare(b.name))
	const id = await search<number>({
		message,
		source: async (term) => {
			const needle = (term ?? '').toLowerCase()
			const matches = systems
				.filter((system) => system.name.toLowerCase().includes(needle))
				.slice(0, 20)
				.map((system) => ({ name: system.name, value: system.id }))
			return [{ name: 'Anywhere', value: ANYWHERE }, ...matches]
		},
	})
	return id === ANYWHERE ? undefined : snapshot.systems.get(id)?.name
}

async function promptTradeQuery(): Promise<TradeQuery> {
	const snapshot = loadMarketSnapshot(getDb())
	const from = await promptSystem(snapshot, 'Buy in system:')
	const to = await promptSystem(snapshot, 'Sell in system:')

	const shared: StationFilter = {}
	const near = await promptSystem(snapshot, 'Limit to a radius around system:')
	if (near !== undefined) {
		const radius = await input({
			message: 'Radius (ly):',
			default: '50',
			validate: (value) => Number.isFinite(Number(value)) && Number(value) >= 0 ? true : 'Enter a distance in ly',
		})
		shared.near = near
		shared.radius = Number(radius)
	}

	const permit = await select<boolean>({
		message: 'Include permit-locked systems?',
		choices: [
			{ name: 'Yes', value: true },
			{ name: 'No', value: false },
		],
	})
	shared.allowPermit = permit

	return {
		sources: { ...shared, systemName: from },
		destinations: { ...shared, systemName: to },
		overrides: {},
	}
}

async function interactive(settingsManager: SettingsManager): Promise<void> {
	console.log('\n========================================')
	console.log('TRADELANE ROUTE FINDER')
	console.log('========================================')

	while (true) {
		const age = getSnapshotAge(getDb())
		const choice = await select<MenuChoice>({
			message: `Snapshot: ${age === null ? '⚫ none' : formatAge(age) + ' old'}. Choose an action:`,
			choices: [
				{ name: 'Find trade routes', value: 'trade' },
				{ name: 'Download and import dataset', value: 'update' },
				{ name: 'Import dataset from directory', value: 'import' },
				{ name: 'Show settings', value: 'settings' },
				{ name: 'Exit', value: 'exit' },
			],
		})

		try {
			switch (choice) {
				case 'trade':
					if (age === null) {
						console.log('\n❌ No market data cached. Import a dataset first.\n')
						break
					}
					await trade(settingsManager.getSettings(), await promptTradeQuery())
					break
				case 'update':
					await update(settingsManager.getSettings(), undefined)
					break
				case 'import': {
					const dir = await input({ message: 'Dataset directory:', default: datasetDir(resolveDataDir()) })
					importFromDir(dir)
					break
				}
				case 'settings':
					console.log('\n' + settingsManager.displaySettings() + '\n')
					break
				case 'exit':
					console.log('\nGoodbye!\n')
					return
			}
		} catch (error) {
			console.error(`\n❌ ${errorMessage(error)}\n`)
		}
	}
}

// ============================================================================
// ENTRY POINT
// ============================================================================

async function main(): Promise<void> {
	const command = parseCommand(process.argv.slice(2))
	const settingsManager = new SettingsManager(resolveDataDir())

	switch (command.kind) {
		case 'help':
			console.log(USAGE)
			break
		case 'settings':
			console.log(settingsManager.displaySettings())
			console.log(`  ${'Market cache'.padEnd(20)} ${(getDatabaseSize() / 1024 / 1024).toFixed(1)} MB`)
			break
		case 'update':
			await update(settingsManager.getSettings(), command.url)
			break
		case 'import':
			importFromDir(command.dir)
			break
		case 'trade':
			await trade(settingsManager.getSettings(), command.query)
			break
		case 'interactive':
			await interactive(settingsManager)
			break
	}
}

main()
	.then(() => closeDb())
	.catch((err: unknown) => {
		console.error('\n❌ Fatal error:', errorMessage(err))
		if (err instanceof Error && err.stack && process.env.DEBUG) {
			console.error(err.stack)
		}
		closeDb()
		process.exit(1)
	})
