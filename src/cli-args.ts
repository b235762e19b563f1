// cli-args.ts
// Command-line parsing for the tradelane commands

import { parseArgs } from 'util'
import { ConfigError } from './errors'
import type { ScanSettings } from './services/settings'
import type { StationFilter } from './services/station-filter'

export type Command =
	| { kind: 'interactive' }
	| { kind: 'help' }
	| { kind: 'settings' }
	| { kind: 'update'; url: string | undefined }
	| { kind: 'import'; dir: string }
	| { kind: 'trade'; query: TradeQuery }

export interface TradeQuery {
	sources: StationFilter
	destinations: StationFilter
	overrides: Partial<ScanSettings>
}

export const USAGE = `Usage:
  tradelane                      interactive menu
  tradelane update [--url URL]   download and import the market dataset
  tradelane import <dir>         import dataset files from a directory
  tradelane trade [options]      find the most profitable routes
  tradelane settings             show effective settings

Trade options:
  --from SYSTEM             buy only in this system
  --to SYSTEM               sell only in this system
  --near SYSTEM             center of the search radius
  --radius LY               only systems within LY of --near
  --no-permit               skip permit-locked systems
  --max-star-distance LS    skip stations farther than LS from their star
  --top K                   number of routes to show
  --workers N               worker threads for large scans
  --threshold PAIRS         pair count above which to scan in parallel
  --timeout MS              fail a worker that runs longer than MS
  --paired                  pair source chunk i with destination chunk i only
  --emit-no-trade           keep station pairs without a profitable commodity`

function parseNumber(name: string, raw: string | undefined, integer: boolean): number | undefined {
	if (raw === undefined) return undefined
	const value = Number(raw)
	if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
		throw new ConfigError(`--${name} expects ${integer ? 'an integer' : 'a number'}, got "${raw}"`)
	}
	return value
}

export function parseTradeArgs(args: string[]): TradeQuery {
	const { values } = parseArgs({
		args,
		options: {
			from: { type: 'string' },
			to: { type: 'string' },
			near: { type: 'string' },
			radius: { type: 'string' },
			'no-permit': { type: 'boolean' },
			'max-star-distance': { type: 'string' },
			top: { type: 'string' },
			workers: { type: 'string' },
			threshold: { type: 'string' },
			timeout: { type: 'string' },
			paired: { type: 'boolean' },
			'emit-no-trade': { type: 'boolean' },
		},
		strict: true,
		allowPositionals: false,
	})

	const radius = parseNumber('radius', values.radius, false)
	if (radius !== undefined && values.near === undefined) {
		throw new ConfigError('--radius requires --near')
	}

	const shared: StationFilter = {
		near: values.near,
		radius,
		allowPermit: values['no-permit'] ? false : undefined,
		maxDistanceToStar: parseNumber('max-star-distance', values['max-star-distance'], false),
	}

	const overrides: Partial<ScanSettings> = {
		topK: parseNumber('top', values.top, true),
		workerCount: parseNumber('workers', values.workers, true),
		autoParallelThreshold: parseNumber('threshold', values.threshold, true),
		taskTimeoutMs: parseNumber('timeout', values.timeout, true),
		partitioning: values.paired ? 'paired' : undefined,
		emitNoTrade: values['emit-no-trade'] ? true : undefined,
	}

	return {
		sources: { ...shared, systemName: values.from },
		destinations: { ...shared, systemName: values.to },
		overrides,
	}
}

export function parseCommand(argv: string[]): Command {
	const [name, ...rest] = argv

	switch (name) {
		case undefined:
			return { kind: 'interactive' }
		case 'help':
		case '--help':
		case '-h':
			return { kind: 'help' }
		case 'settings':
			return { kind: 'settings' }
		case 'update': {
			const { values } = parseArgs({ args: rest, options: { url: { type: 'string' } }, strict: true })
			return { kind: 'update', url: values.url }
		}
		case 'import': {
			const { positionals } = parseArgs({ args: rest, options: {}, allowPositionals: true, strict: true })
			if (positionals.length !== 1) {
				throw new ConfigError('import expects exactly one directory')
			}
			return { kind: 'import', dir: positionals[0] }
		}
		case 'trade':
			return { kind: 'trade', query: parseTradeArgs(rest) }
		default:
			throw new ConfigError(`Unknown command "${name}"\n\n${USAGE}`)
	}
}
