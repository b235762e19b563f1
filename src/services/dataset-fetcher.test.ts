import { describe, test, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { ConfigError, DownloadError } from '../errors'
import { downloadDataset, fetchWithRetry, type FetchResult, type Fetcher } from './dataset-fetcher'

const noWait = (): Promise<void> => Promise.resolve()

// Replays the given results in order, then keeps returning the last one
function scripted(results: FetchResult[]): { fetcher: Fetcher; calls: string[] } {
	const calls: string[] = []
	const fetcher: Fetcher = async (url) => {
		calls.push(url)
		return results[Math.min(calls.length - 1, results.length - 1)]
	}
	return { fetcher, calls }
}

describe('fetchWithRetry', () => {
	test('returns the body of a successful response', async () => {
		const { fetcher, calls } = scripted([{ success: true, body: '[]', statusCode: 200 }])

		await expect(fetchWithRetry('https://example.com/a.json', { fetcher, wait: noWait })).resolves.toBe('[]')
		expect(calls).toEqual(['https://example.com/a.json'])
	})

	test('retries server errors with backoff', async () => {
		const waits: number[] = []
		const { fetcher, calls } = scripted([
			{ success: false, error: 'Server error 503', statusCode: 503, retryable: true },
			{ success: true, body: 'ok', statusCode: 200 },
		])

		const body = await fetchWithRetry('https://example.com/a.json', {
			fetcher,
			wait: async (ms) => {
				waits.push(ms)
			},
			backoff: { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitterRange: 0 },
		})

		expect(body).toBe('ok')
		expect(calls).toHaveLength(2)
		expect(waits).toEqual([100])
	})

	test('gives up after the retry limit', async () => {
		const { fetcher, calls } = scripted([{ success: false, error: 'Timeout', retryable: true }])

		await expect(fetchWithRetry('https://example.com/a.json', { fetcher, wait: noWait, maxRetries: 3 })).rejects.toThrow(
			'https://example.com/a.json: Timeout',
		)
		expect(calls).toHaveLength(3)
	})

	test('does not retry client errors', async () => {
		const { fetcher, calls } = scripted([{ success: false, error: 'HTTP 404', statusCode: 404, retryable: false }])

		const error = await fetchWithRetry('https://example.com/a.json', { fetcher, wait: noWait }).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(DownloadError)
		expect(error instanceof DownloadError ? error.statusCode : undefined).toBe(404)
		expect(calls).toHaveLength(1)
	})

	test('waits out rate limits without using up attempts', async () => {
		const waits: number[] = []
		const rateLimited: FetchResult = { success: false, error: 'Rate limited', statusCode: 429, retryable: true }
		const { fetcher, calls } = scripted([rateLimited, rateLimited, rateLimited, { success: true, body: 'ok', statusCode: 200 }])

		const body = await fetchWithRetry('https://example.com/a.json', {
			fetcher,
			maxRetries: 1,
			wait: async (ms) => {
				waits.push(ms)
			},
		})

		expect(body).toBe('ok')
		expect(calls).toHaveLength(4)
		expect(waits).toEqual([10000, 10000, 10000])
	})
})

describe('downloadDataset', () => {
	let dataDir: string

	beforeEach(() => {
		dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tradelane-download-'))
	})

	afterEach(() => {
		fs.rmSync(dataDir, { recursive: true, force: true })
	})

	test('writes every dump file into the dataset directory', async () => {
		const calls: string[] = []
		const fetcher: Fetcher = async (url) => {
			calls.push(url)
			return { success: true, body: `[${calls.length}]`, statusCode: 200 }
		}

		const dir = await downloadDataset('https://example.com/dump', dataDir, { fetcher, wait: noWait })

		expect(dir).toBe(path.join(dataDir, 'dataset'))
		expect(calls).toEqual([
			'https://example.com/dump/commodities.json',
			'https://example.com/dump/systems.json',
			'https://example.com/dump/stations.json',
		])
		expect(fs.readFileSync(path.join(dir, 'stations.json'), 'utf8')).toBe('[3]')
	})

	test('writes nothing when a download fails', async () => {
		const fetcher: Fetcher = async (url) =>
			url.endsWith('stations.json')
				? { success: false, error: 'HTTP 403', statusCode: 403, retryable: false }
				: { success: true, body: '[]', statusCode: 200 }

		await expect(downloadDataset('https://example.com/dump/', dataDir, { fetcher, wait: noWait })).rejects.toThrow(DownloadError)
		expect(fs.existsSync(path.join(dataDir, 'dataset'))).toBe(false)
	})

	test('requires an https URL', async () => {
		await expect(downloadDataset('http://example.com/dump', dataDir)).rejects.toThrow(ConfigError)
		await expect(downloadDataset('', dataDir)).rejects.toThrow('Dataset URL must start with https:// (got "(empty)")')
	})
})
