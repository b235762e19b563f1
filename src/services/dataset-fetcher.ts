// dataset-fetcher.ts
// Downloads the market dump files over HTTPS into the local data directory

import * as https from 'https'
import * as fs from 'fs'
import * as path from 'path'
import { DATASET_FILES, DATASET_FILE_KEYS, type DatasetFile } from '../constants/defaults'
import { ConfigError, DownloadError } from '../errors'
import {
	backoffDelay,
	calculateWaitTime,
	parseRateLimitHeaders,
	sleep,
	DEFAULT_BACKOFF,
	DEFAULT_RATE_LIMIT_WAIT,
	type BackoffConfig,
	type RateLimitInfo,
} from '../utils/rate-limiter'

// ============================================================================
// TYPES
// ============================================================================

export interface FetchResult {
	success: boolean
	body?: string
	error?: string
	statusCode?: number
	retryable?: boolean
	rateLimitInfo?: RateLimitInfo
}

export type Fetcher = (url: string) => Promise<FetchResult>

export interface DownloadOptions {
	maxRetries?: number
	backoff?: BackoffConfig
	fetcher?: Fetcher
	wait?: (ms: number) => Promise<void>
	onFile?: (file: DatasetFile, bytes: number) => void
}

const REQUEST_TIMEOUT_MS = 60000
const DEFAULT_MAX_RETRIES = 5

// ============================================================================
// HTTP
// ============================================================================

function makeHttpsRequest(url: string): Promise<FetchResult> {
	return new Promise((resolve) => {
		const request = https.get(url, (res) => {
			let data = ''
			res.setEncoding('utf8')

			res.on('data', (chunk: string) => {
				data += chunk
			})

			res.on('end', () => {
				if (res.statusCode === 200) {
					resolve({ success: true, body: data, statusCode: 200 })
				} else if (res.statusCode === 429) {
					const rateLimitInfo = parseRateLimitHeaders(res.headers)
					resolve({
						success: false,
						error: 'Rate limited',
						statusCode: 429,
						retryable: true,
						rateLimitInfo: rateLimitInfo ?? undefined,
					})
				} else if (res.statusCode && res.statusCode >= 500) {
					resolve({
						success: false,
						error: `Server error ${res.statusCode}`,
						statusCode: res.statusCode,
						retryable: true,
					})
				} else {
					resolve({
						success: false,
						error: `HTTP ${res.statusCode}`,
						statusCode: res.statusCode,
						retryable: false,
					})
				}
			})
		})

		request.on('error', (err) => {
			resolve({ success: false, error: err.message, retryable: true })
		})

		request.setTimeout(REQUEST_TIMEOUT_MS, () => {
			request.destroy()
			resolve({ success: false, error: 'Timeout', retryable: true })
		})
	})
}

/**
 * Fetch with retries: 429 waits for the rate limit window and does not count
 * as an attempt; server errors and timeouts back off exponentially.
 */
export async function fetchWithRetry(url: string, options: DownloadOptions = {}): Promise<string> {
	const fetcher = options.fetcher ?? makeHttpsRequest
	const wait = options.wait ?? sleep
	const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
	const backoff = options.backoff ?? DEFAULT_BACKOFF

	let attempt = 1
	while (true) {
		const result = await fetcher(url)
		if (result.success && result.body !== undefined) {
			return result.body
		}

		const isRateLimited = result.statusCode === 429
		if (!result.retryable || (!isRateLimited && attempt >= maxRetries)) {
			throw new DownloadError(`${url}: ${result.error ?? 'request failed'}`, result.statusCode)
		}

		if (isRateLimited) {
			const waitSeconds = result.rateLimitInfo ? calculateWaitTime(result.rateLimitInfo) : DEFAULT_RATE_LIMIT_WAIT
			await wait(waitSeconds * 1000)
		} else {
			await wait(backoffDelay(attempt, backoff))
			attempt++
		}
	}
}

// ============================================================================
// DOWNLOAD
// ============================================================================

export function datasetDir(dataDir: string): string {
	return path.join(dataDir, 'dataset')
}

/**
 * Download every dump file from `baseUrl` into `<dataDir>/dataset`.
 * Files are written only after all downloads succeed.
 */
export async function downloadDataset(baseUrl: string, dataDir: string, options: DownloadOptions = {}): Promise<string> {
	if (!/^https:\/\//.test(baseUrl)) {
		throw new ConfigError(`Dataset URL must start with https:// (got "${baseUrl || '(empty)'}")`)
	}

	const base = baseUrl.endsWith('/') ? baseUrl : baseUrl + '/'
	const bodies = new Map<DatasetFile, string>()

	for (const file of DATASET_FILE_KEYS) {
		const body = await fetchWithRetry(base + DATASET_FILES[file], options)
		bodies.set(file, body)
		options.onFile?.(file, Buffer.byteLength(body))
	}

	const dir = datasetDir(dataDir)
	fs.mkdirSync(dir, { recursive: true })
	for (const [file, body] of bodies) {
		fs.writeFileSync(path.join(dir, DATASET_FILES[file]), body)
	}

	return dir
}
