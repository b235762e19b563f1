// rate-limiter.ts
// Reactive rate limiting for dataset downloads: go fast until a 429, then wait

export interface RateLimitInfo {
	limit: number
	remaining: number
	resetTimestamp: number // Unix timestamp in seconds
}

export interface BackoffConfig {
	initialDelayMs: number
	maxDelayMs: number
	multiplier: number
	jitterRange: number // fraction of the delay, e.g. 0.3 = ±30%
}

export const DEFAULT_BACKOFF: BackoffConfig = {
	initialDelayMs: 2000,
	maxDelayMs: 60000,
	multiplier: 2,
	jitterRange: 0.3,
}

/**
 * Default wait when a 429 carries no rate limit headers (in seconds)
 */
export const DEFAULT_RATE_LIMIT_WAIT = 10

/**
 * Parse rate limit headers from a 429 response
 */
export function parseRateLimitHeaders(headers: Record<string, string | string[] | undefined>): RateLimitInfo | null {
	const limit = headers['ratelimit-limit']
	const remaining = headers['ratelimit-remaining']
	const reset = headers['ratelimit-reset']

	if (limit === undefined || remaining === undefined || reset === undefined) {
		return null
	}

	const info = {
		limit: parseInt(String(limit), 10),
		remaining: parseInt(String(remaining), 10),
		resetTimestamp: parseInt(String(reset), 10),
	}

	if (Number.isNaN(info.limit) || Number.isNaN(info.remaining) || Number.isNaN(info.resetTimestamp)) {
		return null
	}
	return info
}

/**
 * Seconds to wait until the rate limit window resets (at least 1)
 */
export function calculateWaitTime(rateLimitInfo: RateLimitInfo, nowMs: number = Date.now()): number {
	const nowSeconds = Math.floor(nowMs / 1000)
	const waitSeconds = rateLimitInfo.resetTimestamp - nowSeconds
	return Math.max(1, waitSeconds + 1)
}

/**
 * Exponential backoff for the given attempt (1-based), capped, with jitter
 */
export function backoffDelay(attempt: number, config: BackoffConfig = DEFAULT_BACKOFF, random: () => number = Math.random): number {
	const base = Math.min(config.initialDelayMs * Math.pow(config.multiplier, attempt - 1), config.maxDelayMs)
	const jitter = base * config.jitterRange * (random() * 2 - 1)
	return Math.max(0, Math.round(base + jitter))
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}
