// progress.ts
// Percent complete and time remaining for a scan over a known number of sources

import type { ScanProgress } from '../types'

export class ProgressTracker {
	private readonly startedAt: number
	private processed = 0

	constructor(
		readonly total: number,
		private readonly clock: () => number = Date.now,
	) {
		this.startedAt = clock()
	}

	/**
	 * Record `count` more processed sources and return the updated progress
	 */
	advance(count = 1): ScanProgress {
		const isFirstReport = this.processed === 0
		this.processed = Math.min(this.total, this.processed + count)

		const elapsedMs = this.clock() - this.startedAt
		const percent = this.total === 0 ? 100 : Math.round((this.processed / this.total) * 100)

		let etaMs: number | undefined
		if (!isFirstReport && elapsedMs > 0 && this.processed > 0) {
			const perSource = elapsedMs / this.processed
			etaMs = Math.round(perSource * (this.total - this.processed))
		}

		return {
			processedSources: this.processed,
			totalSources: this.total,
			percent,
			elapsedMs,
			etaMs,
		}
	}
}
