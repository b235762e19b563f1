// parallel-route-scanner.ts
// Splits a route scan across worker threads and merges the partial top-K lists

import type { PartitionMode, ProgressCallback, RouteCandidate, Station } from '../types'
import { DEFAULT_PARALLEL_THRESHOLD, DEFAULT_TOP_K } from '../constants/defaults'
import { planChunks } from '../utils/partition'
import { ProgressTracker } from '../utils/progress'
import { mergeRoutes } from '../utils/top-k-routes'
import { WorkerThreadChunkRunner, type ChunkRunner } from './chunk-runners'
import { scanRoutes, type ScanOptions } from './route-scanner'

// ============================================================================
// TYPES
// ============================================================================

export interface ParallelScanOptions extends ScanOptions {
	workerCount: number
	partitioning?: PartitionMode
	/** Per-worker limit; a worker exceeding it fails the scan */
	taskTimeoutMs?: number | null
	runner?: ChunkRunner
}

export interface RouteQueryConfig extends ParallelScanOptions {
	autoParallelThreshold?: number
}

export type ScanPath = 'sequential' | 'parallel'

// ============================================================================
// PARALLEL SCAN
// ============================================================================

/**
 * Scan with `workerCount` partitions: all but the last go to the runner
 * (worker threads by default), the last is scanned on the calling thread.
 *
 * With the default `cross` partitioning the result equals `scanRoutes` on the
 * same input. With `paired` partitioning, source chunk i is only evaluated
 * against destination chunk i and the result may miss the true optimum.
 *
 * Rejects with WorkerFailureError if any partition fails; the other workers
 * are cancelled.
 */
export async function parallelScan(
	sources: readonly Station[],
	destinations: readonly Station[],
	options: ParallelScanOptions,
): Promise<RouteCandidate[]> {
	const topK = options.topK ?? DEFAULT_TOP_K
	const emitNoTrade = options.emitNoTrade ?? false
	if (sources.length === 0 || destinations.length === 0 || topK <= 0) {
		return []
	}

	const tasks = planChunks(sources, destinations, options.workerCount, options.partitioning ?? 'cross')
	const runner = options.runner ?? new WorkerThreadChunkRunner()
	const controller = new AbortController()

	const onProgress: ProgressCallback | undefined = options.onProgress
	const tracker = onProgress ? new ProgressTracker(sources.length, options.clock) : null
	const reportProcessed = (count: number): void => {
		if (tracker && onProgress && count > 0) onProgress(tracker.advance(count))
	}

	const inlineTask = tasks[tasks.length - 1]
	const dispatched = tasks.slice(0, -1).map((task) =>
		runner.run(task, {
			topK,
			emitNoTrade,
			timeoutMs: options.taskTimeoutMs,
			signal: controller.signal,
			onSourcesProcessed: reportProcessed,
		}),
	)

	let inlineRoutes: RouteCandidate[]
	let inlineReported = 0
	try {
		inlineRoutes = scanRoutes(inlineTask.sources, inlineTask.destinations, {
			topK,
			emitNoTrade,
			onProgress: tracker
				? () => {
						inlineReported++
						reportProcessed(1)
					}
				: undefined,
		})
	} catch (error) {
		controller.abort()
		await Promise.allSettled(dispatched)
		throw error
	}
	reportProcessed(inlineTask.sources.length - inlineReported)

	let partials: RouteCandidate[][]
	try {
		partials = await Promise.all(dispatched)
	} catch (error) {
		controller.abort()
		await Promise.allSettled(dispatched)
		throw error
	}

	return mergeRoutes([...partials, inlineRoutes], topK)
}

// ============================================================================
// AUTO SELECTION
// ============================================================================

export function chooseScanPath(
	sourceCount: number,
	destinationCount: number,
	workerCount: number,
	autoParallelThreshold: number = DEFAULT_PARALLEL_THRESHOLD,
): ScanPath {
	const pairCount = sourceCount * destinationCount
	return workerCount > 1 && sourceCount > 1 && pairCount > autoParallelThreshold ? 'parallel' : 'sequential'
}

/**
 * Top-K routes, in parallel when the pair count exceeds the threshold and
 * more than one worker is configured, otherwise on the calling thread.
 */
export async function findRoutes(
	sources: readonly Station[],
	destinations: readonly Station[],
	config: RouteQueryConfig,
): Promise<RouteCandidate[]> {
	const path = chooseScanPath(sources.length, destinations.length, config.workerCount, config.autoParallelThreshold)
	if (path === 'parallel') {
		return parallelScan(sources, destinations, config)
	}
	return scanRoutes(sources, destinations, config)
}
