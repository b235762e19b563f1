// chunk-runners.ts
// Executes one planned chunk of a parallel scan and resolves with its partial top-K

import { Worker } from 'worker_threads'
import * as fs from 'fs'
import * as path from 'path'
import type { RouteCandidate } from '../types'
import { WorkerFailureError, errorMessage } from '../errors'
import type { ChunkTask } from '../utils/partition'
import { scanRoutes } from './route-scanner'
import { ScanWorkerMessageSchema, type ScanWorkerInput } from './scan-worker-protocol'

// ============================================================================
// TYPES
// ============================================================================

export interface ChunkRunOptions {
	topK: number
	emitNoTrade: boolean
	/** Receives the number of sources finished since the previous call */
	onSourcesProcessed?: (count: number) => void
	timeoutMs?: number | null
	signal?: AbortSignal
}

export interface ChunkRunner {
	run(task: ChunkTask, options: ChunkRunOptions): Promise<RouteCandidate[]>
}

// Progress messages per worker over a full chunk
const PROGRESS_MESSAGES_PER_CHUNK = 100

// ============================================================================
// WORKER THREADS
// ============================================================================

/**
 * Spawn the scan worker. Built output runs the compiled script; from sources
 * the TypeScript entry is loaded through tsx.
 */
function spawnScanWorker(input: ScanWorkerInput): Worker {
	const compiled = path.join(__dirname, 'scan-worker.js')
	if (fs.existsSync(compiled)) {
		return new Worker(compiled, { workerData: input })
	}

	const source = path.join(__dirname, 'scan-worker.ts')
	const bootstrap = `require('tsx/cjs');\nrequire(${JSON.stringify(source)});`
	return new Worker(bootstrap, { eval: true, workerData: input })
}

/**
 * One worker thread per chunk. The chunk is structured-cloned into the worker;
 * nothing is shared. Any failure rejects with WorkerFailureError after the
 * worker has been terminated.
 */
export class WorkerThreadChunkRunner implements ChunkRunner {
	run(task: ChunkTask, options: ChunkRunOptions): Promise<RouteCandidate[]> {
		const input: ScanWorkerInput = {
			chunkIndex: task.index,
			sources: task.sources,
			destinations: task.destinations,
			topK: options.topK,
			emitNoTrade: options.emitNoTrade,
			progressInterval: Math.max(1, Math.floor(task.sources.length / PROGRESS_MESSAGES_PER_CHUNK)),
		}

		return new Promise<RouteCandidate[]>((resolve, reject) => {
			if (options.signal?.aborted) {
				reject(new WorkerFailureError(task.index, 'cancelled before start'))
				return
			}

			const worker = spawnScanWorker(input)
			let settled = false
			let reported = 0
			let timer: NodeJS.Timeout | null = null

			const cleanup = (): void => {
				settled = true
				if (timer) clearTimeout(timer)
				options.signal?.removeEventListener('abort', onAbort)
			}

			const succeed = (routes: RouteCandidate[]): void => {
				if (settled) return
				cleanup()
				resolve(routes)
			}

			const fail = (error: WorkerFailureError): void => {
				if (settled) return
				cleanup()
				worker.terminate().then(
					() => reject(error),
					(terminateError: unknown) =>
						reject(
							new WorkerFailureError(task.index, `${error.message}; terminate failed: ${errorMessage(terminateError)}`, {
								cause: error,
							}),
						),
				)
			}

			function onAbort(): void {
				fail(new WorkerFailureError(task.index, 'cancelled'))
			}

			options.signal?.addEventListener('abort', onAbort)

			if (options.timeoutMs) {
				const timeoutMs = options.timeoutMs
				timer = setTimeout(() => fail(new WorkerFailureError(task.index, `timed out after ${timeoutMs} ms`)), timeoutMs)
			}

			worker.on('message', (raw: unknown) => {
				const parsed = ScanWorkerMessageSchema.safeParse(raw)
				if (!parsed.success) {
					fail(new WorkerFailureError(task.index, 'malformed message from worker'))
					return
				}

				const message = parsed.data
				switch (message.type) {
					case 'progress': {
						const delta = message.processedSources - reported
						reported = message.processedSources
						if (delta > 0) options.onSourcesProcessed?.(delta)
						break
					}
					case 'result': {
						const remaining = task.sources.length - reported
						reported = task.sources.length
						if (remaining > 0) options.onSourcesProcessed?.(remaining)
						succeed(message.routes)
						break
					}
					case 'error':
						fail(new WorkerFailureError(task.index, message.message))
						break
				}
			})

			worker.on('error', (error: Error) => {
				fail(new WorkerFailureError(task.index, error.message, { cause: error }))
			})

			worker.on('exit', (code: number) => {
				fail(new WorkerFailureError(task.index, `exited with code ${code} before returning a result`))
			})
		})
	}
}

// ============================================================================
// IN-PROCESS
// ============================================================================

/**
 * Runs chunks on the calling thread, one event-loop turn after dispatch.
 * Same contract as the worker runner without thread startup cost.
 */
export class InlineChunkRunner implements ChunkRunner {
	async run(task: ChunkTask, options: ChunkRunOptions): Promise<RouteCandidate[]> {
		await new Promise<void>((resolve) => setImmediate(resolve))

		if (options.signal?.aborted) {
			throw new WorkerFailureError(task.index, 'cancelled')
		}

		const report = options.onSourcesProcessed
		let reported = 0
		let routes: RouteCandidate[]
		try {
			routes = scanRoutes(task.sources, task.destinations, {
				topK: options.topK,
				emitNoTrade: options.emitNoTrade,
				onProgress: report
					? () => {
							reported++
							report(1)
						}
					: undefined,
			})
		} catch (error) {
			throw new WorkerFailureError(task.index, errorMessage(error), { cause: error })
		}

		// Sources skipped by an early return (empty destination slice) still count as done
		const remaining = task.sources.length - reported
		if (report && remaining > 0) report(remaining)
		return routes
	}
}
