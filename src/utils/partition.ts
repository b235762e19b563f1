// partition.ts
// Position-based chunking of station lists for parallel scans

import type { PartitionMode, Station } from '../types'

export interface ChunkTask {
	index: number
	sources: Station[]
	destinations: Station[]
}

/**
 * Split `items` into exactly `count` contiguous chunks of `floor(n / count)`
 * items; the last chunk absorbs the remainder. Chunks may be empty when
 * `count > n`.
 */
export function splitIntoChunks<T>(items: readonly T[], count: number): T[][] {
	const chunkCount = Math.max(1, Math.floor(count))
	const size = Math.floor(items.length / chunkCount)
	const chunks: T[][] = []

	for (let i = 0; i < chunkCount; i++) {
		const start = i * size
		const end = i === chunkCount - 1 ? items.length : start + size
		chunks.push(items.slice(start, end))
	}

	return chunks
}

/**
 * Plan one task per worker.
 *
 * - `cross`: each source chunk is scanned against every destination.
 * - `paired`: destinations are chunked by the same rule and source chunk i only
 *   meets destination chunk i, so pairs across chunks are never evaluated.
 *
 * The worker count is capped at the number of sources so no task is empty. In
 * `paired` mode the cap also sets the destination chunk count, so with more
 * workers than sources the destinations are split into |sources| chunks.
 */
export function planChunks(
	sources: readonly Station[],
	destinations: readonly Station[],
	workerCount: number,
	mode: PartitionMode,
): ChunkTask[] {
	const count = Math.max(1, Math.min(Math.floor(workerCount), sources.length))
	const sourceChunks = splitIntoChunks(sources, count)
	const destinationChunks = mode === 'paired' ? splitIntoChunks(destinations, count) : null

	return sourceChunks.map((chunk, index) => ({
		index,
		sources: chunk,
		destinations: destinationChunks ? destinationChunks[index] : [...destinations],
	}))
}
