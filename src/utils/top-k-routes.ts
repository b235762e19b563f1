// top-k-routes.ts
// Bounded ranking of route candidates: keeps the K most profitable, ties in discovery order

import type { RouteCandidate } from '../types'

interface RankedRoute {
	route: RouteCandidate
	seq: number
}

/**
 * Binary min-heap holding the current top K. The root is the weakest kept
 * route (lowest profit, latest discovery among equals), so an offer is O(log K).
 */
export class TopKRoutes {
	private heap: RankedRoute[] = []
	private nextSeq = 0
	readonly capacity: number

	constructor(capacity: number) {
		this.capacity = Math.max(0, Math.floor(capacity))
	}

	/**
	 * Offer a candidate. Returns true if it is kept.
	 */
	offer(route: RouteCandidate): boolean {
		const entry = { route, seq: this.nextSeq++ }

		if (this.heap.length < this.capacity) {
			this.heap.push(entry)
			this.bubbleUp(this.heap.length - 1)
			return true
		}

		// Later discoveries lose ties, so only a strictly higher profit displaces the root
		const weakest = this.heap[0]
		if (weakest === undefined || route.profitPerUnit <= weakest.route.profitPerUnit) {
			return false
		}

		this.heap[0] = entry
		this.bubbleDown(0)
		return true
	}

	size(): number {
		return this.heap.length
	}

	/**
	 * Lowest profit currently kept, or null while the ranking is not full
	 */
	floor(): number | null {
		if (this.heap.length < this.capacity || this.heap.length === 0) return null
		return this.heap[0].route.profitPerUnit
	}

	/**
	 * Kept routes, profit descending, ties in discovery order
	 */
	toArray(): RouteCandidate[] {
		return [...this.heap].sort(compareRanked).map((entry) => entry.route)
	}

	private isWeaker(a: RankedRoute, b: RankedRoute): boolean {
		if (a.route.profitPerUnit !== b.route.profitPerUnit) {
			return a.route.profitPerUnit < b.route.profitPerUnit
		}
		return a.seq > b.seq
	}

	private bubbleUp(index: number): void {
		while (index > 0) {
			const parentIndex = Math.floor((index - 1) / 2)
			if (!this.isWeaker(this.heap[index], this.heap[parentIndex])) break
			this.swap(index, parentIndex)
			index = parentIndex
		}
	}

	private bubbleDown(index: number): void {
		const length = this.heap.length
		while (true) {
			const left = 2 * index + 1
			const right = left + 1
			let weakest = index

			if (left < length && this.isWeaker(this.heap[left], this.heap[weakest])) weakest = left
			if (right < length && this.isWeaker(this.heap[right], this.heap[weakest])) weakest = right
			if (weakest === index) break

			this.swap(index, weakest)
			index = weakest
		}
	}

	private swap(i: number, j: number): void {
		const temp = this.heap[i]
		this.heap[i] = this.heap[j]
		this.heap[j] = temp
	}
}

function compareRanked(a: RankedRoute, b: RankedRoute): number {
	return b.route.profitPerUnit - a.route.profitPerUnit || a.seq - b.seq
}

/**
 * Merge partial top-K lists. Lists are taken in the order given; within equal
 * profit, earlier lists and earlier positions win.
 */
export function mergeRoutes(lists: readonly (readonly RouteCandidate[])[], k: number): RouteCandidate[] {
	if (k <= 0) return []
	return lists
		.flat()
		.sort((a, b) => b.profitPerUnit - a.profitPerUnit)
		.slice(0, k)
}
