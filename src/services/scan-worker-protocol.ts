// scan-worker-protocol.ts
// Messages exchanged between the scan coordinator and its worker threads

import { z } from 'zod'
import type { Station } from '../types'

const StationPriceSchema = z.object({
	buyPrice: z.number(),
	sellPrice: z.number(),
})

const StationSchema = z.object({
	id: z.number(),
	name: z.string(),
	systemId: z.number(),
	distanceToStar: z.number().nullable(),
	prices: z.map(z.number(), StationPriceSchema),
})

export const ScanWorkerInputSchema = z.object({
	chunkIndex: z.number().int().nonnegative(),
	sources: z.array(StationSchema),
	destinations: z.array(StationSchema),
	topK: z.number().int(),
	emitNoTrade: z.boolean(),
	progressInterval: z.number().int().positive(),
})

export interface ScanWorkerInput {
	chunkIndex: number
	sources: readonly Station[]
	destinations: readonly Station[]
	topK: number
	emitNoTrade: boolean
	progressInterval: number
}

const RouteCandidateSchema = z.object({
	sourceStationId: z.number(),
	destinationStationId: z.number(),
	commodityId: z.number().nullable(),
	profitPerUnit: z.number(),
})

export const ScanWorkerMessageSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('progress'), processedSources: z.number().int().nonnegative() }),
	z.object({ type: z.literal('result'), routes: z.array(RouteCandidateSchema) }),
	z.object({ type: z.literal('error'), message: z.string() }),
])

export type ScanWorkerMessage = z.infer<typeof ScanWorkerMessageSchema>
