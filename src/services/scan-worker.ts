// scan-worker.ts
// Worker thread entry: scans one chunk and posts its partial top-K back

import { parentPort, workerData } from 'worker_threads'
import { errorMessage } from '../errors'
import { scanRoutes } from './route-scanner'
import { ScanWorkerInputSchema, type ScanWorkerMessage } from './scan-worker-protocol'

function run(): void {
	const port = parentPort
	if (!port) {
		throw new Error('scan-worker must be started as a worker thread')
	}

	const post = (message: ScanWorkerMessage): void => port.postMessage(message)

	const parsed = ScanWorkerInputSchema.safeParse(workerData)
	if (!parsed.success) {
		post({ type: 'error', message: `invalid worker input: ${parsed.error.issues[0].message}` })
		return
	}

	const input = parsed.data
	try {
		const routes = scanRoutes(input.sources, input.destinations, {
			topK: input.topK,
			emitNoTrade: input.emitNoTrade,
			onProgress: (progress) => {
				const done = progress.processedSources === progress.totalSources
				if (progress.processedSources % input.progressInterval === 0 || done) {
					post({ type: 'progress', processedSources: progress.processedSources })
				}
			},
		})
		post({ type: 'result', routes })
	} catch (error) {
		post({ type: 'error', message: errorMessage(error) })
	}
}

run()
