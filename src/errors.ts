export type ErrorCode = 'WORKER_FAILURE' | 'DATASET' | 'CONFIG' | 'LOOKUP' | 'DOWNLOAD'

export class TradelaneError extends Error {
	readonly code: ErrorCode

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'TradelaneError'
		this.code = code
	}
}

/**
 * A parallel scan partition did not produce a result. Fatal to the whole scan.
 */
export class WorkerFailureError extends TradelaneError {
	readonly chunkIndex: number

	constructor(chunkIndex: number, message: string, options?: { cause?: unknown }) {
		super('WORKER_FAILURE', `Scan worker ${chunkIndex} failed: ${message}`, options)
		this.name = 'WorkerFailureError'
		this.chunkIndex = chunkIndex
	}
}

export class DatasetError extends TradelaneError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('DATASET', message, options)
		this.name = 'DatasetError'
	}
}

export class ConfigError extends TradelaneError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('CONFIG', message, options)
		this.name = 'ConfigError'
	}
}

export class LookupError extends TradelaneError {
	constructor(message: string) {
		super('LOOKUP', message)
		this.name = 'LookupError'
	}
}

export class DownloadError extends TradelaneError {
	readonly statusCode: number | undefined

	constructor(message: string, statusCode?: number) {
		super('DOWNLOAD', message)
		this.name = 'DownloadError'
		this.statusCode = statusCode
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
