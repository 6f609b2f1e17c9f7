import { formatSeconds } from '../utils'
import type { TimeRange } from './types'

// Setup failures abort the run before anything is clipped.
export class FatalSetupError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'FatalSetupError'
	}
}

export class ConfigurationError extends FatalSetupError {
	constructor(
		public readonly option: string,
		message: string,
	) {
		super(`Invalid ${option}: ${message}`)
		this.name = 'ConfigurationError'
	}
}

export class TranscriptionError extends FatalSetupError {
	constructor(
		message: string,
		public readonly inputPath: string,
	) {
		super(message)
		this.name = 'TranscriptionError'
	}
}

// Recorded per clip; never thrown past the scheduler.
export class EncodeTaskError extends Error {
	constructor(
		public readonly taskIndex: number,
		public readonly interval: TimeRange,
		public readonly exitCode: number | null,
		public readonly diagnostic: string,
	) {
		super(
			`Clip ${taskIndex} (${formatSeconds(interval.start)} -> ${formatSeconds(
				interval.end,
			)}) failed${exitCode === null ? '' : ` with exit code ${exitCode}`}${
				diagnostic ? `: ${diagnostic}` : ''
			}`,
		)
		this.name = 'EncodeTaskError'
	}
}
