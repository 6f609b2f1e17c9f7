import type { EncodeTaskError } from './errors'

export type TimeRange = {
	start: number
	end: number
}

export type Token = {
	text: string
	start: number
	end: number
}

export type KeywordHit = {
	timestamp: number
	matchedText: string
	keyword: string
}

export type KeywordPolicy = 'contains' | 'contained' | 'either'

export type TokenGranularity = 'segment' | 'word'

export type WhisperDevice = 'cuda' | 'cpu' | 'auto'

export type WhisperComputeType = 'float16' | 'int8' | 'int5'

export type ClipTask = {
	// 1-based position in the final interval order
	index: number
	interval: TimeRange
	sourcePath: string
	outputPath: string
}

export type ClipTaskState = 'pending' | 'running' | 'succeeded' | 'failed'

export type ClipOutcome =
	| { status: 'succeeded'; elapsedMs: number }
	| { status: 'failed'; error: EncodeTaskError; elapsedMs: number }

export type ClipResult = {
	task: ClipTask
	outcome: ClipOutcome
}

export type DegenerateInterval = {
	interval: TimeRange
	// 1-based position in the merger output
	position: number
}

export interface EncoderAdapter {
	run(task: ClipTask): Promise<ClipOutcome>
}

export type PhaseTimings = {
	transcriptionMs: number
	exportMs: number
	totalMs: number
}

// Drives the spinner text while clips encode.
export type StepProgressReporter = {
	start: (options: { stepCount: number; label?: string }) => void
	step: (label: string) => void
	setLabel: (label: string) => void
	finish: (label?: string) => void
}
