import path from 'node:path'
import { ConfigurationError } from './errors'
import { normalizeKeywords } from './utils/keywords'
import type {
	KeywordPolicy,
	TokenGranularity,
	WhisperComputeType,
	WhisperDevice,
} from './types'

export const KEYWORD_POLICIES: readonly KeywordPolicy[] = [
	'contains',
	'contained',
	'either',
]
export const TOKEN_GRANULARITIES: readonly TokenGranularity[] = [
	'segment',
	'word',
]
export const WHISPER_DEVICES: readonly WhisperDevice[] = ['cuda', 'cpu', 'auto']
export const WHISPER_COMPUTE_TYPES: readonly WhisperComputeType[] = [
	'float16',
	'int8',
	'int5',
]

export const TRANSCRIPTION_SAMPLE_RATE = 16000
export const TRANSCRIPT_FILENAME = 'transcript.txt'

export type HighlightConfig = {
	readonly inputPath: string
	readonly outputDir: string
	readonly transcriptPath: string
	// Clip container extension including the dot, e.g. ".mkv"
	readonly container: string
	readonly keywords: readonly string[]
	readonly keywordPolicy: KeywordPolicy
	readonly bufferBeforeSeconds: number
	readonly bufferAfterSeconds: number
	readonly minDurationSeconds: number
	readonly mergeThresholdSeconds: number
	readonly maxWorkers: number
	readonly modelSize: string
	readonly modelPath: string | undefined
	readonly device: WhisperDevice
	readonly computeType: WhisperComputeType
	readonly language: string
	readonly threads: number | undefined
	readonly whisperBinaryPath: string | undefined
	readonly granularity: TokenGranularity
	readonly videoCodec: string
	readonly frameRate: number
	readonly encoderPreset: string | undefined
	readonly encoderQuality: number | undefined
	readonly audioCodec: string
	readonly audioBitrate: string
	readonly encodeTimeoutSeconds: number | undefined
	readonly dryRun: boolean
	readonly keepIntermediates: boolean
}

type ChoiceOption = 'keywordPolicy' | 'device' | 'computeType' | 'granularity'

// Choice options arrive as raw strings from the CLI and are checked here.
export type HighlightConfigInput = Partial<
	Omit<HighlightConfig, 'inputPath' | 'keywords' | ChoiceOption>
> &
	Partial<Record<ChoiceOption, string>> & {
		inputPath: string
		keywords?: unknown
	}

export const DEFAULT_HIGHLIGHT_CONFIG = {
	outputDir: 'clips',
	keywords: ['lol', 'laugh', 'hahaha', 'screamed', 'aduh'],
	keywordPolicy: 'contains',
	bufferBeforeSeconds: 1.5,
	bufferAfterSeconds: 3,
	minDurationSeconds: 60,
	mergeThresholdSeconds: 10,
	maxWorkers: 6,
	modelSize: 'medium',
	device: 'cuda',
	computeType: 'float16',
	language: 'auto',
	granularity: 'segment',
	videoCodec: 'h264_nvenc',
	frameRate: 60,
	encoderPreset: 'p4',
	encoderQuality: 21,
	audioCodec: 'aac',
	audioBitrate: '192k',
	dryRun: false,
	keepIntermediates: false,
} as const

/**
 * Merge overrides onto the defaults and validate every option. The returned
 * config is frozen and shared by every stage of a run.
 */
export function createHighlightConfig(
	input: HighlightConfigInput,
): HighlightConfig {
	const inputPath = requireText('inputPath', input.inputPath)
	const outputDir = requireText(
		'outputDir',
		input.outputDir ?? DEFAULT_HIGHLIGHT_CONFIG.outputDir,
	)
	const keywords =
		input.keywords === undefined
			? [...DEFAULT_HIGHLIGHT_CONFIG.keywords]
			: normalizeKeywords(input.keywords)

	const config: HighlightConfig = {
		inputPath,
		outputDir,
		transcriptPath:
			input.transcriptPath ?? path.join(outputDir, TRANSCRIPT_FILENAME),
		container: resolveContainer(input.container ?? path.extname(inputPath)),
		keywords,
		keywordPolicy: requireOneOf(
			'keywordPolicy',
			input.keywordPolicy ?? DEFAULT_HIGHLIGHT_CONFIG.keywordPolicy,
			KEYWORD_POLICIES,
		),
		bufferBeforeSeconds: requireNonNegative(
			'bufferBeforeSeconds',
			input.bufferBeforeSeconds ?? DEFAULT_HIGHLIGHT_CONFIG.bufferBeforeSeconds,
		),
		bufferAfterSeconds: requireNonNegative(
			'bufferAfterSeconds',
			input.bufferAfterSeconds ?? DEFAULT_HIGHLIGHT_CONFIG.bufferAfterSeconds,
		),
		minDurationSeconds: requireNonNegative(
			'minDurationSeconds',
			input.minDurationSeconds ?? DEFAULT_HIGHLIGHT_CONFIG.minDurationSeconds,
		),
		mergeThresholdSeconds: requireNonNegative(
			'mergeThresholdSeconds',
			input.mergeThresholdSeconds ??
				DEFAULT_HIGHLIGHT_CONFIG.mergeThresholdSeconds,
		),
		maxWorkers: requireWorkerCount(
			input.maxWorkers ?? DEFAULT_HIGHLIGHT_CONFIG.maxWorkers,
		),
		modelSize: requireText(
			'modelSize',
			input.modelSize ?? DEFAULT_HIGHLIGHT_CONFIG.modelSize,
		),
		modelPath: optionalText(input.modelPath),
		device: requireOneOf(
			'device',
			input.device ?? DEFAULT_HIGHLIGHT_CONFIG.device,
			WHISPER_DEVICES,
		),
		computeType: requireOneOf(
			'computeType',
			input.computeType ?? DEFAULT_HIGHLIGHT_CONFIG.computeType,
			WHISPER_COMPUTE_TYPES,
		),
		language: requireText(
			'language',
			input.language ?? DEFAULT_HIGHLIGHT_CONFIG.language,
		),
		threads:
			input.threads === undefined
				? undefined
				: requireWorkerCount(input.threads, 'threads'),
		whisperBinaryPath: optionalText(input.whisperBinaryPath),
		granularity: requireOneOf(
			'granularity',
			input.granularity ?? DEFAULT_HIGHLIGHT_CONFIG.granularity,
			TOKEN_GRANULARITIES,
		),
		videoCodec: requireText(
			'videoCodec',
			input.videoCodec ?? DEFAULT_HIGHLIGHT_CONFIG.videoCodec,
		),
		frameRate: requirePositive(
			'frameRate',
			input.frameRate ?? DEFAULT_HIGHLIGHT_CONFIG.frameRate,
		),
		encoderPreset:
			'encoderPreset' in input
				? optionalText(input.encoderPreset)
				: DEFAULT_HIGHLIGHT_CONFIG.encoderPreset,
		encoderQuality:
			'encoderQuality' in input
				? input.encoderQuality === undefined
					? undefined
					: requireNonNegative('encoderQuality', input.encoderQuality)
				: DEFAULT_HIGHLIGHT_CONFIG.encoderQuality,
		audioCodec: requireText(
			'audioCodec',
			input.audioCodec ?? DEFAULT_HIGHLIGHT_CONFIG.audioCodec,
		),
		audioBitrate: requireText(
			'audioBitrate',
			input.audioBitrate ?? DEFAULT_HIGHLIGHT_CONFIG.audioBitrate,
		),
		encodeTimeoutSeconds:
			input.encodeTimeoutSeconds === undefined
				? undefined
				: requirePositive('encodeTimeoutSeconds', input.encodeTimeoutSeconds),
		dryRun: input.dryRun ?? DEFAULT_HIGHLIGHT_CONFIG.dryRun,
		keepIntermediates:
			input.keepIntermediates ?? DEFAULT_HIGHLIGHT_CONFIG.keepIntermediates,
	}
	return Object.freeze(config)
}

export function requireWorkerCount(value: number, option = 'maxWorkers') {
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigurationError(
			option,
			`expected a positive integer, got ${value}`,
		)
	}
	return value
}

function requireNonNegative(option: string, value: number) {
	if (!Number.isFinite(value) || value < 0) {
		throw new ConfigurationError(
			option,
			`expected a non-negative number, got ${value}`,
		)
	}
	return value
}

function requirePositive(option: string, value: number) {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(
			option,
			`expected a positive number, got ${value}`,
		)
	}
	return value
}

function requireText(option: string, value: string) {
	const trimmed = value.trim()
	if (!trimmed) {
		throw new ConfigurationError(option, 'must not be empty')
	}
	return trimmed
}

function optionalText(value: string | undefined) {
	const trimmed = value?.trim()
	return trimmed ? trimmed : undefined
}

function requireOneOf<T extends string>(
	option: string,
	value: string,
	allowed: readonly T[],
): T {
	const match = allowed.find((candidate) => candidate === value)
	if (!match) {
		throw new ConfigurationError(
			option,
			`expected one of ${allowed.join(', ')}, got "${value}"`,
		)
	}
	return match
}

function resolveContainer(value: string) {
	const trimmed = value.trim().toLowerCase()
	if (!trimmed) {
		return '.mkv'
	}
	return trimmed.startsWith('.') ? trimmed : `.${trimmed}`
}
