import { mkdir, stat } from 'node:fs/promises'
import { formatSeconds } from './utils'
import { transcribeAudio } from './whispercpp-transcribe'
import type { HighlightConfig } from './highlights/config'
import { buildClipTasks, runClipTasks } from './highlights/clip-scheduler'
import { createFfmpegEncoder } from './highlights/encoder'
import { FatalSetupError, TranscriptionError } from './highlights/errors'
import {
	ensureFfmpegAvailable,
	extractTranscriptionAudio,
	probeMediaDuration,
} from './highlights/ffmpeg'
import { logCommand, logInfo, logWarn } from './highlights/logging'
import {
	buildIntermediateDir,
	buildTranscriptionAudioPath,
	buildTranscriptionOutputBase,
} from './highlights/paths'
import { createRunSummary, writeSummaryLog } from './highlights/summary'
import type { RunSummary } from './highlights/summary'
import { cleanupIntermediates } from './highlights/utils/file-utils'
import { matchKeywords } from './highlights/utils/keywords'
import { buildMomentIntervals } from './highlights/utils/moments'
import { writeTranscriptFile } from './highlights/utils/transcript'
import type {
	ClipResult,
	EncoderAdapter,
	StepProgressReporter,
	Token,
} from './highlights/types'

export type TranscribeRequest = {
	config: HighlightConfig
	audioPath: string
	outputBasePath: string
}

export type HighlightDependencies = {
	ensureTools: () => Promise<void>
	probeDuration: (inputPath: string) => Promise<number>
	transcribe: (request: TranscribeRequest) => Promise<Token[]>
	createEncoder: (config: HighlightConfig) => EncoderAdapter
	progress?: StepProgressReporter
	now: () => number
}

export async function transcribeWithWhisper(
	request: TranscribeRequest,
): Promise<Token[]> {
	const { config } = request
	await extractTranscriptionAudio({
		inputPath: config.inputPath,
		outputPath: request.audioPath,
	})
	const result = await transcribeAudio(request.audioPath, {
		modelSize: config.modelSize,
		computeType: config.computeType,
		device: config.device,
		modelPath: config.modelPath,
		language: config.language,
		threads: config.threads,
		binaryPath: config.whisperBinaryPath,
		outputBasePath: request.outputBasePath,
		granularity: config.granularity,
		logCommand,
	})
	return result.tokens
}

export function createFfmpegEncoderForConfig(config: HighlightConfig) {
	return createFfmpegEncoder({
		videoCodec: config.videoCodec,
		frameRate: config.frameRate,
		preset: config.encoderPreset,
		quality: config.encoderQuality,
		audioCodec: config.audioCodec,
		audioBitrate: config.audioBitrate,
		timeoutSeconds: config.encodeTimeoutSeconds,
	})
}

const DEFAULT_DEPENDENCIES: HighlightDependencies = {
	ensureTools: ensureFfmpegAvailable,
	probeDuration: probeMediaDuration,
	transcribe: transcribeWithWhisper,
	createEncoder: createFfmpegEncoderForConfig,
	now: Date.now,
}

function describeError(error: unknown) {
	return error instanceof Error ? error.message : String(error)
}

async function ensureInputFile(inputPath: string) {
	const stats = await stat(inputPath).catch(() => null)
	if (!stats?.isFile()) {
		throw new FatalSetupError(`Input file not found: ${inputPath}`)
	}
}

async function ensureTools(deps: HighlightDependencies) {
	try {
		await deps.ensureTools()
	} catch (error) {
		if (error instanceof FatalSetupError) {
			throw error
		}
		throw new FatalSetupError(describeError(error))
	}
}

async function probeDuration(
	inputPath: string,
	deps: HighlightDependencies,
): Promise<number | undefined> {
	try {
		const duration = await deps.probeDuration(inputPath)
		if (Number.isFinite(duration) && duration > 0) {
			return duration
		}
		logWarn(
			`ffprobe reported no usable duration for ${inputPath}; clip ends will not be clamped.`,
		)
	} catch (error) {
		logWarn(
			`Could not read the duration of ${inputPath}; clip ends will not be clamped. ${describeError(error)}`,
		)
	}
	return undefined
}

export function buildTranscriptionPaths(config: HighlightConfig) {
	const tmpDir = buildIntermediateDir(config.outputDir)
	const audioPath = buildTranscriptionAudioPath(tmpDir, config.inputPath)
	const outputBasePath = buildTranscriptionOutputBase(tmpDir, config.inputPath)
	return {
		tmpDir,
		audioPath,
		outputBasePath,
		intermediatePaths: [audioPath, `${outputBasePath}.json`],
	}
}

/**
 * Transcribe the source and write the transcript file. Any failure along the
 * way is reported as a TranscriptionError.
 */
export async function runTranscription(
	config: HighlightConfig,
	overrides: Partial<HighlightDependencies> = {},
): Promise<Token[]> {
	const deps = { ...DEFAULT_DEPENDENCIES, ...overrides }
	const { tmpDir, audioPath, outputBasePath } = buildTranscriptionPaths(config)

	let tokens: Token[]
	try {
		await mkdir(tmpDir, { recursive: true })
		tokens = await deps.transcribe({ config, audioPath, outputBasePath })
	} catch (error) {
		if (error instanceof TranscriptionError) {
			throw error
		}
		throw new TranscriptionError(
			`Transcription failed for ${config.inputPath}: ${describeError(error)}`,
			config.inputPath,
		)
	}
	await writeTranscriptFile(config.transcriptPath, tokens)
	logInfo(
		`Transcript written to ${config.transcriptPath} (${tokens.length} tokens).`,
	)
	return tokens
}

/**
 * Run the whole extraction: transcribe, find keyword hits, merge them into
 * moments and encode one clip per moment. Clip failures are reported in the
 * returned summary; setup failures throw.
 */
export async function runHighlightClips(
	config: HighlightConfig,
	overrides: Partial<HighlightDependencies> = {},
): Promise<RunSummary> {
	const deps = { ...DEFAULT_DEPENDENCIES, ...overrides }
	const runStartedAt = deps.now()

	await ensureInputFile(config.inputPath)
	await ensureTools(deps)

	logInfo(`Input: ${config.inputPath}`)
	logInfo(`Keywords: ${config.keywords.join(', ') || 'none'}`)
	if (config.dryRun) {
		logInfo('Dry run enabled; no clips will be written.')
	} else if (config.keepIntermediates) {
		logInfo('Keeping intermediate files for debugging.')
	}

	const totalDuration = await probeDuration(config.inputPath, deps)
	if (totalDuration !== undefined) {
		logInfo(`Source duration: ${formatSeconds(totalDuration)}`)
	}

	const { tmpDir, intermediatePaths } = buildTranscriptionPaths(config)
	try {
		const transcriptionStartedAt = deps.now()
		const tokens = await runTranscription(config, deps)
		const transcriptionMs = deps.now() - transcriptionStartedAt

		const hits = matchKeywords(tokens, config.keywords, {
			policy: config.keywordPolicy,
		})
		logInfo(`Keyword hits: ${hits.length}`)
		const intervals = buildMomentIntervals(
			hits.map((hit) => hit.timestamp),
			{
				bufferBefore: config.bufferBeforeSeconds,
				bufferAfter: config.bufferAfterSeconds,
				mergeThreshold: config.mergeThresholdSeconds,
				minDuration: config.minDurationSeconds,
				totalDuration,
			},
		)
		const { tasks, skipped } = buildClipTasks(intervals, {
			sourcePath: config.inputPath,
			outputDir: config.outputDir,
			container: config.container,
		})
		for (const task of tasks) {
			logInfo(
				`- [${task.index}] ${formatSeconds(task.interval.start)} -> ${formatSeconds(
					task.interval.end,
				)}`,
			)
		}

		let results: ClipResult[] = []
		const exportStartedAt = deps.now()
		if (config.dryRun) {
			logInfo(`[dry-run] Would export ${tasks.length} clip(s).`)
		} else if (tasks.length === 0) {
			logInfo('No moments found; nothing to export.')
		} else {
			await mkdir(config.outputDir, { recursive: true })
			const { progress } = deps
			progress?.start({ stepCount: tasks.length, label: 'Encoding clips' })
			results = await runClipTasks(tasks, deps.createEncoder(config), {
				maxWorkers: config.maxWorkers,
				now: deps.now,
				onTaskStateChange: ({ task, state, outcome }) => {
					if (state === 'running') {
						progress?.setLabel(`Clip ${task.index} of ${tasks.length}`)
					} else if (outcome?.status === 'failed') {
						logWarn(outcome.error.message)
						progress?.step(`Clip ${task.index} failed`)
					} else if (state === 'succeeded') {
						progress?.step(`Clip ${task.index} done`)
					}
				},
			})
			progress?.finish('Encoding complete')
		}
		const exportMs = deps.now() - exportStartedAt

		const summary = createRunSummary({
			inputPath: config.inputPath,
			outputDir: config.outputDir,
			dryRun: config.dryRun,
			tokenCount: tokens.length,
			hits,
			intervals,
			results,
			skipped,
			timings: {
				transcriptionMs,
				exportMs,
				totalMs: deps.now() - runStartedAt,
			},
		})
		await writeSummaryLog(summary)
		return summary
	} finally {
		if (!config.keepIntermediates) {
			await cleanupIntermediates(intermediatePaths, tmpDir)
		}
	}
}
