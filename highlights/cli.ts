import type { Argv, Arguments } from 'yargs'
import {
	DEFAULT_HIGHLIGHT_CONFIG,
	KEYWORD_POLICIES,
	TOKEN_GRANULARITIES,
	WHISPER_COMPUTE_TYPES,
	WHISPER_DEVICES,
} from './config'
import type { HighlightConfigInput } from './config'

export const VIDEO_EXTENSIONS = [
	'.mp4',
	'.mkv',
	'.avi',
	'.mov',
	'.webm',
	'.flv',
	'.m4v',
	'.ts',
]

function configureTranscriptionOptions(command: Argv) {
	return command
		.positional('input', {
			type: 'string',
			describe: 'Input video file',
		})
		.option('output-dir', {
			type: 'string',
			alias: 'o',
			describe: `Directory for clips, transcript and summary (default: ${DEFAULT_HIGHLIGHT_CONFIG.outputDir})`,
		})
		.option('transcript-path', {
			type: 'string',
			describe: 'Where to write the transcript (default: <output-dir>/transcript.txt)',
		})
		.option('model-size', {
			type: 'string',
			describe: `whisper.cpp model size (default: ${DEFAULT_HIGHLIGHT_CONFIG.modelSize})`,
		})
		.option('model-path', {
			type: 'string',
			describe: 'Path to a whisper.cpp model file (overrides --model-size)',
		})
		.option('device', {
			type: 'string',
			choices: WHISPER_DEVICES,
			describe: `Transcription device (default: ${DEFAULT_HIGHLIGHT_CONFIG.device})`,
		})
		.option('compute-type', {
			type: 'string',
			choices: WHISPER_COMPUTE_TYPES,
			describe: `Model precision (default: ${DEFAULT_HIGHLIGHT_CONFIG.computeType})`,
		})
		.option('language', {
			type: 'string',
			describe: `Language passed to whisper.cpp (default: ${DEFAULT_HIGHLIGHT_CONFIG.language})`,
		})
		.option('threads', {
			type: 'number',
			describe: 'Thread count for whisper.cpp',
		})
		.option('whisper-binary-path', {
			type: 'string',
			describe: 'Path to whisper.cpp CLI (whisper-cli)',
		})
		.option('granularity', {
			type: 'string',
			choices: TOKEN_GRANULARITIES,
			describe: `Transcript token granularity (default: ${DEFAULT_HIGHLIGHT_CONFIG.granularity})`,
		})
		.option('keep-intermediates', {
			type: 'boolean',
			alias: 'k',
			describe: 'Keep extracted audio and whisper.cpp JSON for debugging',
			default: false,
		})
}

export function configureTranscribeCommand(command: Argv) {
	return configureTranscriptionOptions(command)
}

export function configureExtractCommand(command: Argv) {
	return configureTranscriptionOptions(command)
		.option('keyword', {
			type: 'string',
			array: true,
			describe: `Keyword to look for (repeatable; default: ${DEFAULT_HIGHLIGHT_CONFIG.keywords.join(', ')})`,
		})
		.option('keyword-policy', {
			type: 'string',
			choices: KEYWORD_POLICIES,
			describe: `How keywords match tokens (default: ${DEFAULT_HIGHLIGHT_CONFIG.keywordPolicy})`,
		})
		.option('buffer-before', {
			type: 'number',
			describe: `Seconds kept before the first hit of a moment (default: ${DEFAULT_HIGHLIGHT_CONFIG.bufferBeforeSeconds})`,
		})
		.option('buffer-after', {
			type: 'number',
			describe: `Seconds kept after the last hit of a moment (default: ${DEFAULT_HIGHLIGHT_CONFIG.bufferAfterSeconds})`,
		})
		.option('min-duration', {
			type: 'number',
			describe: `Minimum clip length in seconds (default: ${DEFAULT_HIGHLIGHT_CONFIG.minDurationSeconds})`,
		})
		.option('merge-threshold', {
			type: 'number',
			describe: `Largest gap in seconds between hits of one moment (default: ${DEFAULT_HIGHLIGHT_CONFIG.mergeThresholdSeconds})`,
		})
		.option('max-workers', {
			type: 'number',
			alias: 'j',
			describe: `Concurrent ffmpeg encodes (default: ${DEFAULT_HIGHLIGHT_CONFIG.maxWorkers})`,
		})
		.option('video-codec', {
			type: 'string',
			describe: `ffmpeg video encoder (default: ${DEFAULT_HIGHLIGHT_CONFIG.videoCodec})`,
		})
		.option('frame-rate', {
			type: 'number',
			describe: `Output frame rate (default: ${DEFAULT_HIGHLIGHT_CONFIG.frameRate})`,
		})
		.option('preset', {
			type: 'string',
			describe: `Encoder preset; pass "" to omit (default: ${DEFAULT_HIGHLIGHT_CONFIG.encoderPreset})`,
		})
		.option('quality', {
			type: 'number',
			describe: `Constant quality target, -cq for NVENC or -crf otherwise (default: ${DEFAULT_HIGHLIGHT_CONFIG.encoderQuality})`,
		})
		.option('audio-codec', {
			type: 'string',
			describe: `ffmpeg audio encoder (default: ${DEFAULT_HIGHLIGHT_CONFIG.audioCodec})`,
		})
		.option('audio-bitrate', {
			type: 'string',
			describe: `Audio bitrate (default: ${DEFAULT_HIGHLIGHT_CONFIG.audioBitrate})`,
		})
		.option('encode-timeout', {
			type: 'number',
			describe: 'Seconds before a single clip encode is killed',
		})
		.option('container', {
			type: 'string',
			describe: 'Clip file extension (default: the input file extension)',
		})
		.option('dry-run', {
			type: 'boolean',
			alias: 'd',
			describe: 'Transcribe and plan clips without running ffmpeg encodes',
			default: false,
		})
}

function readString(argv: Arguments, key: string) {
	const value = argv[key]
	return typeof value === 'string' ? value : undefined
}

function readNumber(argv: Arguments, key: string) {
	const value = argv[key]
	return typeof value === 'number' ? value : undefined
}

function readInput(argv: Arguments) {
	const input = readString(argv, 'input')?.trim()
	if (!input) {
		throw new Error('Input video file is required.')
	}
	return input
}

export function normalizeTranscribeArgs(argv: Arguments): HighlightConfigInput {
	return {
		inputPath: readInput(argv),
		outputDir: readString(argv, 'output-dir'),
		transcriptPath: readString(argv, 'transcript-path'),
		modelSize: readString(argv, 'model-size'),
		modelPath: readString(argv, 'model-path'),
		device: readString(argv, 'device'),
		computeType: readString(argv, 'compute-type'),
		language: readString(argv, 'language'),
		threads: readNumber(argv, 'threads'),
		whisperBinaryPath: readString(argv, 'whisper-binary-path'),
		granularity: readString(argv, 'granularity'),
		keepIntermediates: Boolean(argv['keep-intermediates']),
	}
}

export function normalizeExtractArgs(argv: Arguments): HighlightConfigInput {
	const preset = readString(argv, 'preset')
	const quality = readNumber(argv, 'quality')
	return {
		...normalizeTranscribeArgs(argv),
		keywords: argv.keyword,
		keywordPolicy: readString(argv, 'keyword-policy'),
		bufferBeforeSeconds: readNumber(argv, 'buffer-before'),
		bufferAfterSeconds: readNumber(argv, 'buffer-after'),
		minDurationSeconds: readNumber(argv, 'min-duration'),
		mergeThresholdSeconds: readNumber(argv, 'merge-threshold'),
		maxWorkers: readNumber(argv, 'max-workers'),
		videoCodec: readString(argv, 'video-codec'),
		frameRate: readNumber(argv, 'frame-rate'),
		audioCodec: readString(argv, 'audio-codec'),
		audioBitrate: readString(argv, 'audio-bitrate'),
		encodeTimeoutSeconds: readNumber(argv, 'encode-timeout'),
		container: readString(argv, 'container'),
		dryRun: Boolean(argv['dry-run']),
		// Present keys override the defaults; an empty preset omits the flag.
		...(preset === undefined ? {} : { encoderPreset: preset }),
		...(quality === undefined ? {} : { encoderQuality: quality }),
	}
}
