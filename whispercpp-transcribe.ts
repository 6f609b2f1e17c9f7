import path from 'node:path'
import { access, mkdir, readFile, writeFile } from 'node:fs/promises'
import { runCommand } from './utils'
import type {
	Token,
	TokenGranularity,
	WhisperComputeType,
	WhisperDevice,
} from './highlights/types'

const MODEL_BASE_URL =
	'https://huggingface.co/ggerganov/whisper.cpp/resolve/main'
const DEFAULT_BINARY = 'whisper-cli'

const COMPUTE_TYPE_SUFFIX: Record<WhisperComputeType, string> = {
	float16: '',
	int8: '-q8_0',
	int5: '-q5_0',
}

export type TranscribeOptions = {
	modelSize: string
	computeType: WhisperComputeType
	device: WhisperDevice
	modelPath?: string
	language?: string
	threads?: number
	binaryPath?: string
	outputBasePath?: string
	granularity?: TokenGranularity
	logCommand?: (command: string[]) => void
}

export type TranscriptionResult = {
	tokens: Token[]
	granularity: TokenGranularity
	jsonPath: string
}

export function getWhisperModelFilename(
	modelSize: string,
	computeType: WhisperComputeType,
) {
	return `ggml-${modelSize.trim()}${COMPUTE_TYPE_SUFFIX[computeType]}.bin`
}

export function getDefaultWhisperModelPath(
	modelSize: string,
	computeType: WhisperComputeType,
) {
	return path.resolve(
		'.cache',
		'whispercpp',
		getWhisperModelFilename(modelSize, computeType),
	)
}

export function buildWhisperArgs(options: {
	binaryPath: string
	modelPath: string
	audioPath: string
	outputBasePath: string
	language: string
	device: WhisperDevice
	threads?: number
}) {
	const args = [
		options.binaryPath,
		'-m',
		options.modelPath,
		'-f',
		options.audioPath,
		'-l',
		options.language,
		'-ojf',
		'-of',
		options.outputBasePath,
	]
	if (options.device === 'cpu') {
		args.push('--no-gpu')
	}
	if (options.threads && Number.isFinite(options.threads)) {
		args.push('-t', String(options.threads))
	}
	return args
}

/**
 * Run whisper.cpp on a 16 kHz mono WAV and read back its full JSON output as
 * ordered tokens.
 */
export async function transcribeAudio(
	audioPath: string,
	options: TranscribeOptions,
): Promise<TranscriptionResult> {
	const resolvedAudioPath = path.resolve(audioPath)
	const defaultModelPath = getDefaultWhisperModelPath(
		options.modelSize,
		options.computeType,
	)
	const resolvedModelPath = path.resolve(options.modelPath ?? defaultModelPath)
	const outputBasePath =
		options.outputBasePath ??
		path.join(
			path.dirname(resolvedAudioPath),
			`${path.parse(resolvedAudioPath).name}-transcript`,
		)
	const granularity = options.granularity ?? 'segment'

	await ensureModelFile(resolvedModelPath, defaultModelPath)

	await runCommand(
		buildWhisperArgs({
			binaryPath: options.binaryPath ?? DEFAULT_BINARY,
			modelPath: resolvedModelPath,
			audioPath: resolvedAudioPath,
			outputBasePath,
			language: (options.language ?? 'auto').trim() || 'auto',
			device: options.device,
			threads: options.threads,
		}),
		{ logCommand: options.logCommand },
	)

	const jsonPath = `${outputBasePath}.json`
	const raw = await readFile(jsonPath, 'utf8')
	let payload: unknown
	try {
		payload = JSON.parse(raw)
	} catch (error) {
		throw new Error(
			`Failed to parse whisper.cpp JSON transcript: ${error instanceof Error ? error.message : String(error)}`,
		)
	}
	return {
		tokens: parseWhisperTokens(payload, granularity),
		granularity,
		jsonPath,
	}
}

async function fileExists(filePath: string) {
	try {
		await access(filePath)
		return true
	} catch {
		return false
	}
}

async function ensureModelFile(modelPath: string, defaultPath: string) {
	if (await fileExists(modelPath)) {
		return
	}
	if (path.resolve(modelPath) !== path.resolve(defaultPath)) {
		throw new Error(`Whisper model not found at ${modelPath}.`)
	}

	await mkdir(path.dirname(modelPath), { recursive: true })
	const url = `${MODEL_BASE_URL}/${path.basename(modelPath)}`
	const response = await fetch(url)
	if (!response.ok) {
		throw new Error(
			`Failed to download whisper.cpp model from ${url} (${response.status} ${response.statusText}).`,
		)
	}
	const bytes = await response.arrayBuffer()
	await writeFile(modelPath, new Uint8Array(bytes))
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

type Offsets = { from: number; to: number }

function readOffsets(value: unknown): Offsets | null {
	if (!isRecord(value) || !isRecord(value.offsets)) {
		return null
	}
	const from = Number(value.offsets.from)
	const to = Number(value.offsets.to)
	if (!Number.isFinite(from) || !Number.isFinite(to) || to < from) {
		return null
	}
	return { from, to }
}

/**
 * Read tokens out of whisper.cpp's `-ojf` JSON. Segment granularity keeps one
 * token per transcription entry so phrases stay intact; word granularity
 * stitches sub-word tokens back into words.
 */
export function parseWhisperTokens(
	payload: unknown,
	granularity: TokenGranularity,
): Token[] {
	if (!isRecord(payload) || !Array.isArray(payload.transcription)) {
		return []
	}
	const tokens =
		granularity === 'word'
			? parseWordTokens(payload.transcription)
			: parseSegmentTokens(payload.transcription)
	return tokens.sort((a, b) => a.start - b.start)
}

function parseSegmentTokens(transcription: unknown[]): Token[] {
	const tokens: Token[] = []
	for (const segment of transcription) {
		const offsets = readOffsets(segment)
		if (!offsets || !isRecord(segment) || typeof segment.text !== 'string') {
			continue
		}
		const text = segment.text.trim()
		if (!text) {
			continue
		}
		tokens.push({ start: offsets.from / 1000, end: offsets.to / 1000, text })
	}
	return tokens
}

function parseWordTokens(transcription: unknown[]): Token[] {
	const rawTokens: unknown[] = transcription.flatMap((segment) =>
		isRecord(segment) && Array.isArray(segment.tokens) ? segment.tokens : [],
	)
	const words: Token[] = []
	let currentWord = ''
	let currentStart: number | null = null
	let currentEnd: number | null = null

	const flush = () => {
		if (currentWord.trim() && currentStart !== null && currentEnd !== null) {
			words.push({ start: currentStart, end: currentEnd, text: currentWord })
		}
		currentWord = ''
		currentStart = null
		currentEnd = null
	}

	for (const token of rawTokens) {
		if (!isRecord(token) || typeof token.text !== 'string') {
			continue
		}
		// Special tokens such as [_BEG_] and [_TT_150]
		if (!token.text || token.text.startsWith('[_')) {
			continue
		}
		const offsets = readOffsets(token)
		if (!offsets) {
			continue
		}
		const hasLeadingSpace = /^\s/.test(token.text)
		const cleaned = token.text.trimStart()
		if (!cleaned) {
			continue
		}
		if (hasLeadingSpace && currentWord) {
			flush()
		}
		const isPunctuation = !/[\p{L}\p{N}]/u.test(cleaned)
		if (isPunctuation) {
			if (currentWord) {
				currentEnd = offsets.to / 1000
			}
			continue
		}
		if (!currentWord) {
			currentStart = offsets.from / 1000
		}
		currentWord += cleaned
		currentEnd = offsets.to / 1000
	}
	flush()
	return words
}
