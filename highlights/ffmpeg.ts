import {
	formatSeconds,
	getMediaDurationSeconds,
	runCommand as runCommandBase,
} from '../utils'
import { TRANSCRIPTION_SAMPLE_RATE } from './config'
import { logCommand, logInfo } from './logging'
import type { TimeRange } from './types'

async function runCommand(command: string[], allowFailure = false) {
	return runCommandBase(command, { allowFailure, logCommand })
}

export async function ensureFfmpegAvailable() {
	const ffmpeg = await runCommand(['ffmpeg', '-version'], true)
	const ffprobe = await runCommand(['ffprobe', '-version'], true)
	if (ffmpeg.exitCode !== 0 || ffprobe.exitCode !== 0) {
		throw new Error(
			'ffmpeg/ffprobe not available. Install them and ensure they are on PATH.',
		)
	}
}

export async function probeMediaDuration(inputPath: string) {
	return getMediaDurationSeconds(inputPath, { logCommand })
}

export async function extractTranscriptionAudio(options: {
	inputPath: string
	outputPath: string
}) {
	await runCommand([
		'ffmpeg',
		'-hide_banner',
		'-y',
		'-i',
		options.inputPath,
		'-vn',
		'-sn',
		'-dn',
		'-ac',
		'1',
		'-ar',
		String(TRANSCRIPTION_SAMPLE_RATE),
		'-c:a',
		'pcm_s16le',
		options.outputPath,
	])
	logInfo(`Extracted transcription audio to ${options.outputPath}`)
}

export type ClipExportOptions = {
	videoCodec: string
	frameRate: number
	preset?: string
	quality?: number
	audioCodec: string
	audioBitrate: string
}

/**
 * ffmpeg arguments for cutting one interval out of the source. Seeking before
 * `-i` keeps long sources fast; the clip is re-encoded so cuts land on the
 * requested time rather than the nearest keyframe.
 */
export function buildClipExportArgs(
	options: ClipExportOptions & {
		inputPath: string
		outputPath: string
		interval: TimeRange
	},
) {
	const duration = options.interval.end - options.interval.start
	if (duration <= 0) {
		throw new Error(
			`Invalid clip window (${formatSeconds(options.interval.start)} -> ${formatSeconds(
				options.interval.end,
			)})`,
		)
	}
	const args = [
		'ffmpeg',
		'-hide_banner',
		'-y',
		'-ss',
		options.interval.start.toFixed(3),
		'-i',
		options.inputPath,
		'-t',
		duration.toFixed(3),
		'-r',
		String(options.frameRate),
		'-c:v',
		options.videoCodec,
	]
	if (options.preset) {
		args.push('-preset', options.preset)
	}
	if (options.quality !== undefined) {
		args.push(...buildQualityArgs(options.videoCodec, options.quality))
	}
	args.push(
		'-c:a',
		options.audioCodec,
		'-b:a',
		options.audioBitrate,
		options.outputPath,
	)
	return args
}

// NVENC takes a constant quality target; software encoders take a CRF.
function buildQualityArgs(videoCodec: string, quality: number) {
	const value = String(quality)
	return videoCodec.endsWith('_nvenc') ? ['-cq', value] : ['-crf', value]
}
