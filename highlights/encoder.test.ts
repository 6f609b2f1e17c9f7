import { test, expect, vi } from 'vitest'
import {
	createFfmpegEncoder,
	summarizeDiagnostic,
	type FfmpegEncoderOptions,
} from './encoder'
import { EncodeTaskError } from './errors'
import type { CommandResult } from '../utils'
import type { ClipTask } from './types'

type Runner = NonNullable<FfmpegEncoderOptions['runCommand']>

function createTask(overrides: Partial<ClipTask> = {}): ClipTask {
	return {
		index: 2,
		interval: { start: 98.5, end: 158.5 },
		sourcePath: '/videos/stream.mkv',
		outputPath: '/clips/clip-02.mkv',
		...overrides,
	}
}

function createResult(overrides: Partial<CommandResult> = {}): CommandResult {
	return { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...overrides }
}

const encoderOptions = {
	videoCodec: 'libx264',
	frameRate: 30,
	preset: 'fast',
	quality: 23,
	audioCodec: 'aac',
	audioBitrate: '192k',
}

function silenceLogs() {
	const log = vi.spyOn(console, 'log').mockImplementation(() => {})
	return () => log.mockRestore()
}

test('summarizeDiagnostic keeps the last non-empty stderr lines', () => {
	const stderr = 'banner\n\nline 1\nline 2\r\nline 3\n'
	expect(summarizeDiagnostic(stderr, 2)).toBe('line 2\nline 3')
})

test('ffmpeg encoder runs the export command and reports success', async () => {
	const restore = silenceLogs()
	try {
		const runCommand = vi.fn<Runner>(async () => createResult())
		const encoder = createFfmpegEncoder({ ...encoderOptions, runCommand })
		const outcome = await encoder.run(createTask())
		expect(outcome.status).toBe('succeeded')
		expect(runCommand).toHaveBeenCalledTimes(1)
		const [args, options] = runCommand.mock.calls[0] ?? []
		expect(args).toEqual([
			'ffmpeg',
			'-hide_banner',
			'-y',
			'-ss',
			'98.500',
			'-i',
			'/videos/stream.mkv',
			'-t',
			'60.000',
			'-r',
			'30',
			'-c:v',
			'libx264',
			'-preset',
			'fast',
			'-crf',
			'23',
			'-c:a',
			'aac',
			'-b:a',
			'192k',
			'/clips/clip-02.mkv',
		])
		expect(options).toMatchObject({ allowFailure: true, timeoutMs: undefined })
	} finally {
		restore()
	}
})

test('ffmpeg encoder reports a non-zero exit as a failure', async () => {
	const runCommand = vi.fn<Runner>(async () =>
		createResult({ exitCode: 1, stderr: 'Unknown encoder h264_nvenc\n' }),
	)
	const encoder = createFfmpegEncoder({ ...encoderOptions, runCommand })
	const outcome = await encoder.run(createTask())
	expect(outcome.status).toBe('failed')
	if (outcome.status === 'failed') {
		expect(outcome.error).toBeInstanceOf(EncodeTaskError)
		expect(outcome.error.exitCode).toBe(1)
		expect(outcome.error.diagnostic).toBe('Unknown encoder h264_nvenc')
		expect(outcome.error.message).toBe(
			'Clip 2 (98.50s -> 158.50s) failed with exit code 1: Unknown encoder h264_nvenc',
		)
	}
})

test('ffmpeg encoder passes the deadline and reports expiry', async () => {
	const runCommand = vi.fn<Runner>(async () =>
		createResult({ exitCode: 1, timedOut: true }),
	)
	const encoder = createFfmpegEncoder({
		...encoderOptions,
		timeoutSeconds: 1.5,
		runCommand,
	})
	const outcome = await encoder.run(createTask())
	expect(runCommand.mock.calls[0]?.[1]).toMatchObject({ timeoutMs: 1500 })
	expect(outcome.status).toBe('failed')
	if (outcome.status === 'failed') {
		expect(outcome.error.exitCode).toBeNull()
		expect(outcome.error.diagnostic).toBe('Timed out after 1.5s')
	}
})

test('ffmpeg encoder keeps sub-millisecond deadlines in force', async () => {
	const runCommand = vi.fn<Runner>(async () =>
		createResult({ exitCode: 1, timedOut: true }),
	)
	const encoder = createFfmpegEncoder({
		...encoderOptions,
		timeoutSeconds: 0.0001,
		runCommand,
	})
	await encoder.run(createTask())
	expect(runCommand.mock.calls[0]?.[1]).toMatchObject({ timeoutMs: 1 })
})

test('ffmpeg encoder fails degenerate intervals without running ffmpeg', async () => {
	const runCommand = vi.fn<Runner>(async () => createResult())
	const encoder = createFfmpegEncoder({ ...encoderOptions, runCommand })
	const outcome = await encoder.run(
		createTask({ interval: { start: 10, end: 10 } }),
	)
	expect(outcome.status).toBe('failed')
	expect(runCommand).not.toHaveBeenCalled()
})

test('ffmpeg encoder measures elapsed time with the injected clock', async () => {
	const restore = silenceLogs()
	try {
		let clock = 1000
		const runCommand = vi.fn<Runner>(async () => {
			clock += 250
			return createResult()
		})
		const encoder = createFfmpegEncoder({
			...encoderOptions,
			runCommand,
			now: () => clock,
		})
		expect(await encoder.run(createTask())).toEqual({
			status: 'succeeded',
			elapsedMs: 250,
		})
	} finally {
		restore()
	}
})
