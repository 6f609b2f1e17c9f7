import { runCommand as runCommandBase, type CommandResult } from '../utils'
import { EncodeTaskError } from './errors'
import { buildClipExportArgs, type ClipExportOptions } from './ffmpeg'
import { logCommand, logInfo } from './logging'
import type { ClipOutcome, ClipTask, EncoderAdapter } from './types'

const DIAGNOSTIC_MAX_LINES = 8

type CommandRunner = (
	command: string[],
	options: {
		allowFailure: boolean
		timeoutMs?: number
		logCommand?: (command: string[]) => void
	},
) => Promise<CommandResult>

export type FfmpegEncoderOptions = ClipExportOptions & {
	timeoutSeconds?: number
	runCommand?: CommandRunner
	now?: () => number
}

/**
 * Keep the last lines of ffmpeg's stderr; the actual error is at the end and
 * the banner above it is noise.
 */
export function summarizeDiagnostic(
	stderr: string,
	maxLines = DIAGNOSTIC_MAX_LINES,
) {
	const lines = stderr
		.split(/\r?\n/)
		.map((line) => line.trimEnd())
		.filter((line) => line.trim().length > 0)
	return lines.slice(-maxLines).join('\n')
}

export function createFfmpegEncoder(
	options: FfmpegEncoderOptions,
): EncoderAdapter {
	const runCommand = options.runCommand ?? runCommandBase
	const now = options.now ?? Date.now
	const timeoutMs =
		options.timeoutSeconds === undefined
			? undefined
			: Math.max(1, Math.ceil(options.timeoutSeconds * 1000))

	return {
		async run(task: ClipTask): Promise<ClipOutcome> {
			const startedAt = now()
			const fail = (exitCode: number | null, diagnostic: string) =>
				({
					status: 'failed',
					error: new EncodeTaskError(
						task.index,
						task.interval,
						exitCode,
						diagnostic,
					),
					elapsedMs: now() - startedAt,
				}) satisfies ClipOutcome

			let args: string[]
			try {
				args = buildClipExportArgs({
					...options,
					inputPath: task.sourcePath,
					outputPath: task.outputPath,
					interval: task.interval,
				})
			} catch (error) {
				return fail(null, error instanceof Error ? error.message : String(error))
			}

			const result = await runCommand(args, {
				allowFailure: true,
				timeoutMs,
				logCommand,
			})
			if (result.timedOut) {
				return fail(
					null,
					`Timed out after ${options.timeoutSeconds}s\n${summarizeDiagnostic(result.stderr)}`.trim(),
				)
			}
			if (result.exitCode !== 0) {
				return fail(result.exitCode, summarizeDiagnostic(result.stderr))
			}
			logInfo(`Wrote ${task.outputPath}`)
			return { status: 'succeeded', elapsedMs: now() - startedAt }
		},
	}
}
