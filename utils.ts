import { spawn } from 'node:child_process'

type RunCommandOptions = {
	allowFailure?: boolean
	logCommand?: (command: string[]) => void
	timeoutMs?: number
}

export type CommandResult = {
	stdout: string
	stderr: string
	exitCode: number
	timedOut: boolean
}

// Exit code reported when the binary could not be spawned at all.
export const SPAWN_FAILURE_EXIT_CODE = 127

export function formatCommand(command: string[]) {
	return command
		.map((part) => (part.includes(' ') ? `"${part}"` : part))
		.join(' ')
}

export async function runCommand(
	command: string[],
	options: RunCommandOptions = {},
): Promise<CommandResult> {
	options.logCommand?.(command)
	const [binary, ...args] = command
	if (!binary) {
		throw new Error('Command is empty.')
	}

	const result = await new Promise<CommandResult>((resolve) => {
		const stdout: Buffer[] = []
		const stderr: Buffer[] = []
		let timedOut = false
		let timer: NodeJS.Timeout | null = null
		const proc = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] })

		if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
			timer = setTimeout(() => {
				timedOut = true
				proc.kill('SIGKILL')
			}, options.timeoutMs)
		}

		proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
		proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
		proc.on('error', (error) => {
			if (timer) clearTimeout(timer)
			resolve({
				stdout: '',
				stderr: error.message,
				exitCode: SPAWN_FAILURE_EXIT_CODE,
				timedOut: false,
			})
		})
		proc.on('close', (code) => {
			if (timer) clearTimeout(timer)
			resolve({
				stdout: Buffer.concat(stdout).toString('utf8'),
				stderr: Buffer.concat(stderr).toString('utf8'),
				exitCode: code ?? 1,
				timedOut,
			})
		})
	})

	if (result.exitCode !== 0 && !options.allowFailure) {
		const reason = result.timedOut ? 'timed out' : String(result.exitCode)
		throw new Error(
			`Command failed (${reason}): ${formatCommand(command)}\n${result.stderr}`,
		)
	}

	return result
}

export function formatSeconds(value: number) {
	return `${value.toFixed(2)}s`
}

export function formatDuration(ms: number) {
	const seconds = ms / 1000
	if (seconds < 60) {
		return formatSeconds(seconds)
	}
	return `${formatSeconds(seconds)} (${(seconds / 60).toFixed(2)} mins)`
}

export async function getMediaDurationSeconds(
	filePath: string,
	options: Pick<RunCommandOptions, 'logCommand'> = {},
): Promise<number> {
	const result = await runCommand(
		[
			'ffprobe',
			'-v',
			'error',
			'-show_entries',
			'format=duration',
			'-of',
			'default=noprint_wrappers=1:nokey=1',
			filePath,
		],
		options,
	)
	const duration = Number.parseFloat(result.stdout.trim())
	if (!Number.isFinite(duration) || duration <= 0) {
		throw new Error(`Invalid duration for ${filePath}: ${result.stdout}`)
	}
	return duration
}
