import { formatSeconds } from '../utils'
import { requireWorkerCount } from './config'
import { EncodeTaskError } from './errors'
import { logWarn } from './logging'
import { buildClipOutputPath } from './paths'
import { isDegenerateInterval } from './utils/time-ranges'
import type {
	ClipOutcome,
	ClipResult,
	ClipTask,
	ClipTaskState,
	DegenerateInterval,
	EncoderAdapter,
	TimeRange,
} from './types'

export type ClipTaskStateChange = {
	task: ClipTask
	state: ClipTaskState
	outcome?: ClipOutcome
}

export function buildClipTasks(
	intervals: readonly TimeRange[],
	options: { sourcePath: string; outputDir: string; container: string },
): { tasks: ClipTask[]; skipped: DegenerateInterval[] } {
	const tasks: ClipTask[] = []
	const skipped: DegenerateInterval[] = []
	for (const [offset, interval] of intervals.entries()) {
		const position = offset + 1
		if (isDegenerateInterval(interval)) {
			skipped.push({ interval, position })
			logWarn(
				`Skipping interval ${position} (${formatSeconds(interval.start)} -> ${formatSeconds(
					interval.end,
				)}): no duration left after clamping.`,
			)
			continue
		}
		const index = tasks.length + 1
		tasks.push({
			index,
			interval,
			sourcePath: options.sourcePath,
			outputPath: buildClipOutputPath(
				options.outputDir,
				index,
				options.container,
			),
		})
	}
	return { tasks, skipped }
}

async function runTask(
	task: ClipTask,
	encoder: EncoderAdapter,
	now: () => number,
): Promise<ClipOutcome> {
	const startedAt = now()
	try {
		return await encoder.run(task)
	} catch (error) {
		return {
			status: 'failed',
			error: new EncodeTaskError(
				task.index,
				task.interval,
				null,
				error instanceof Error ? error.message : String(error),
			),
			elapsedMs: now() - startedAt,
		}
	}
}

/**
 * Encode every task with at most `maxWorkers` encoder calls in flight. Each
 * worker takes the next queued task only after its current one settles. A
 * failed task is recorded and never stops its siblings. A state hook that
 * throws is logged and does not stop the pool either. Results come back in
 * task index order once every task has settled.
 */
export async function runClipTasks(
	tasks: readonly ClipTask[],
	encoder: EncoderAdapter,
	options: {
		maxWorkers: number
		onTaskStateChange?: (change: ClipTaskStateChange) => void
		now?: () => number
	},
): Promise<ClipResult[]> {
	const maxWorkers = requireWorkerCount(options.maxWorkers)
	if (tasks.length === 0) {
		return []
	}
	const now = options.now ?? Date.now
	const notify = (change: ClipTaskStateChange) => {
		try {
			options.onTaskStateChange?.(change)
		} catch (error) {
			logWarn(
				`State hook failed for clip ${change.task.index} (${change.state}): ${
					error instanceof Error ? error.message : String(error)
				}`,
			)
		}
	}
	for (const task of tasks) {
		notify({ task, state: 'pending' })
	}

	const results: ClipResult[] = []
	let cursor = 0
	const worker = async () => {
		while (cursor < tasks.length) {
			const task = tasks[cursor]
			cursor += 1
			if (!task) {
				continue
			}
			notify({ task, state: 'running' })
			const outcome = await runTask(task, encoder, now)
			results.push({ task, outcome })
			notify({ task, state: outcome.status, outcome })
		}
	}

	const workerCount = Math.min(maxWorkers, tasks.length)
	await Promise.all(Array.from({ length: workerCount }, () => worker()))
	return results.sort((a, b) => a.task.index - b.task.index)
}

export type FailedClipResult = {
	task: ClipTask
	outcome: Extract<ClipOutcome, { status: 'failed' }>
}

export function partitionClipResults(results: readonly ClipResult[]) {
	const succeeded: ClipResult[] = []
	const failed: FailedClipResult[] = []
	for (const result of results) {
		if (result.outcome.status === 'failed') {
			failed.push({ task: result.task, outcome: result.outcome })
		} else {
			succeeded.push(result)
		}
	}
	return { succeeded, failed }
}
