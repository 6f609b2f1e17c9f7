import path from 'node:path'
import { writeFile } from 'node:fs/promises'
import { formatDuration, formatSeconds } from '../utils'
import { partitionClipResults } from './clip-scheduler'
import { logInfo } from './logging'
import { buildSummaryLogPath } from './paths'
import { sumRangeDuration } from './utils/time-ranges'
import type {
	ClipResult,
	DegenerateInterval,
	KeywordHit,
	PhaseTimings,
	TimeRange,
} from './types'

export type RunSummary = {
	inputPath: string
	outputDir: string
	dryRun: boolean
	tokens: number
	hits: number
	intervals: TimeRange[]
	results: ClipResult[]
	skipped: DegenerateInterval[]
	timings: PhaseTimings
}

export function createRunSummary(options: {
	inputPath: string
	outputDir: string
	dryRun: boolean
	tokenCount: number
	hits: readonly KeywordHit[]
	intervals: readonly TimeRange[]
	results: readonly ClipResult[]
	skipped: readonly DegenerateInterval[]
	timings: PhaseTimings
}): RunSummary {
	return {
		inputPath: options.inputPath,
		outputDir: options.outputDir,
		dryRun: options.dryRun,
		tokens: options.tokenCount,
		hits: options.hits.length,
		intervals: [...options.intervals],
		results: [...options.results],
		skipped: [...options.skipped],
		timings: options.timings,
	}
}

function formatRange(range: TimeRange) {
	return `${formatSeconds(range.start)} -> ${formatSeconds(range.end)}`
}

export function countFailedClips(summary: RunSummary) {
	return partitionClipResults(summary.results).failed.length
}

export function buildSummaryLines(summary: RunSummary): string[] {
	const { succeeded, failed } = partitionClipResults(summary.results)
	const lines = [
		`Input: ${summary.inputPath}`,
		`Output dir: ${summary.outputDir}`,
		`Transcript tokens: ${summary.tokens}`,
		`Keyword hits: ${summary.hits}`,
		`Intervals found: ${summary.intervals.length}`,
		`Planned clip time: ${formatSeconds(sumRangeDuration(summary.intervals))}`,
	]
	if (summary.dryRun) {
		lines.push(`Would export clips: ${summary.intervals.length - summary.skipped.length}`)
	} else {
		lines.push(
			`Exported clips: ${succeeded.length}`,
			`Failed clips: ${failed.length}`,
		)
	}
	lines.push(`Skipped (degenerate): ${summary.skipped.length}`)

	if (failed.length > 0) {
		lines.push('Failures:')
		for (const { task, outcome } of failed) {
			lines.push(
				`- Clip ${task.index} (${formatRange(task.interval)}) -> ${path.basename(
					task.outputPath,
				)}`,
			)
			const reason = outcome.error.diagnostic || outcome.error.message
			for (const [lineIndex, line] of reason.split('\n').entries()) {
				lines.push(`  ${lineIndex === 0 ? 'Reason: ' : '        '}${line}`)
			}
		}
	}
	if (summary.skipped.length > 0) {
		lines.push('Skipped intervals:')
		for (const { interval, position } of summary.skipped) {
			lines.push(`- Interval ${position} (${formatRange(interval)})`)
		}
	}
	lines.push(
		`Transcription time: ${formatDuration(summary.timings.transcriptionMs)}`,
		`Export time: ${formatDuration(summary.timings.exportMs)}`,
		`Total runtime: ${formatDuration(summary.timings.totalMs)}`,
	)
	return lines
}

export async function writeSummaryLog(summary: RunSummary) {
	const lines = buildSummaryLines(summary)
	logInfo('Summary:')
	lines.forEach((line) => logInfo(line))

	const summaryLogPath = buildSummaryLogPath(summary.outputDir)
	if (summary.dryRun) {
		logInfo(`[dry-run] Would write summary log: ${summaryLogPath}`)
		return null
	}
	await writeFile(summaryLogPath, `${lines.join('\n')}\n`, 'utf8')
	return summaryLogPath
}
