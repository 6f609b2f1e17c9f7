import type { TimeRange } from '../types'
import { mergeOverlappingRanges } from './time-ranges'

export type MomentMergeOptions = {
	bufferBefore: number
	bufferAfter: number
	// Largest gap between consecutive raw hits that still joins their windows
	mergeThreshold: number
	minDuration: number
	// Source length in seconds, when known
	totalDuration?: number
}

/**
 * Sort hit timestamps and drop exact duplicates. The sort is stable so ties
 * keep their original order.
 */
export function prepareHitTimestamps(timestamps: readonly number[]): number[] {
	const sorted = timestamps
		.filter((timestamp) => Number.isFinite(timestamp))
		.map((timestamp, order) => ({ timestamp, order }))
		.sort((a, b) => a.timestamp - b.timestamp || a.order - b.order)
		.map((entry) => entry.timestamp)
	return sorted.filter((timestamp, index) => timestamp !== sorted[index - 1])
}

/**
 * Group hits into padded windows in one left-to-right sweep. Whether a hit
 * joins the open window depends only on its distance to the previous raw hit,
 * never on the window's padded edges, so a long run of close hits keeps
 * growing one window.
 */
export function sweepHitWindows(
	hits: readonly number[],
	options: Pick<MomentMergeOptions, 'bufferBefore' | 'bufferAfter' | 'mergeThreshold'>,
): TimeRange[] {
	const [first, ...rest] = hits
	if (first === undefined) {
		return []
	}
	const windows: TimeRange[] = []
	let current: TimeRange = {
		start: first - options.bufferBefore,
		end: first + options.bufferAfter,
	}
	let previousHit = first
	for (const hit of rest) {
		if (hit - previousHit <= options.mergeThreshold) {
			current = {
				start: current.start,
				end: Math.max(current.end, hit + options.bufferAfter),
			}
		} else {
			windows.push(current)
			current = {
				start: hit - options.bufferBefore,
				end: hit + options.bufferAfter,
			}
		}
		previousHit = hit
	}
	windows.push(current)
	return windows
}

/**
 * Turn keyword hit timestamps into the clip intervals of a run: ordered,
 * pairwise non-overlapping, starting at or after zero and at least
 * `minDuration` long unless the end of the source cuts them short.
 *
 * A window that starts at or past `totalDuration` comes back with
 * `end <= start`; callers drop those.
 */
export function buildMomentIntervals(
	timestamps: readonly number[],
	options: MomentMergeOptions,
): TimeRange[] {
	const windows = sweepHitWindows(prepareHitTimestamps(timestamps), options)
	const extended = windows.map((window) => {
		const start = Math.max(0, window.start)
		const end =
			window.end - start < options.minDuration
				? start + options.minDuration
				: window.end
		return { start, end }
	})
	// Extending to the minimum duration can run into the next window.
	const merged = mergeOverlappingRanges(extended)
	const { totalDuration } = options
	if (totalDuration === undefined) {
		return merged
	}
	return merged.map((range) => ({
		start: range.start,
		end: Math.min(range.end, totalDuration),
	}))
}
