import type { TimeRange } from '../types'

/**
 * Merge ranges that overlap into one. Ranges that only touch stay separate.
 * Input order is kept for equal starts.
 */
export function mergeOverlappingRanges(ranges: TimeRange[]): TimeRange[] {
	const sorted = [...ranges].sort((a, b) => a.start - b.start)
	const merged: TimeRange[] = []
	for (const range of sorted) {
		const last = merged.at(-1)
		if (last && range.start < last.end) {
			merged[merged.length - 1] = {
				start: last.start,
				end: Math.max(last.end, range.end),
			}
			continue
		}
		merged.push({ ...range })
	}
	return merged
}

export function isDegenerateInterval(range: TimeRange): boolean {
	return !(range.end > range.start)
}

export function sumRangeDuration(ranges: TimeRange[]): number {
	return ranges.reduce(
		(total, range) => total + Math.max(0, range.end - range.start),
		0,
	)
}
