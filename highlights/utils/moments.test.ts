import { test, expect } from 'vitest'
import {
	buildMomentIntervals,
	prepareHitTimestamps,
	sweepHitWindows,
	type MomentMergeOptions,
} from './moments'
import type { TimeRange } from '../types'

function createOptions(
	overrides: Partial<MomentMergeOptions> = {},
): MomentMergeOptions {
	return {
		bufferBefore: 1,
		bufferAfter: 2,
		mergeThreshold: 10,
		minDuration: 0,
		...overrides,
	}
}

function expectOrderedAndDisjoint(ranges: TimeRange[]) {
	for (const [index, range] of ranges.entries()) {
		expect(range.end).toBeGreaterThan(range.start)
		expect(range.start).toBeGreaterThanOrEqual(0)
		const next = ranges[index + 1]
		if (next) {
			expect(next.start).toBeGreaterThanOrEqual(range.end)
		}
	}
}

// prepareHitTimestamps tests
test('prepareHitTimestamps sorts ascending and drops duplicates', () => {
	expect(prepareHitTimestamps([9, 0, 5, 5, 9, 50])).toEqual([0, 5, 9, 50])
})

test('prepareHitTimestamps ignores non-finite timestamps', () => {
	expect(prepareHitTimestamps([3, Number.NaN, 1])).toEqual([1, 3])
})

// sweepHitWindows tests
test('sweepHitWindows returns no windows without hits', () => {
	expect(sweepHitWindows([], createOptions())).toEqual([])
})

test('sweepHitWindows merges on raw hit gaps, not window edges', () => {
	// Each gap is 8s; the accumulated window spans far beyond the threshold.
	const hits = [0, 8, 16, 24, 32, 40]
	expect(sweepHitWindows(hits, createOptions())).toEqual([
		{ start: -1, end: 42 },
	])
})

test('sweepHitWindows merges when the gap equals the threshold', () => {
	expect(sweepHitWindows([0, 10], createOptions())).toEqual([
		{ start: -1, end: 12 },
	])
})

test('sweepHitWindows does not merge overlapping padding past the threshold', () => {
	// Padded windows [-1, 12] and [10, 23] overlap, but the raw gap is 11s.
	expect(
		sweepHitWindows([0, 11], createOptions({ bufferAfter: 12 })),
	).toEqual([
		{ start: -1, end: 12 },
		{ start: 10, end: 23 },
	])
})

// buildMomentIntervals tests
test('buildMomentIntervals returns empty set for no hits', () => {
	expect(buildMomentIntervals([], createOptions({ minDuration: 60 }))).toEqual(
		[],
	)
})

test('buildMomentIntervals merges close hits and clamps start at zero', () => {
	expect(buildMomentIntervals([0, 5, 9, 50], createOptions())).toEqual([
		{ start: 0, end: 11 },
		{ start: 49, end: 52 },
	])
})

test('buildMomentIntervals forces a single hit to the minimum duration', () => {
	expect(
		buildMomentIntervals(
			[100],
			createOptions({ bufferBefore: 1.5, bufferAfter: 3, minDuration: 60 }),
		),
	).toEqual([{ start: 98.5, end: 158.5 }])
})

test('buildMomentIntervals extends forward from the clamped start', () => {
	expect(
		buildMomentIntervals([0.5], createOptions({ minDuration: 30 })),
	).toEqual([{ start: 0, end: 30 }])
})

test('buildMomentIntervals keeps windows longer than the minimum', () => {
	expect(
		buildMomentIntervals([10, 20, 30], createOptions({ minDuration: 5 })),
	).toEqual([{ start: 9, end: 32 }])
})

test('buildMomentIntervals merges windows the minimum duration pushes together', () => {
	expect(
		buildMomentIntervals([0, 5, 9, 50], createOptions({ minDuration: 60 })),
	).toEqual([{ start: 0, end: 109 }])
})

test('buildMomentIntervals sorts unsorted hits before merging', () => {
	expect(buildMomentIntervals([50, 9, 0, 5], createOptions())).toEqual(
		buildMomentIntervals([0, 5, 9, 50], createOptions()),
	)
})

test('buildMomentIntervals clamps ends to a known total duration', () => {
	expect(
		buildMomentIntervals(
			[10, 95],
			createOptions({ minDuration: 20, totalDuration: 100 }),
		),
	).toEqual([
		{ start: 9, end: 29 },
		{ start: 94, end: 100 },
	])
})

test('buildMomentIntervals leaves hits past the end as degenerate intervals', () => {
	expect(
		buildMomentIntervals(
			[10, 130],
			createOptions({ bufferBefore: 0, totalDuration: 100 }),
		),
	).toEqual([
		{ start: 10, end: 12 },
		{ start: 130, end: 100 },
	])
})

test('buildMomentIntervals output is ordered, disjoint, and covers every hit', () => {
	const hits = [3, 3.5, 7, 21, 22, 40, 41.25, 90, 91, 130]
	const options = createOptions({
		bufferBefore: 2,
		bufferAfter: 4,
		mergeThreshold: 5,
		minDuration: 15,
	})
	const intervals = buildMomentIntervals(hits, options)
	expectOrderedAndDisjoint(intervals)
	for (const hit of hits) {
		expect(
			intervals.some((range) => range.start <= hit && hit <= range.end),
		).toBe(true)
	}
})

test('buildMomentIntervals does not merge separated intervals when rerun on midpoints', () => {
	const options = createOptions({ mergeThreshold: 10 })
	const intervals = buildMomentIntervals([5, 40, 80], options)
	expect(intervals).toHaveLength(3)
	const midpoints = intervals.map((range) => (range.start + range.end) / 2)
	const rerun = buildMomentIntervals(midpoints, {
		...options,
		bufferBefore: 0,
		bufferAfter: 0,
	})
	expect(rerun).toHaveLength(3)
})

test('buildMomentIntervals is deterministic for identical input', () => {
	const hits = [12, 4, 4, 33, 70.5]
	const options = createOptions({ minDuration: 10 })
	expect(buildMomentIntervals(hits, options)).toEqual(
		buildMomentIntervals([...hits], { ...options }),
	)
})
