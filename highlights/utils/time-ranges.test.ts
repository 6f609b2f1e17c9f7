import { test, expect } from 'vitest'
import {
	isDegenerateInterval,
	mergeOverlappingRanges,
	sumRangeDuration,
} from './time-ranges'
import type { TimeRange } from '../types'

function createRanges(...pairs: [number, number][]): TimeRange[] {
	return pairs.map(([start, end]) => ({ start, end }))
}

test('mergeOverlappingRanges returns empty array for empty input', () => {
	expect(mergeOverlappingRanges([])).toEqual([])
})

test('mergeOverlappingRanges joins overlapping ranges', () => {
	expect(mergeOverlappingRanges(createRanges([0, 60], [49, 109]))).toEqual(
		createRanges([0, 109]),
	)
})

test('mergeOverlappingRanges keeps touching ranges separate', () => {
	expect(mergeOverlappingRanges(createRanges([0, 10], [10, 20]))).toEqual(
		createRanges([0, 10], [10, 20]),
	)
})

test('mergeOverlappingRanges sorts and absorbs contained ranges', () => {
	expect(
		mergeOverlappingRanges(createRanges([30, 40], [0, 50], [60, 70])),
	).toEqual(createRanges([0, 50], [60, 70]))
})

test('mergeOverlappingRanges does not mutate input ranges', () => {
	const ranges = createRanges([0, 5], [3, 8])
	mergeOverlappingRanges(ranges)
	expect(ranges).toEqual(createRanges([0, 5], [3, 8]))
})

test('isDegenerateInterval flags empty and inverted ranges', () => {
	expect(isDegenerateInterval({ start: 5, end: 5 })).toBe(true)
	expect(isDegenerateInterval({ start: 130, end: 100 })).toBe(true)
	expect(isDegenerateInterval({ start: 0, end: 0.5 })).toBe(false)
})

test('sumRangeDuration adds positive durations only', () => {
	expect(sumRangeDuration(createRanges([0, 10], [20, 25], [40, 30]))).toBe(15)
})
