import { test, expect } from 'vitest'
import { computeSegmentBoundaries } from './boundaries'

test('computeSegmentBoundaries keeps margins at full speed', () => {
	expect(computeSegmentBoundaries(0, { start: 5, end: 9 }, 0.25)).toEqual({
		before: { start: 0, end: 5.25 },
		during: { start: 5.25, end: 8.75 },
		cursorTime: 8.75,
	})
})

test('computeSegmentBoundaries starts the before range at the cursor', () => {
	const result = computeSegmentBoundaries(8.75, { start: 20, end: 24 }, 0.5)
	expect(result.before).toEqual({ start: 8.75, end: 20.5 })
	expect(result.cursorTime).toBe(23.5)
})

test('computeSegmentBoundaries with no margin uses the silence itself', () => {
	const result = computeSegmentBoundaries(1, { start: 3, end: 6 }, 0)
	expect(result.during).toEqual({ start: 3, end: 6 })
})

test('computeSegmentBoundaries passes a negative during range through', () => {
	const result = computeSegmentBoundaries(0, { start: 10, end: 10.5 }, 0.5)
	expect(result.during).toEqual({ start: 10.5, end: 10 })
	expect(result.cursorTime).toBe(10)
})
