import type { ClosedInterval, SegmentBoundaries } from '../types'

/**
 * Split the timeline around one silence: the full-speed stretch since the
 * previous silence (ending `margin` into this one) and the fast-forwarded
 * stretch that stops `margin` before the silence ends. The returned
 * `cursorTime` is where the next full-speed stretch starts.
 *
 * A silence shorter than two margins yields a non-positive `during`
 * range, which is passed through as is.
 */
export function computeSegmentBoundaries(
	cursorTime: number,
	silence: ClosedInterval,
	margin: number,
): SegmentBoundaries {
	const begin = silence.start + margin
	const end = silence.end - margin
	return {
		before: { start: cursorTime, end: begin },
		during: { start: begin, end },
		cursorTime: end,
	}
}
