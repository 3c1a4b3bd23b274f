import { SilenceDetectionError } from '../errors'
import type { ClosedInterval, OpenInterval, SilenceInterval } from '../types'

export function isOpenInterval(
	interval: SilenceInterval,
): interval is OpenInterval {
	return interval.end === null
}

/**
 * Omit silence at the very start and end of the media. The leading and
 * trailing full-speed segments already cover those, so only internal
 * silences are fast-forwarded.
 */
export function truncateSilences(
	silences: readonly SilenceInterval[],
): ClosedInterval[] {
	const first = silences[0]
	const last = silences.at(-1)
	if (!first || !last) {
		return []
	}
	const from = first.start <= 0 ? 1 : 0
	const to = silences.length - (isOpenInterval(last) ? 1 : 0)

	const internal: ClosedInterval[] = []
	for (const silence of silences.slice(from, to)) {
		if (isOpenInterval(silence)) {
			throw new SilenceDetectionError(
				`Open-ended silence at ${silence.start}s is followed by another silence.`,
			)
		}
		internal.push(silence)
	}
	return internal
}
