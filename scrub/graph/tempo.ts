import { ConfigurationError } from '../errors'
import { formatNumber } from '../../utils'

// atempo drops samples above 2.0, and refuses anything under 0.5
export const MAX_TEMPO_RATIO = 2.0
export const MIN_TEMPO_RATIO = 0.5

type TempoSplit = {
	step: number
	count: number
	// `factor / step ** count`, or null when the steps already reach `factor`
	remainder: number | null
}

function splitTempo(factor: number): TempoSplit {
	if (!Number.isFinite(factor) || factor <= 0) {
		throw new ConfigurationError(
			`Tempo factor must be a positive number (received ${factor}).`,
			'speed',
		)
	}
	const step = factor < 1 ? MIN_TEMPO_RATIO : MAX_TEMPO_RATIO
	const count = Math.floor(Math.log2(factor < 1 ? 1 / factor : factor))
	const remainder = factor / step ** count
	return { step, count, remainder: remainder === 1 ? null : remainder }
}

/**
 * Split a playback speed into atempo ratios that each stay within
 * [0.5, 2.0] and multiply back to `factor`.
 *
 * `factorizeTempo(8)` is `[2, 2, 2]`, `factorizeTempo(3)` is `[2, 1.5]`.
 */
export function factorizeTempo(factor: number): number[] {
	const { step, count, remainder } = splitTempo(factor)
	const ratios: number[] = Array.from({ length: count }, () => step)
	return remainder === null ? ratios : [...ratios, remainder]
}

/**
 * Render the atempo stages for `factor`, or an empty string when the audio
 * keeps its tempo. The last stage is written as an expression over the
 * requested factor, e.g. `atempo=2.0,atempo=3.0/2` for a speed of 3.
 */
export function buildTempoChain(factor: number) {
	const { step, count, remainder } = splitTempo(factor)
	const stages = Array.from(
		{ length: count },
		() => `atempo=${formatNumber(step)}`,
	)
	if (remainder !== null) {
		const scale = 2 ** count
		const operator = factor < 1 ? '*' : '/'
		stages.push(`atempo=${formatNumber(factor)}${operator}${scale}`)
	}
	return stages.join(',')
}
