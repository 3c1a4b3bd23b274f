import { formatNumber } from '../../utils'

export const GAIN_INPUT_LABEL = '[an]'
export const AUDIO_OUTPUT_LABEL = '[a]'

export function computeGain(measuredLoudnessDb: number, targetLoudnessDb: number) {
	return targetLoudnessDb - measuredLoudnessDb
}

export function isGainPending(gain: number) {
	return gain !== 0
}

/**
 * Volume stage appended after the concat line. Empty when there is no
 * gain to apply, in which case the concat writes `[a]` itself.
 */
export function buildGainStage(gain: number) {
	if (!isGainPending(gain)) {
		return ''
	}
	return `\n${GAIN_INPUT_LABEL} volume=${formatNumber(gain)}dB ${AUDIO_OUTPUT_LABEL};`
}
