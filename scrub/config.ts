import { ConfigurationError } from './errors'
import type { ScrubConfig } from './types'

export const CONFIG = {
	delaySeconds: 0.25,
	silenceDurationSeconds: 2.0,
	speed: 8,
	silenceThresholdDb: -18,
	targetLoudnessDb: -18,
	filterGraphExtension: '.filter-graph',
} as const

export type ScrubConfigOptions = Partial<ScrubConfig>

/**
 * Merge options over the defaults and validate the result. Throws a
 * ConfigurationError before any analysis or graph work can start.
 */
export function createScrubConfig(options: ScrubConfigOptions = {}): ScrubConfig {
	const config: ScrubConfig = {
		delaySeconds: options.delaySeconds ?? CONFIG.delaySeconds,
		silenceDurationSeconds:
			options.silenceDurationSeconds ?? CONFIG.silenceDurationSeconds,
		speed: options.speed ?? CONFIG.speed,
		silenceThresholdDb: options.silenceThresholdDb ?? CONFIG.silenceThresholdDb,
		targetLoudnessDb: options.targetLoudnessDb ?? CONFIG.targetLoudnessDb,
	}

	const numericOptions: [string, number][] = [
		['delay', config.delaySeconds],
		['silence-duration', config.silenceDurationSeconds],
		['speed', config.speed],
		['target-threshold', config.silenceThresholdDb],
		['target-lufs', config.targetLoudnessDb],
	]
	for (const [option, value] of numericOptions) {
		if (!Number.isFinite(value)) {
			throw new ConfigurationError(`${option} must be a finite number.`, option)
		}
	}
	if (config.delaySeconds < 0) {
		throw new ConfigurationError('delay must be a non-negative number.', 'delay')
	}
	if (config.silenceDurationSeconds <= 0) {
		throw new ConfigurationError(
			'silence-duration must be greater than zero.',
			'silence-duration',
		)
	}
	if (config.speed <= 0) {
		throw new ConfigurationError('speed must be greater than zero.', 'speed')
	}
	if (config.targetLoudnessDb > 0) {
		throw new ConfigurationError(
			'target-lufs must be zero or negative.',
			'target-lufs',
		)
	}
	// Both margins of one silence have to fit inside it
	if (config.delaySeconds >= config.silenceDurationSeconds / 2) {
		throw new ConfigurationError(
			`delay=${config.delaySeconds} must be less than half of silence-duration=${config.silenceDurationSeconds}.`,
			'delay',
		)
	}

	return Object.freeze(config)
}

/**
 * Silence threshold relative to the loudness the audio will have after
 * the gain stage.
 */
export function resolveSilenceThreshold(
	measuredLoudnessDb: number,
	config: ScrubConfig,
) {
	return measuredLoudnessDb + config.silenceThresholdDb - config.targetLoudnessDb
}
