import { formatNumber } from '../../utils'
import { computeSegmentBoundaries } from './boundaries'
import {
	AUDIO_OUTPUT_LABEL,
	GAIN_INPUT_LABEL,
	buildGainStage,
	isGainPending,
} from './gain'
import { truncateSilences } from './silences'
import { buildTempoChain } from './tempo'
import type {
	ClosedInterval,
	GraphStageSet,
	ScrubConfig,
	SilenceInterval,
	TimeRange,
} from '../types'

const VIDEO_INPUT = '[0:v]'
const AUDIO_INPUT = '[0:a]'
const VIDEO_OUTPUT_LABEL = '[v]'
const RESET_PTS = 'setpts=PTS-STARTPTS'

export type FilterGraphOptions = {
	margin: number
	speed: number
	gainPending: boolean
}

type StageTemplates = {
	speedupVideo: string
	speedupAudio: string
}

export function createGraphStageSet(): GraphStageSet {
	return {
		videoTrims: [],
		audioTrims: [],
		concatInputs: [],
		pairCount: 0,
		cursorTime: 0,
	}
}

/**
 * Node numbers for the next silence: each one contributes the segment
 * before it and the segment during it.
 */
export function nextSegmentPair(pairCount: number) {
	const pair = pairCount + 1
	return { pairCount: pair, before: pair * 2 - 1, during: pair * 2 }
}

function formatTrim(range: TimeRange) {
	return `trim=${formatNumber(range.start)}:${formatNumber(range.end)}`
}

function buildStageTemplates(speed: number): StageTemplates {
	const tempoChain = buildTempoChain(speed)
	return {
		speedupVideo: `setpts=(PTS-STARTPTS)/${formatNumber(speed)}`,
		speedupAudio: tempoChain ? `, ${tempoChain}` : '',
	}
}

function appendSilenceStages(
	stages: GraphStageSet,
	silence: ClosedInterval,
	margin: number,
	templates: StageTemplates,
): GraphStageSet {
	const segment = nextSegmentPair(stages.pairCount)
	const { before, during, cursorTime } = computeSegmentBoundaries(
		stages.cursorTime,
		silence,
		margin,
	)
	return {
		videoTrims: [
			...stages.videoTrims,
			`${VIDEO_INPUT} ${formatTrim(before)}, ${RESET_PTS} [v${segment.before}];`,
			`${VIDEO_INPUT} ${formatTrim(during)}, ${templates.speedupVideo} [v${segment.during}];`,
		],
		audioTrims: [
			...stages.audioTrims,
			`${AUDIO_INPUT} a${formatTrim(before)}, a${RESET_PTS} [a${segment.before}];`,
			`${AUDIO_INPUT} a${formatTrim(during)}, a${RESET_PTS}${templates.speedupAudio} [a${segment.during}];`,
		],
		concatInputs: [
			...stages.concatInputs,
			`[v${segment.before}] [a${segment.before}] [v${segment.during}] [a${segment.during}]`,
		],
		pairCount: segment.pairCount,
		cursorTime,
	}
}

/**
 * Fold the internal silences into trim stages, in chronological order.
 */
export function collectSilenceStages(
	silences: readonly ClosedInterval[],
	options: Pick<FilterGraphOptions, 'margin' | 'speed'>,
): GraphStageSet {
	const templates = buildStageTemplates(options.speed)
	return silences.reduce(
		(stages, silence) =>
			appendSilenceStages(stages, silence, options.margin, templates),
		createGraphStageSet(),
	)
}

/**
 * Add the full-speed segment from the last silence to the end of the media
 * and join everything into the filter graph text, ending in one concat.
 */
export function renderFilterGraph(stages: GraphStageSet, gainPending: boolean) {
	const nodes = stages.pairCount * 2 + 1
	const trimTillEnd = `trim=start=${formatNumber(stages.cursorTime)}`
	const videoTrims = [
		...stages.videoTrims,
		`${VIDEO_INPUT} ${trimTillEnd}, ${RESET_PTS} [v${nodes}];`,
	]
	const audioTrims = [
		...stages.audioTrims,
		`${AUDIO_INPUT} a${trimTillEnd}, a${RESET_PTS} [a${nodes}];`,
	]
	const audioOutput = gainPending ? GAIN_INPUT_LABEL : AUDIO_OUTPUT_LABEL
	const concat = [
		...stages.concatInputs,
		`[v${nodes}] [a${nodes}] concat=n=${nodes}:v=1:a=1 ${VIDEO_OUTPUT_LABEL} ${audioOutput};`,
	]
	return [videoTrims.join('\n'), audioTrims.join('\n'), concat.join(' ')].join(
		'\n',
	)
}

export function buildFilterGraph(
	silences: readonly ClosedInterval[],
	options: FilterGraphOptions,
) {
	return renderFilterGraph(
		collectSilenceStages(silences, options),
		options.gainPending,
	)
}

/**
 * Complete `-filter_complex` script: fast-forwarded internal silences and,
 * when `gain` is non-zero, a trailing volume stage.
 */
export function buildScrubFilterGraph(
	silences: readonly SilenceInterval[],
	config: ScrubConfig,
	gain: number,
) {
	const graph = buildFilterGraph(truncateSilences(silences), {
		margin: config.delaySeconds,
		speed: config.speed,
		gainPending: isGainPending(gain),
	})
	return `${graph}${buildGainStage(gain)}`
}
