export { factorizeTempo, buildTempoChain } from './tempo'
export { truncateSilences, isOpenInterval } from './silences'
export { computeSegmentBoundaries } from './boundaries'
export {
	buildFilterGraph,
	buildScrubFilterGraph,
	collectSilenceStages,
	renderFilterGraph,
} from './builder'
export type { FilterGraphOptions } from './builder'
export { computeGain, buildGainStage, isGainPending } from './gain'
