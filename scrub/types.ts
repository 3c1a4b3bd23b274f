export type TimeRange = {
	start: number
	end: number
}

export type ClosedInterval = TimeRange

/** Silence that runs to the end of the media. */
export type OpenInterval = {
	start: number
	end: null
}

export type SilenceInterval = ClosedInterval | OpenInterval

export type ScrubConfig = Readonly<{
	delaySeconds: number
	silenceDurationSeconds: number
	speed: number
	silenceThresholdDb: number
	targetLoudnessDb: number
}>

export type SegmentBoundaries = {
	before: TimeRange
	during: TimeRange
	cursorTime: number
}

export type GraphStageSet = {
	videoTrims: readonly string[]
	audioTrims: readonly string[]
	concatInputs: readonly string[]
	pairCount: number
	cursorTime: number
}

export interface MediaAnalyzer {
	measureLoudness(inputPath: string): Promise<number>
	detectSilences(
		inputPath: string,
		thresholdDb: number,
		minimumDurationSeconds: number,
	): Promise<SilenceInterval[]>
}

export type ScrubResult = {
	inputPath: string
	outputPath: string
	filterGraph: string
	gain: number
	threshold: number
	silences: SilenceInterval[]
	scrubbedSilences: ClosedInterval[]
}
