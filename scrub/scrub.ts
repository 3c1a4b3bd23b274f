import path from 'node:path'
import { writeFile } from 'node:fs/promises'
import { resolveSilenceThreshold } from './config'
import { buildScrubFilterGraph, computeGain, truncateSilences } from './graph'
import { logInfo, logWarn } from './logging'
import { buildFilterGraphPath } from './paths'
import type { MediaAnalyzer, ScrubConfig, ScrubResult } from './types'

export type ScrubVideoOptions = {
	inputPath: string
	config: ScrubConfig
	analyzer: MediaAnalyzer
	outputPath?: string
	dryRun?: boolean
}

/**
 * Measure loudness, detect silences against the gain-adjusted threshold and
 * write the filter graph for one input file. Each analysis runs once.
 */
export async function scrubVideo(options: ScrubVideoOptions): Promise<ScrubResult> {
	const { inputPath, config, analyzer } = options
	const outputPath = options.outputPath ?? buildFilterGraphPath(inputPath)
	logInfo(`Processing file: ${path.basename(inputPath)}`)

	const measured = await analyzer.measureLoudness(inputPath)
	const gain = computeGain(measured, config.targetLoudnessDb)
	const threshold = resolveSilenceThreshold(measured, config)
	logInfo(
		`Measured loudness=${measured} dBLUFS; gain=${gain} dB; threshold=${threshold} dB`,
	)

	logInfo('Searching for silence...')
	const silences = await analyzer.detectSilences(
		inputPath,
		threshold,
		config.silenceDurationSeconds,
	)
	const scrubbedSilences = truncateSilences(silences)
	if (scrubbedSilences.length === 0) {
		logWarn('No internal silences found; the graph passes the video through.')
	}
	const filterGraph = buildScrubFilterGraph(silences, config, gain)

	if (options.dryRun) {
		logInfo(`Dry run; skipping ${path.basename(outputPath)}`)
	} else {
		await writeFile(outputPath, filterGraph, 'utf8')
		logInfo(`Wrote ${path.basename(outputPath)}`)
	}

	return {
		inputPath,
		outputPath,
		filterGraph,
		gain,
		threshold,
		silences,
		scrubbedSilences,
	}
}
