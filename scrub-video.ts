import path from 'node:path'
import { stat } from 'node:fs/promises'
import type { StepProgressReporter } from './progress-reporter'
import type { ScrubCliArgs } from './scrub/cli'
import {
	buildRenderCommand,
	createFfmpegAnalyzer,
	ensureFfmpegAvailable,
} from './scrub/ffmpeg'
import { logInfo } from './scrub/logging'
import { buildScrubbedVideoPath } from './scrub/paths'
import { scrubVideo } from './scrub/scrub'
import type { MediaAnalyzer, ScrubResult } from './scrub/types'
import { formatCommand, formatSeconds } from './utils'

export type RunScrubOptions = {
	analyzer?: MediaAnalyzer
	progress?: StepProgressReporter
}

async function assertInputExists(inputPath: string) {
	const exists = await stat(inputPath)
		.then((stats) => stats.isFile())
		.catch(() => false)
	if (!exists) {
		throw new Error(`Input file not found: ${inputPath}`)
	}
}

export async function runScrub(
	args: ScrubCliArgs,
	options: RunScrubOptions = {},
): Promise<ScrubResult[]> {
	const inputPaths = args.inputPaths.map((inputPath) => path.resolve(inputPath))
	for (const inputPath of inputPaths) {
		await assertInputExists(inputPath)
	}

	let analyzer = options.analyzer
	let ffmpegMajorVersion: number | null = null
	if (!analyzer) {
		ffmpegMajorVersion = (await ensureFfmpegAvailable()).major
		analyzer = createFfmpegAnalyzer()
	}

	const { config } = args
	logInfo(
		`Fast-forwarding silences of ${formatSeconds(config.silenceDurationSeconds)} or more at ${config.speed}x, keeping ${formatSeconds(config.delaySeconds)} margins.`,
	)
	if (args.dryRun) {
		logInfo('Dry run enabled; no files will be written.')
	}

	const progress = options.progress
	progress?.start({ stepCount: inputPaths.length, label: 'Analyzing' })
	const results: ScrubResult[] = []
	for (const inputPath of inputPaths) {
		progress?.step(path.basename(inputPath))
		const result = await scrubVideo({
			inputPath,
			config,
			analyzer,
			outputPath: args.outputPath ? path.resolve(args.outputPath) : undefined,
			dryRun: args.dryRun,
		})
		if (!args.dryRun) {
			const renderCommand = buildRenderCommand({
				inputPath,
				filterGraphPath: result.outputPath,
				outputPath: buildScrubbedVideoPath(inputPath),
				ffmpegMajorVersion,
			})
			logInfo(`Render with: ${formatCommand(renderCommand)}`)
		}
		results.push(result)
	}
	progress?.finish()
	return results
}
