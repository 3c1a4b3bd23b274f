import type { Argv, Arguments } from 'yargs'
import { CONFIG, createScrubConfig } from './config'
import { ConfigurationError } from './errors'
import type { ScrubConfig } from './types'

export const VIDEO_EXTENSIONS = [
	'.mp4',
	'.mkv',
	'.avi',
	'.mov',
	'.webm',
	'.flv',
	'.m4v',
]

export interface ScrubCliArgs {
	inputPaths: string[]
	outputPath: string | null
	config: ScrubConfig
	dryRun: boolean
	print: boolean
}

export function configureScrubCommand(command: Argv) {
	return command
		.positional('input', {
			type: 'string',
			array: true,
			describe: 'Input video file(s)',
		})
		.option('delay', {
			type: 'number',
			alias: 'd',
			describe:
				'Seconds kept at normal speed after each silence starts and before it ends',
			default: CONFIG.delaySeconds,
		})
		.option('silence-duration', {
			type: 'number',
			alias: 's',
			describe: 'Only fast-forward silences at least this many seconds long',
			default: CONFIG.silenceDurationSeconds,
		})
		.option('speed', {
			type: 'number',
			alias: 'x',
			describe: 'Playback speed for silent parts',
			default: CONFIG.speed,
		})
		.option('target-threshold', {
			type: 'number',
			alias: 't',
			describe: 'Level (dB) considered silent after loudness normalization',
			default: CONFIG.silenceThresholdDb,
		})
		.option('target-lufs', {
			type: 'number',
			alias: 'l',
			describe: 'Integrated loudness target (dB LUFS, zero or negative)',
			default: CONFIG.targetLoudnessDb,
		})
		.option('output', {
			type: 'string',
			alias: 'o',
			describe:
				'Filter graph output path (single input only; defaults to <input>.filter-graph)',
		})
		.option('dry-run', {
			type: 'boolean',
			describe: 'Analyze and build the filter graph without writing it',
			default: false,
		})
		.option('print', {
			type: 'boolean',
			describe: 'Print the filter graph to stdout',
			default: false,
		})
}

function readNumberOption(argv: Arguments, name: string) {
	const value = argv[name]
	if (value === undefined) {
		return undefined
	}
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new ConfigurationError(`${name} must be a finite number.`, name)
	}
	return value
}

export function collectInputPaths(value: unknown) {
	if (Array.isArray(value)) {
		return value.filter(
			(entry): entry is string =>
				typeof entry === 'string' && entry.trim().length > 0,
		)
	}
	if (typeof value === 'string' && value.trim().length > 0) {
		return [value]
	}
	return []
}

export function normalizeScrubArgs(argv: Arguments): ScrubCliArgs {
	const inputPaths = collectInputPaths(argv.input)
	if (inputPaths.length === 0) {
		throw new Error('At least one input file is required.')
	}

	const outputPath =
		typeof argv.output === 'string' && argv.output.trim().length > 0
			? argv.output.trim()
			: null
	if (outputPath && inputPaths.length > 1) {
		throw new ConfigurationError(
			'output can only be set when scrubbing a single input file.',
			'output',
		)
	}

	const config = createScrubConfig({
		delaySeconds: readNumberOption(argv, 'delay'),
		silenceDurationSeconds: readNumberOption(argv, 'silence-duration'),
		speed: readNumberOption(argv, 'speed'),
		silenceThresholdDb: readNumberOption(argv, 'target-threshold'),
		targetLoudnessDb: readNumberOption(argv, 'target-lufs'),
	})

	return {
		inputPaths,
		outputPath,
		config,
		dryRun: Boolean(argv['dry-run']),
		print: Boolean(argv.print),
	}
}
