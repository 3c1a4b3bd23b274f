#!/usr/bin/env tsx
import path from 'node:path'
import type { Arguments } from 'yargs'
import yargs from 'yargs/yargs'
import { hideBin } from 'yargs/helpers'
import { setLogHooks } from './scrub/logging'
import { createFfmpegAnalyzer, ensureFfmpegAvailable } from './scrub/ffmpeg'
import { CONFIG } from './scrub/config'
import { computeGain } from './scrub/graph'
import { buildFilterGraphPath } from './scrub/paths'
import {
	VIDEO_EXTENSIONS,
	collectInputPaths,
	configureScrubCommand,
	normalizeScrubArgs,
} from './scrub/cli'
import { runScrub } from './scrub-video'
import {
	PromptCancelled,
	createFilePicker,
	createInquirerPrompter,
	createStepProgressReporter,
	isInteractive,
	pauseActiveSpinner,
	resumeActiveSpinner,
	resolveOptionalString,
	type FilePicker,
	type Prompter,
	withSpinner,
} from './cli-ux'
import type { SilenceInterval } from './scrub/types'

type CliUxContext = {
	interactive: boolean
	prompter?: Prompter
	filePicker?: FilePicker
}

async function main(rawArgs = hideBin(process.argv)) {
	const context = createCliUxContext()
	let args = rawArgs

	if (context.interactive && args.length === 0 && context.prompter) {
		const selection = await promptForCommand(context.prompter)
		if (!selection) {
			return
		}
		args = selection
	}

	const parser = yargs(args)
		.scriptName('scrubgraph')
		.command(
			'scrub [input...]',
			'Write a filter graph that fast-forwards silences',
			configureScrubCommand,
			async (argv) => {
				const scrubArgs = await resolveScrubArgs(argv, context)
				const results = await withSpinner(
					'Scrubbing',
					async () => {
						setLogHooks({
							beforeLog: pauseActiveSpinner,
							afterLog: resumeActiveSpinner,
						})
						try {
							return await runScrub(scrubArgs, {
								progress: createStepProgressReporter('Scrubbing'),
							})
						} finally {
							setLogHooks({})
						}
					},
					{ successText: 'Filter graphs ready', enabled: context.interactive },
				)
				if (scrubArgs.print) {
					for (const result of results) {
						console.log(result.filterGraph)
					}
				}
			},
		)
		.command(
			'detect-silences [input]',
			'Show detected silences for a file',
			(command) =>
				command
					.positional('input', {
						type: 'string',
						describe: 'Input audio/video file',
					})
					.option('threshold', {
						type: 'number',
						describe: 'Level (dB) considered silent',
						default: CONFIG.silenceThresholdDb,
					})
					.option('silence-duration', {
						type: 'number',
						describe: 'Minimum silence length in seconds',
						default: CONFIG.silenceDurationSeconds,
					}),
			async (argv) => {
				const inputPath = await resolveInputPath(argv.input, context)
				let silences: SilenceInterval[] = []
				await withSpinner(
					'Detecting silences',
					async () => {
						await ensureFfmpegAvailable()
						silences = await createFfmpegAnalyzer().detectSilences(
							inputPath,
							argv.threshold,
							argv['silence-duration'],
						)
					},
					{ successText: 'Silence detection complete', enabled: context.interactive },
				)
				console.log(JSON.stringify(silences, null, 2))
			},
		)
		.command(
			'loudness [input]',
			'Measure integrated loudness of a file',
			(command) =>
				command
					.positional('input', {
						type: 'string',
						describe: 'Input audio/video file',
					})
					.option('target-lufs', {
						type: 'number',
						describe: 'Loudness target used to report the gain',
						default: CONFIG.targetLoudnessDb,
					}),
			async (argv) => {
				const inputPath = await resolveInputPath(argv.input, context)
				let loudness = 0
				await withSpinner(
					'Measuring loudness',
					async () => {
						await ensureFfmpegAvailable()
						loudness = await createFfmpegAnalyzer().measureLoudness(inputPath)
					},
					{ successText: 'Loudness measured', enabled: context.interactive },
				)
				const gain = computeGain(loudness, argv['target-lufs'])
				console.log(`Integrated loudness: ${loudness} LUFS (gain ${gain} dB)`)
			},
		)
		.demandCommand(1)
		.strict()
		.help()

	await parser.parseAsync()
}

function createCliUxContext(): CliUxContext {
	const interactive = isInteractive()
	if (!interactive) {
		return { interactive }
	}
	const prompter = createInquirerPrompter()
	const filePicker = createFilePicker(prompter)
	return { interactive, prompter, filePicker }
}

async function promptForCommand(
	prompter: Prompter,
): Promise<string[] | null> {
	const selection = await prompter.select('Choose a command', [
		{
			name: 'Write a filter graph that fast-forwards silences',
			value: 'scrub',
		},
		{ name: 'Show detected silences for a file', value: 'detect-silences' },
		{ name: 'Measure integrated loudness of a file', value: 'loudness' },
		{ name: 'Show help', value: 'help' },
		{ name: 'Exit', value: 'exit' },
	])
	switch (selection) {
		case 'exit':
			return null
		case 'help':
			return ['--help']
		default:
			return [selection]
	}
}

async function resolveInputPath(value: unknown, context: CliUxContext) {
	const input = resolveOptionalString(value)
	if (input) {
		return path.resolve(input)
	}
	if (!context.interactive || !context.filePicker) {
		throw new Error('Input audio/video file is required.')
	}
	return context.filePicker.pickExistingFile({
		message: 'Select input audio/video file',
	})
}

async function resolveScrubArgs(argv: Arguments, context: CliUxContext) {
	const { prompter, filePicker } = context
	if (!context.interactive || !prompter || !filePicker) {
		return normalizeScrubArgs(argv)
	}

	let inputPaths = collectInputPaths(argv.input)
	if (inputPaths.length === 0) {
		inputPaths = await promptForInputFiles(prompter, filePicker)
	}
	const overrides: Record<string, number | string> = {}
	if (await prompter.confirm('Adjust silence and loudness settings?')) {
		overrides.delay = await promptForNumber(prompter, 'Delay (seconds)', argv.delay)
		overrides['silence-duration'] = await promptForNumber(
			prompter,
			'Minimum silence duration (seconds)',
			argv['silence-duration'],
		)
		overrides.speed = await promptForNumber(prompter, 'Speed', argv.speed)
		overrides['target-threshold'] = await promptForNumber(
			prompter,
			'Silence threshold (dB)',
			argv['target-threshold'],
		)
		overrides['target-lufs'] = await promptForNumber(
			prompter,
			'Loudness target (dB LUFS)',
			argv['target-lufs'],
		)
	}
	const [onlyInput] = inputPaths
	if (
		inputPaths.length === 1 &&
		onlyInput &&
		!resolveOptionalString(argv.output) &&
		(await prompter.confirm('Write the filter graph to a custom path?'))
	) {
		overrides.output = await prompter.input('Filter graph path', {
			defaultValue: buildFilterGraphPath(onlyInput),
			validate: (value) =>
				resolveOptionalString(value) ? true : 'Enter a file path.',
		})
	}

	return normalizeScrubArgs({ ...argv, ...overrides, input: inputPaths })
}

async function promptForInputFiles(prompter: Prompter, filePicker: FilePicker) {
	const inputPaths: string[] = []
	let addAnother = true
	while (addAnother) {
		const inputPath = await filePicker.pickExistingFile({
			message:
				inputPaths.length === 0
					? 'Select input video file'
					: 'Select another input video file',
			extensions: VIDEO_EXTENSIONS,
		})
		inputPaths.push(inputPath)
		addAnother = await prompter.confirm('Add another input file?', {
			defaultValue: false,
		})
	}
	return inputPaths
}

async function promptForNumber(
	prompter: Prompter,
	message: string,
	defaultValue: unknown,
) {
	const answer = await prompter.input(message, {
		defaultValue: typeof defaultValue === 'number' ? String(defaultValue) : undefined,
		validate: (value) =>
			Number.isFinite(Number.parseFloat(value)) ? true : 'Enter a number.',
	})
	return Number.parseFloat(answer)
}

main().catch((error) => {
	if (error instanceof PromptCancelled) {
		console.log('[info] Cancelled.')
		return
	}
	console.error(
		`[error] ${error instanceof Error ? error.message : String(error)}`,
	)
	process.exit(1)
})
