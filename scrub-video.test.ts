import path from 'node:path'
import { tmpdir } from 'node:os'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { afterEach, beforeEach, expect, test, vi } from 'vitest'
import { runScrub } from './scrub-video'
import { createScrubConfig } from './scrub/config'
import type { ScrubCliArgs } from './scrub/cli'
import type { MediaAnalyzer } from './scrub/types'
import type { StepProgressReporter } from './progress-reporter'

let tempDir = ''

beforeEach(async () => {
	tempDir = await mkdtemp(path.join(tmpdir(), 'scrubgraph-run-'))
	vi.spyOn(console, 'log').mockImplementation(() => {})
	vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(async () => {
	vi.restoreAllMocks()
	await rm(tempDir, { recursive: true, force: true })
})

function createArgs(overrides: Partial<ScrubCliArgs>): ScrubCliArgs {
	return {
		inputPaths: [],
		outputPath: null,
		config: createScrubConfig(),
		dryRun: false,
		print: false,
		...overrides,
	}
}

function createAnalyzer(): MediaAnalyzer {
	return {
		measureLoudness: vi.fn(async () => -18),
		detectSilences: vi.fn(async () => [{ start: 4, end: 8 }]),
	}
}

function createRecordingProgress(events: string[]): StepProgressReporter {
	return {
		start: ({ stepCount }) => events.push(`start:${stepCount}`),
		step: (label) => events.push(`step:${label}`),
		finish: () => events.push('finish'),
	}
}

test('runScrub writes one filter graph per input file', async () => {
	const first = path.join(tempDir, 'one.mp4')
	const second = path.join(tempDir, 'two.mkv')
	await writeFile(first, 'video')
	await writeFile(second, 'video')
	const events: string[] = []

	const results = await runScrub(createArgs({ inputPaths: [first, second] }), {
		analyzer: createAnalyzer(),
		progress: createRecordingProgress(events),
	})

	expect(results.map((result) => result.outputPath)).toEqual([
		path.join(tempDir, 'one.filter-graph'),
		path.join(tempDir, 'two.filter-graph'),
	])
	expect(await readFile(path.join(tempDir, 'two.filter-graph'), 'utf8')).toBe(
		results[1]?.filterGraph,
	)
	expect(events).toEqual(['start:2', 'step:one.mp4', 'step:two.mkv', 'finish'])
})

test('runScrub logs the render command for each written graph', async () => {
	const input = path.join(tempDir, 'talk.mkv')
	await writeFile(input, 'video')
	const log = vi.mocked(console.log)

	await runScrub(createArgs({ inputPaths: [input] }), {
		analyzer: createAnalyzer(),
	})

	const graphPath = path.join(tempDir, 'talk.filter-graph')
	const scrubbedPath = path.join(tempDir, 'talk.scrubbed.mkv')
	expect(log).toHaveBeenCalledWith(
		`[info] Render with: ffmpeg -i ${input} -/filter_complex ${graphPath} -map "[v]" -map "[a]" ${scrubbedPath}`,
	)
})

test('runScrub fails before analysis when an input is missing', async () => {
	const analyzer = createAnalyzer()
	await expect(
		runScrub(createArgs({ inputPaths: [path.join(tempDir, 'missing.mp4')] }), {
			analyzer,
		}),
	).rejects.toThrow('Input file not found')
	expect(analyzer.measureLoudness).not.toHaveBeenCalled()
})
