import path from 'node:path'
import { tmpdir } from 'node:os'
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises'
import { afterEach, beforeEach, expect, test, vi } from 'vitest'
import { scrubVideo } from './scrub'
import { createScrubConfig } from './config'
import type { MediaAnalyzer, SilenceInterval } from './types'

let tempDir = ''

beforeEach(async () => {
	tempDir = await mkdtemp(path.join(tmpdir(), 'scrubgraph-'))
	vi.spyOn(console, 'log').mockImplementation(() => {})
	vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(async () => {
	vi.restoreAllMocks()
	await rm(tempDir, { recursive: true, force: true })
})

function createFakeAnalyzer(loudness: number, silences: SilenceInterval[]) {
	const calls: { thresholdDb: number; minimumDurationSeconds: number }[] = []
	const measureLoudness = vi.fn(async () => loudness)
	const analyzer: MediaAnalyzer = {
		measureLoudness,
		async detectSilences(_inputPath, thresholdDb, minimumDurationSeconds) {
			calls.push({ thresholdDb, minimumDurationSeconds })
			return silences
		},
	}
	return { analyzer, calls, measureLoudness }
}

test('scrubVideo writes the graph next to the input', async () => {
	const inputPath = path.join(tempDir, 'lesson.mkv')
	const { analyzer, calls, measureLoudness } = createFakeAnalyzer(-20, [
		{ start: 0, end: 2.5 },
		{ start: 10, end: 14 },
		{ start: 30, end: null },
	])

	const result = await scrubVideo({
		inputPath,
		config: createScrubConfig(),
		analyzer,
	})

	expect(result.outputPath).toBe(path.join(tempDir, 'lesson.filter-graph'))
	expect(result.gain).toBe(2)
	expect(result.threshold).toBe(-20)
	expect(result.scrubbedSilences).toEqual([{ start: 10, end: 14 }])
	expect(measureLoudness).toHaveBeenCalledTimes(1)
	expect(calls).toEqual([{ thresholdDb: -20, minimumDurationSeconds: 2 }])

	const written = await readFile(result.outputPath, 'utf8')
	expect(written).toBe(result.filterGraph)
	expect(written).toBe(
		[
			'[0:v] trim=0.0:10.25, setpts=PTS-STARTPTS [v1];',
			'[0:v] trim=10.25:13.75, setpts=(PTS-STARTPTS)/8.0 [v2];',
			'[0:v] trim=start=13.75, setpts=PTS-STARTPTS [v3];',
			'[0:a] atrim=0.0:10.25, asetpts=PTS-STARTPTS [a1];',
			'[0:a] atrim=10.25:13.75, asetpts=PTS-STARTPTS, atempo=2.0,atempo=2.0,atempo=2.0 [a2];',
			'[0:a] atrim=start=13.75, asetpts=PTS-STARTPTS [a3];',
			'[v1] [a1] [v2] [a2] [v3] [a3] concat=n=3:v=1:a=1 [v] [an];',
			'[an] volume=2.0dB [a];',
		].join('\n'),
	)
})

test('scrubVideo skips the volume stage when loudness matches', async () => {
	const { analyzer } = createFakeAnalyzer(-18, [])
	const result = await scrubVideo({
		inputPath: path.join(tempDir, 'clip.mp4'),
		config: createScrubConfig(),
		analyzer,
	})
	expect(result.gain).toBe(0)
	expect(result.filterGraph.split('\n').at(-1)).toBe(
		'[v1] [a1] concat=n=1:v=1:a=1 [v] [a];',
	)
})

test('scrubVideo honours an explicit output path', async () => {
	const outputPath = path.join(tempDir, 'custom.txt')
	const { analyzer } = createFakeAnalyzer(-18, [])
	await scrubVideo({
		inputPath: path.join(tempDir, 'clip.mp4'),
		config: createScrubConfig(),
		analyzer,
		outputPath,
	})
	expect(await readFile(outputPath, 'utf8')).toContain('concat=n=1')
})

test('scrubVideo writes nothing on a dry run', async () => {
	const { analyzer } = createFakeAnalyzer(-18, [])
	const result = await scrubVideo({
		inputPath: path.join(tempDir, 'clip.mp4'),
		config: createScrubConfig(),
		analyzer,
		dryRun: true,
	})
	await expect(stat(result.outputPath)).rejects.toThrow()
})

test('scrubVideo propagates analyzer failures', async () => {
	const analyzer: MediaAnalyzer = {
		measureLoudness: async () => {
			throw new Error('ffmpeg exited with 1')
		},
		detectSilences: async () => [],
	}
	await expect(
		scrubVideo({
			inputPath: path.join(tempDir, 'clip.mp4'),
			config: createScrubConfig(),
			analyzer,
		}),
	).rejects.toThrow('ffmpeg exited with 1')
})
