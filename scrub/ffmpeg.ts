import { runCommand as runCommandBase, formatNumber } from '../utils'
import { ExternalToolError, SilenceDetectionError } from './errors'
import { logCommand, logInfo } from './logging'
import type { MediaAnalyzer, SilenceInterval } from './types'

export type FfmpegVersion = {
	version: string
	major: number | null
}

export type SilenceDetectResult = {
	silences: SilenceInterval[]
	totalDuration: number
}

const SILENCE_DETECT_PREFIX = '[silencedetect '

async function runCommand(command: string[], allowFailure = false) {
	return runCommandBase(command, { allowFailure, logCommand })
}

function ffmpegArgs(inputPath: string, options: string[]) {
	return ['ffmpeg', '-hide_banner', '-nostats', '-i', inputPath, ...options]
}

/**
 * Parse the first line of `ffmpeg -version`, e.g.
 * `ffmpeg version n7.1.3-14-ga1b2c3 Copyright ...`.
 */
export function parseFfmpegVersion(output: string): FfmpegVersion {
	const version = output.trim().split(/\s+/)[2]
	if (!version) {
		throw new ExternalToolError('Unable to read the ffmpeg version.', 'ffmpeg')
	}
	const major = Number.parseInt(version.replace(/^n/, '').split('.')[0] ?? '', 10)
	return { version, major: Number.isFinite(major) ? major : null }
}

export async function ensureFfmpegAvailable(): Promise<FfmpegVersion> {
	const command = ['ffmpeg', '-hide_banner', '-version']
	const result = await runCommand(command, true).catch((error: unknown) => {
		const reason = error instanceof Error ? error.message : String(error)
		throw new ExternalToolError(
			`ffmpeg not available (${reason}). Install it and ensure it is on PATH.`,
			'ffmpeg',
		)
	})
	if (result.exitCode !== 0) {
		throw new ExternalToolError(
			'ffmpeg not available. Install it and ensure it is on PATH.',
			'ffmpeg',
			{ exitCode: result.exitCode, stderr: result.stderr },
		)
	}
	const version = parseFfmpegVersion(result.stdout)
	logInfo(`ffmpeg version: ${version.version}`)
	return version
}

function parseTimestamp(value: string | undefined, line: string) {
	const parsed = Number.parseFloat(value ?? '')
	if (!Number.isFinite(parsed)) {
		throw new SilenceDetectionError(`Unable to parse silencedetect line: ${line}`)
	}
	return parsed
}

/**
 * Collect silences from `silencedetect` log lines. A silence that is still
 * open when the stream ends stays open-ended.
 */
export function parseSilenceDetectOutput(output: string): SilenceDetectResult {
	const silences: SilenceInterval[] = []
	let totalDuration = 0
	for (const line of output.split(/\r?\n/)) {
		if (!line.startsWith(SILENCE_DETECT_PREFIX)) {
			continue
		}
		const startMatch = line.match(/silence_start:\s*(\S+)/)
		if (startMatch) {
			silences.push({ start: parseTimestamp(startMatch[1], line), end: null })
			continue
		}
		const endMatch = line.match(
			/silence_end:\s*([^\s|]+)\s*\|\s*silence_duration:\s*(\S+)/,
		)
		if (!endMatch) {
			continue
		}
		const open = silences.at(-1)
		if (!open || open.end !== null) {
			throw new SilenceDetectionError(
				`silence_end without a matching silence_start: ${line}`,
			)
		}
		silences[silences.length - 1] = {
			start: open.start,
			end: parseTimestamp(endMatch[1], line),
		}
		totalDuration += parseTimestamp(endMatch[2], line)
	}
	return { silences, totalDuration }
}

/**
 * Read the integrated loudness (`I: -19.5 LUFS`) from the `ebur128`
 * summary printed when the stream ends.
 */
export function parseIntegratedLoudness(output: string) {
	const matches = [...output.matchAll(/^\s*I:\s+(\S+)\s+LUFS/gm)]
	const value = matches.at(-1)?.[1]
	const loudness = Number.parseFloat(value ?? '')
	if (!Number.isFinite(loudness)) {
		throw new ExternalToolError(
			value
				? `Integrated loudness is not measurable (${value} LUFS).`
				: 'Failed to parse ebur128 loudness summary.',
			'ffmpeg',
		)
	}
	return loudness
}

export async function detectSilences(
	inputPath: string,
	thresholdDb: number,
	minimumDurationSeconds: number,
): Promise<SilenceInterval[]> {
	const result = await runCommand(
		ffmpegArgs(inputPath, [
			'-af',
			`silencedetect=n=${formatNumber(thresholdDb)}dB:d=${formatNumber(minimumDurationSeconds)}`,
			'-f',
			'null',
			'-',
		]),
	)
	const { silences, totalDuration } = parseSilenceDetectOutput(result.stderr)
	const averageDuration =
		silences.length > 0 ? totalDuration / silences.length : 0
	logInfo(
		`Found ${silences.length} silences (average duration ${averageDuration.toFixed(3)}s).`,
	)
	return silences
}

export async function measureLoudness(inputPath: string) {
	const result = await runCommand(
		ffmpegArgs(inputPath, ['-c:v', 'copy', '-af', 'ebur128', '-f', 'null', '-']),
	)
	return parseIntegratedLoudness(result.stderr)
}

export function createFfmpegAnalyzer(): MediaAnalyzer {
	return { measureLoudness, detectSilences }
}

/**
 * ffmpeg command that renders a video through a written filter graph.
 * Releases before 7 only read filter scripts through
 * `-filter_complex_script`.
 */
export function buildRenderCommand(options: {
	inputPath: string
	filterGraphPath: string
	outputPath: string
	ffmpegMajorVersion?: number | null
}) {
	const major = options.ffmpegMajorVersion
	const scriptFlag =
		typeof major === 'number' && major < 7
			? '-filter_complex_script'
			: '-/filter_complex'
	return [
		'ffmpeg',
		'-i',
		options.inputPath,
		scriptFlag,
		options.filterGraphPath,
		'-map',
		'[v]',
		'-map',
		'[a]',
		options.outputPath,
	]
}
