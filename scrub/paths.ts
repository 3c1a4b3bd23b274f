import path from 'node:path'
import { CONFIG } from './config'

/**
 * Filter graph script written next to the input, sharing its base name.
 */
export function buildFilterGraphPath(inputPath: string) {
	const parsed = path.parse(inputPath)
	return path.join(parsed.dir, `${parsed.name}${CONFIG.filterGraphExtension}`)
}

/**
 * Default render target, used when suggesting the ffmpeg command that
 * consumes the filter graph.
 */
export function buildScrubbedVideoPath(inputPath: string) {
	const parsed = path.parse(inputPath)
	return path.join(parsed.dir, `${parsed.name}.scrubbed${parsed.ext}`)
}
