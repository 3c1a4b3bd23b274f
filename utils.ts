import { spawn } from 'node:child_process'
import { ExternalToolError } from './scrub/errors'

type RunCommandOptions = {
	allowFailure?: boolean
	logCommand?: (command: string[]) => void
}

export type CommandResult = {
	stdout: string
	stderr: string
	exitCode: number
}

// whitespace splits words and `[v]`-style labels are globs in most shells
const SHELL_QUOTE_PATTERN = /[\s[\]*?]/

export function formatCommand(command: string[]) {
	return command
		.map((part) => (SHELL_QUOTE_PATTERN.test(part) ? `"${part}"` : part))
		.join(' ')
}

export async function runCommand(
	command: string[],
	options: RunCommandOptions = {},
): Promise<CommandResult> {
	const [executable, ...args] = command
	if (!executable) {
		throw new Error('Cannot run an empty command.')
	}
	options.logCommand?.(command)

	const { stdout, stderr, exitCode } = await new Promise<CommandResult>(
		(resolve, reject) => {
			const proc = spawn(executable, args, {
				stdio: ['ignore', 'pipe', 'pipe'],
			})
			const stdoutChunks: Buffer[] = []
			const stderrChunks: Buffer[] = []
			proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk))
			proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk))
			proc.on('error', (error) => {
				reject(
					new ExternalToolError(
						`Failed to start ${executable}: ${error.message}`,
						executable,
					),
				)
			})
			proc.on('close', (code) => {
				resolve({
					stdout: Buffer.concat(stdoutChunks).toString('utf8'),
					stderr: Buffer.concat(stderrChunks).toString('utf8'),
					exitCode: code ?? 1,
				})
			})
		},
	)

	if (exitCode !== 0 && !options.allowFailure) {
		throw new ExternalToolError(
			`Command failed (${exitCode}): ${formatCommand(command)}\n${stderr}`,
			executable,
			{ exitCode, stderr },
		)
	}

	return { stdout, stderr, exitCode }
}

export function formatSeconds(value: number) {
	return `${value.toFixed(2)}s`
}

/**
 * Format a number the way filter graph arguments expect it: whole numbers
 * keep one decimal place (`8` becomes `8.0`), everything else uses the
 * shortest round-trip representation.
 */
export function formatNumber(value: number) {
	if (Number.isInteger(value)) {
		return value.toFixed(1)
	}
	return String(value)
}
