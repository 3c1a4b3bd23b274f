import path from 'node:path'
import { readdir, stat } from 'node:fs/promises'
import inquirer from 'inquirer'
import ora, { type Ora } from 'ora'
import type { StepProgressReporter } from './progress-reporter'

export type PromptChoice<T> = {
	name: string
	value: T
	short?: string
}

type Validate = (value: string) => true | string | Promise<true | string>

export type Prompter = {
	select<T>(message: string, choices: PromptChoice<T>[]): Promise<T>
	input(
		message: string,
		options?: { defaultValue?: string; validate?: Validate },
	): Promise<string>
	confirm(
		message: string,
		options?: { defaultValue?: boolean },
	): Promise<boolean>
}

export type FilePicker = {
	pickExistingFile(options: {
		message: string
		startDir?: string
		extensions?: string[]
	}): Promise<string>
}

export class PromptCancelled extends Error {
	constructor(message = 'Prompt cancelled.') {
		super(message)
		this.name = 'PromptCancelled'
	}
}

function isExitPromptError(error: unknown) {
	if (error instanceof Error) {
		return (
			error.name === 'ExitPromptError' ||
			error.message.includes('User force closed the prompt')
		)
	}
	return false
}

async function runPrompt<T>(action: () => Promise<T>): Promise<T> {
	try {
		return await action()
	} catch (error) {
		if (isExitPromptError(error)) {
			throw new PromptCancelled()
		}
		throw error
	}
}

export function resolveOptionalString(value: unknown) {
	if (typeof value !== 'string') {
		return undefined
	}
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : undefined
}

export function isInteractive() {
	if (process.env.SCRUBGRAPH_FORCE_INTERACTIVE === '1') {
		return true
	}
	if (process.env.CI) {
		return false
	}
	return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}

let activeSpinner: Ora | null = null

export function pauseActiveSpinner() {
	if (activeSpinner?.isSpinning) {
		activeSpinner.stop()
	}
}

export function resumeActiveSpinner() {
	if (activeSpinner && !activeSpinner.isSpinning) {
		activeSpinner.start()
	}
}

const PROGRESS_BAR_WIDTH = 12
const PROGRESS_LABEL_MAX = 32

export function formatProgressBar(value: number, width = PROGRESS_BAR_WIDTH) {
	const clamped = Math.max(0, Math.min(1, value))
	const filled = Math.round(clamped * width)
	return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${Math.round(clamped * 100)}%`
}

export function truncateLabel(value: string, maxLength = PROGRESS_LABEL_MAX) {
	const trimmed = value.trim()
	if (trimmed.length <= maxLength) {
		return trimmed
	}
	return `${trimmed.slice(0, Math.max(0, maxLength - 3))}...`
}

/**
 * Reports "file n of m" progress through the active spinner text.
 */
export function createStepProgressReporter(action: string): StepProgressReporter {
	let stepIndex = 0
	let stepCount = 1
	let stepLabel = 'Starting'

	const update = () => {
		if (!activeSpinner) {
			return
		}
		activeSpinner.text = `${action} | ${formatProgressBar(stepIndex / stepCount)} | ${truncateLabel(stepLabel) || 'Working'}`
	}

	return {
		start({ stepCount: count, label }) {
			stepCount = Math.max(1, Math.round(count))
			stepIndex = 0
			stepLabel = label ?? 'Starting'
			update()
		},
		step(label) {
			stepIndex = Math.min(stepIndex + 1, stepCount)
			stepLabel = label
			update()
		},
		finish(label) {
			stepIndex = stepCount
			stepLabel = label ?? 'Complete'
			update()
		},
	}
}

export async function withSpinner<T>(
	text: string,
	action: () => Promise<T>,
	options: {
		successText?: string
		failText?: string
		enabled?: boolean
	} = {},
): Promise<T> {
	if (!(options.enabled ?? isInteractive())) {
		return action()
	}
	const spinner = ora({ text }).start()
	activeSpinner = spinner
	const release = () => {
		if (activeSpinner === spinner) {
			activeSpinner = null
		}
	}
	return action().then(
		(result) => {
			release()
			spinner.succeed(options.successText ?? `${text} done`)
			return result
		},
		(error: unknown) => {
			release()
			spinner.fail(options.failText ?? `${text} failed`)
			throw error
		},
	)
}

type Answer<T> = { answer: T }

async function ask<T>(prompt: () => Promise<Answer<T>>): Promise<T> {
	const { answer } = await runPrompt(prompt)
	return answer
}

export function createInquirerPrompter(): Prompter {
	return {
		select<T>(message: string, choices: PromptChoice<T>[]) {
			return ask(() =>
				inquirer.prompt<Answer<T>>([
					{ type: 'list', name: 'answer', message, choices },
				]),
			)
		},
		input(message, { defaultValue, validate } = {}) {
			return ask(() =>
				inquirer.prompt<Answer<string>>([
					{ type: 'input', name: 'answer', message, default: defaultValue, validate },
				]),
			)
		},
		confirm(message, { defaultValue = false } = {}) {
			return ask(() =>
				inquirer.prompt<Answer<boolean>>([
					{ type: 'confirm', name: 'answer', message, default: defaultValue },
				]),
			)
		},
	}
}

type ExplorerChoice =
	| { kind: 'up' }
	| { kind: 'manual' }
	| { kind: 'cancel' }
	| { kind: 'dir'; path: string }
	| { kind: 'file'; path: string }

const IGNORED_DIRS = new Set(['node_modules', '.git', '.cache'])

/**
 * Directory browser on top of `select`; only files matching `extensions`
 * are offered.
 */
export function createFilePicker(prompter: Prompter): FilePicker {
	let lastDir: string | undefined
	return {
		async pickExistingFile(options) {
			let currentDir = await resolveStartDir(options.startDir ?? lastDir)
			while (true) {
				const selection = await prompter.select(
					`${options.message} (${currentDir})`,
					await buildExplorerChoices(currentDir, options.extensions),
				)
				switch (selection.kind) {
					case 'up':
						currentDir = path.dirname(currentDir)
						break
					case 'dir':
						currentDir = selection.path
						break
					case 'file':
						lastDir = path.dirname(selection.path)
						return selection.path
					case 'manual': {
						const manual = await prompter.input('Enter path manually', {
							validate: (value) => validateFilePath(value, currentDir),
						})
						const resolved = path.resolve(currentDir, manual.trim())
						lastDir = path.dirname(resolved)
						return resolved
					}
					case 'cancel':
						throw new PromptCancelled()
				}
			}
		},
	}
}

async function resolveStartDir(startDir?: string) {
	const candidate = startDir ?? process.cwd()
	try {
		const stats = await stat(candidate)
		return stats.isDirectory() ? candidate : path.dirname(candidate)
	} catch {
		return process.cwd()
	}
}

async function validateFilePath(value: string, currentDir: string) {
	const trimmed = resolveOptionalString(value)
	if (!trimmed) {
		return 'Enter a path.'
	}
	const resolved = path.resolve(currentDir, trimmed)
	try {
		const stats = await stat(resolved)
		return stats.isFile() ? true : 'Select a file path.'
	} catch {
		return `Path not found: ${resolved}`
	}
}

function matchesExtensions(name: string, extensions?: string[]) {
	if (!extensions || extensions.length === 0) {
		return true
	}
	const lower = name.toLowerCase()
	return extensions.some((extension) => lower.endsWith(extension.toLowerCase()))
}

async function buildExplorerChoices(
	currentDir: string,
	extensions?: string[],
): Promise<PromptChoice<ExplorerChoice>[]> {
	const entries = await readdir(currentDir, { withFileTypes: true })
	const byName = (a: { name: string }, b: { name: string }) =>
		a.name.localeCompare(b.name)
	const choices: PromptChoice<ExplorerChoice>[] = []
	if (path.dirname(currentDir) !== currentDir) {
		choices.push({ name: '../ (up)', value: { kind: 'up' } })
	}
	for (const entry of entries
		.filter((entry) => entry.isDirectory() && !IGNORED_DIRS.has(entry.name))
		.sort(byName)) {
		choices.push({
			name: `${entry.name}/`,
			value: { kind: 'dir', path: path.join(currentDir, entry.name) },
		})
	}
	for (const entry of entries
		.filter((entry) => entry.isFile() && matchesExtensions(entry.name, extensions))
		.sort(byName)) {
		choices.push({
			name: entry.name,
			value: { kind: 'file', path: path.join(currentDir, entry.name) },
		})
	}
	choices.push({ name: 'Enter path manually', value: { kind: 'manual' } })
	choices.push({ name: 'Cancel', value: { kind: 'cancel' } })
	return choices
}
