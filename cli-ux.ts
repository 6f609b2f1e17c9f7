import path from 'node:path'
import { readdir, stat } from 'node:fs/promises'
import inquirer from 'inquirer'
import ora, { type Ora } from 'ora'
import type { StepProgressReporter } from './highlights/types'

export type PromptChoice<T> = {
	name: string
	value: T
	short?: string
	description?: string
}

export type Prompter = {
	select<T>(message: string, choices: PromptChoice<T>[]): Promise<T>
	input(
		message: string,
		options?: {
			defaultValue?: string
			validate?: (value: string) => true | string | Promise<true | string>
		},
	): Promise<string>
}

export type PathPicker = {
	pickExistingFile(options: {
		message: string
		startDir?: string
		extensions?: readonly string[]
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
	return (
		typeof error === 'object' &&
		error !== null &&
		'name' in error &&
		error.name === 'ExitPromptError'
	)
}

function handlePromptError(error: unknown): never {
	if (error instanceof PromptCancelled) {
		throw error
	}
	if (isExitPromptError(error)) {
		throw new PromptCancelled()
	}
	throw error
}

async function runPrompt<T>(action: () => Promise<T>): Promise<T> {
	try {
		return await action()
	} catch (error) {
		return handlePromptError(error)
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
	if (process.env.HYPECLIP_FORCE_INTERACTIVE === '1') {
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

export function setActiveSpinnerText(text: string) {
	if (activeSpinner) {
		activeSpinner.text = text
	}
}

const STEP_PROGRESS_BAR_WIDTH = 12
const STEP_PROGRESS_LABEL_MAX = 32
const STEP_PROGRESS_DETAIL_MAX = 26
const STEP_PROGRESS_ACTION_MAX = 24

function clampProgress(value: number) {
	return Math.max(0, Math.min(1, value))
}

function formatPercent(value: number) {
	return `${Math.round(clampProgress(value) * 100)}%`
}

function formatProgressBar(value: number, width = STEP_PROGRESS_BAR_WIDTH) {
	const clamped = clampProgress(value)
	const filled = Math.round(clamped * width)
	return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`
}

function truncateLabel(value: string, maxLength: number) {
	const trimmed = value.trim()
	if (trimmed.length <= maxLength) {
		return trimmed
	}
	return `${trimmed.slice(0, Math.max(0, maxLength - 3))}...`
}

export function createStepProgressReporter(options: {
	action: string
	detail?: string
	maxLabelLength?: number
}): StepProgressReporter {
	let stepIndex = 0
	let stepCount = 1
	let stepLabel = 'Starting'
	const actionLabel = truncateLabel(options.action, STEP_PROGRESS_ACTION_MAX)

	const update = () => {
		const progress = stepCount > 0 ? stepIndex / stepCount : 0
		const detail = options.detail
			? ` | ${truncateLabel(options.detail, STEP_PROGRESS_DETAIL_MAX)}`
			: ''
		const label = truncateLabel(
			stepLabel,
			options.maxLabelLength ?? STEP_PROGRESS_LABEL_MAX,
		)
		setActiveSpinnerText(
			`${actionLabel}${detail} | ${formatPercent(progress)} ${formatProgressBar(progress)} | ${label || 'Working'}`,
		)
	}

	return {
		start({ stepCount: initialCount, label }) {
			stepCount = Math.max(1, Math.round(initialCount))
			stepIndex = 0
			stepLabel = label ?? 'Starting'
			update()
		},
		step(label) {
			stepCount = Math.max(1, Math.round(stepCount))
			stepIndex = Math.min(stepIndex + 1, stepCount)
			stepLabel = label
			update()
		},
		setLabel(label) {
			stepLabel = label
			update()
		},
		finish(label) {
			stepCount = Math.max(1, Math.round(stepCount))
			stepIndex = stepCount
			stepLabel = label ?? 'Complete'
			update()
		},
	}
}

export async function withSpinner<T>(
	text: string,
	action: () => Promise<T>,
	options?: {
		successText?: string
		failText?: string
		enabled?: boolean
	},
): Promise<T> {
	const enabled = options?.enabled ?? isInteractive()
	if (!enabled) {
		return action()
	}
	const spinner = ora({ text }).start()
	activeSpinner = spinner
	try {
		const result = await action()
		spinner.succeed(options?.successText ?? `${text} done`)
		return result
	} catch (error) {
		spinner.fail(options?.failText ?? `${text} failed`)
		throw error
	} finally {
		if (activeSpinner === spinner) {
			activeSpinner = null
		}
	}
}

export function createInquirerPrompter(): Prompter {
	return {
		async select<T>(message: string, choices: PromptChoice<T>[]) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: T }>([
					{
						type: 'list',
						name: 'result',
						message,
						choices,
					},
				])
				return result
			})
		},
		async input(
			message: string,
			options?: {
				defaultValue?: string
				validate?: (value: string) => true | string | Promise<true | string>
			},
		) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: string }>([
					{
						type: 'input',
						name: 'result',
						message,
						default: options?.defaultValue,
						validate: options?.validate,
					},
				])
				return result
			})
		},
	}
}

type FileChoice =
	| { kind: 'file'; path: string }
	| { kind: 'manual' }
	| { kind: 'cancel' }

/**
 * Lists matching files in one directory with a manual entry fallback. Clip
 * sources usually sit next to where the command is run.
 */
export function createPathPicker(prompter: Prompter): PathPicker {
	return {
		async pickExistingFile(options) {
			const currentDir = path.resolve(options.startDir ?? process.cwd())
			const files = await listFiles(currentDir, options.extensions)
			const choices: PromptChoice<FileChoice>[] = [
				...files.map((name) => ({
					name,
					value: { kind: 'file' as const, path: path.join(currentDir, name) },
				})),
				{ name: 'Enter path manually', value: { kind: 'manual' } },
				{ name: 'Cancel', value: { kind: 'cancel' } },
			]
			const selection = await prompter.select(
				`${options.message} (${currentDir})`,
				choices,
			)
			switch (selection.kind) {
				case 'file':
					return selection.path
				case 'cancel':
					throw new PromptCancelled()
				case 'manual': {
					const manual = await prompter.input('Enter path manually', {
						validate: (value) => validateManualPath(value, currentDir),
					})
					return resolveManualPath(manual.trim(), currentDir)
				}
			}
		},
	}
}

function resolveManualPath(value: string, currentDir: string) {
	return path.isAbsolute(value) ? value : path.resolve(currentDir, value)
}

async function validateManualPath(value: string, currentDir: string) {
	const trimmed = resolveOptionalString(value)
	if (!trimmed) {
		return 'Enter a path.'
	}
	const resolved = resolveManualPath(trimmed, currentDir)
	const stats = await stat(resolved).catch(() => null)
	if (!stats) {
		return `Path not found: ${resolved}`
	}
	return stats.isFile() ? true : 'Select a file path.'
}

function matchesExtensions(name: string, extensions?: readonly string[]) {
	if (!extensions || extensions.length === 0) {
		return true
	}
	const lower = name.toLowerCase()
	return extensions.some((extension) => lower.endsWith(extension.toLowerCase()))
}

async function listFiles(currentDir: string, extensions?: readonly string[]) {
	const entries = await readdir(currentDir, { withFileTypes: true })
	return entries
		.filter((entry) => entry.isFile() && matchesExtensions(entry.name, extensions))
		.map((entry) => entry.name)
		.sort((a, b) => a.localeCompare(b))
}
