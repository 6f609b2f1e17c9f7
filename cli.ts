#!/usr/bin/env tsx
import type { Arguments } from 'yargs'
import yargs from 'yargs/yargs'
import { hideBin } from 'yargs/helpers'
import {
	buildTranscriptionPaths,
	runHighlightClips,
	runTranscription,
} from './highlight-clips'
import {
	VIDEO_EXTENSIONS,
	configureExtractCommand,
	configureTranscribeCommand,
	normalizeExtractArgs,
	normalizeTranscribeArgs,
} from './highlights/cli'
import { createHighlightConfig } from './highlights/config'
import { setLogHooks } from './highlights/logging'
import { countFailedClips } from './highlights/summary'
import { cleanupIntermediates } from './highlights/utils/file-utils'
import {
	PromptCancelled,
	createInquirerPrompter,
	createPathPicker,
	createStepProgressReporter,
	isInteractive,
	pauseActiveSpinner,
	resumeActiveSpinner,
	resolveOptionalString,
	type PathPicker,
	type Prompter,
	withSpinner,
} from './cli-ux'

// Some clips failed to encode; the rest were written.
const PARTIAL_FAILURE_EXIT_CODE = 2

type CliUxContext = {
	interactive: boolean
	prompter?: Prompter
	pathPicker?: PathPicker
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
		.scriptName('hypeclip')
		.command(
			'extract [input]',
			'Find keyword moments in a video and export them as clips',
			configureExtractCommand,
			async (argv) => {
				const config = createHighlightConfig(
					normalizeExtractArgs(await resolveInput(argv, context)),
				)
				const summary = await withSpinner(
					'Extracting clips',
					() =>
						withSpinnerLogHooks(() =>
							runHighlightClips(config, {
								progress: createStepProgressReporter({
									action: 'Encoding',
									detail: config.inputPath,
								}),
							}),
						),
					{ successText: 'Extraction complete', enabled: context.interactive },
				)
				if (countFailedClips(summary) > 0) {
					process.exitCode = PARTIAL_FAILURE_EXIT_CODE
				}
			},
		)
		.command(
			'transcribe [input]',
			'Transcribe a video and write the transcript file',
			configureTranscribeCommand,
			async (argv) => {
				const config = createHighlightConfig(
					normalizeTranscribeArgs(await resolveInput(argv, context)),
				)
				const { tmpDir, intermediatePaths } = buildTranscriptionPaths(config)
				try {
					await withSpinner(
						'Transcribing audio',
						() => withSpinnerLogHooks(() => runTranscription(config)),
						{
							successText: 'Transcription complete',
							enabled: context.interactive,
						},
					)
				} finally {
					if (!config.keepIntermediates) {
						await cleanupIntermediates(intermediatePaths, tmpDir)
					}
				}
			},
		)
		.demandCommand(1)
		.strict()
		.help()

	await parser.parseAsync()
}

async function withSpinnerLogHooks<T>(action: () => Promise<T>) {
	setLogHooks({ beforeLog: pauseActiveSpinner, afterLog: resumeActiveSpinner })
	try {
		return await action()
	} finally {
		setLogHooks({})
	}
}

function createCliUxContext(): CliUxContext {
	const interactive = isInteractive()
	if (!interactive) {
		return { interactive }
	}
	const prompter = createInquirerPrompter()
	const pathPicker = createPathPicker(prompter)
	return { interactive, prompter, pathPicker }
}

async function promptForCommand(
	prompter: Prompter,
): Promise<string[] | null> {
	const selection = await prompter.select('Choose a command', [
		{
			name: 'Find keyword moments and export clips',
			value: 'extract',
		},
		{
			name: 'Transcribe a video',
			value: 'transcribe',
		},
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

async function resolveInput(
	argv: Arguments,
	context: CliUxContext,
): Promise<Arguments> {
	if (resolveOptionalString(argv.input)) {
		return argv
	}
	if (!context.interactive || !context.pathPicker) {
		throw new Error('Input video file is required.')
	}
	const input = await context.pathPicker.pickExistingFile({
		message: 'Select input video file',
		extensions: VIDEO_EXTENSIONS,
	})
	return { ...argv, input }
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
