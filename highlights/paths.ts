import path from 'node:path'

export function formatClipFilename(index: number, container: string) {
	return `clip-${String(index).padStart(2, '0')}${container}`
}

export function buildClipOutputPath(
	outputDir: string,
	index: number,
	container: string,
) {
	return path.join(outputDir, formatClipFilename(index, container))
}

export function buildSummaryLogPath(outputDir: string) {
	return path.join(outputDir, 'hypeclip-summary.log')
}

export function buildIntermediateDir(outputDir: string) {
	return path.join(outputDir, '.tmp')
}

export function buildTranscriptionAudioPath(tmpDir: string, inputPath: string) {
	return path.join(tmpDir, `${path.parse(inputPath).name}-transcribe.wav`)
}

// whisper.cpp appends .json/.txt to this base.
export function buildTranscriptionOutputBase(tmpDir: string, inputPath: string) {
	return path.join(tmpDir, `${path.parse(inputPath).name}-transcribe`)
}
