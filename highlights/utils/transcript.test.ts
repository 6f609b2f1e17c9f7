import { test, expect } from 'vitest'
import path from 'node:path'
import os from 'node:os'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import {
	formatTranscriptLine,
	formatTranscriptLines,
	writeTranscriptFile,
} from './transcript'
import type { Token } from '../types'

function createToken(start: number, end: number, text: string): Token {
	return { start, end, text }
}

test('formatTranscriptLine prints two-decimal range and trimmed text', () => {
	expect(formatTranscriptLine(createToken(1, 2.456, ' lol that was wild '))).toBe(
		'1.00 --> 2.46: lol that was wild',
	)
})

test('formatTranscriptLines keeps token order', () => {
	expect(
		formatTranscriptLines([createToken(3, 4, 'b'), createToken(0, 1, 'a')]),
	).toEqual(['3.00 --> 4.00: b', '0.00 --> 1.00: a'])
})

test('writeTranscriptFile writes one line per token', async () => {
	const tmpDir = await mkdtemp(path.join(os.tmpdir(), 'transcript-'))
	try {
		const transcriptPath = path.join(tmpDir, 'nested', 'transcript.txt')
		await writeTranscriptFile(transcriptPath, [
			createToken(0, 1.5, 'hello'),
			createToken(1.5, 3, 'hahaha'),
		])
		expect(await readFile(transcriptPath, 'utf8')).toBe(
			'0.00 --> 1.50: hello\n1.50 --> 3.00: hahaha\n',
		)
	} finally {
		await rm(tmpDir, { recursive: true, force: true })
	}
})

test('writeTranscriptFile writes an empty file for an empty transcript', async () => {
	const tmpDir = await mkdtemp(path.join(os.tmpdir(), 'transcript-'))
	try {
		const transcriptPath = path.join(tmpDir, 'transcript.txt')
		await writeTranscriptFile(transcriptPath, [])
		expect(await readFile(transcriptPath, 'utf8')).toBe('')
	} finally {
		await rm(tmpDir, { recursive: true, force: true })
	}
})
