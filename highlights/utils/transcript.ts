import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { Token } from '../types'

export function formatTranscriptLine(token: Token): string {
	return `${token.start.toFixed(2)} --> ${token.end.toFixed(2)}: ${token.text.trim()}`
}

export function formatTranscriptLines(tokens: readonly Token[]): string[] {
	return tokens.map(formatTranscriptLine)
}

/**
 * Write every token on its own line. The file is for people to read; nothing
 * downstream parses it.
 */
export async function writeTranscriptFile(
	transcriptPath: string,
	tokens: readonly Token[],
) {
	await mkdir(path.dirname(transcriptPath), { recursive: true })
	const lines = formatTranscriptLines(tokens)
	await writeFile(
		transcriptPath,
		lines.length > 0 ? `${lines.join('\n')}\n` : '',
		'utf8',
	)
}
