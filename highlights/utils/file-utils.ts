import { readdir, rm, rmdir } from 'node:fs/promises'
import { logWarn } from '../logging'

function errorCode(error: unknown) {
	return error && typeof error === 'object' && 'code' in error
		? String(error.code)
		: undefined
}

function describeError(error: unknown) {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Delete intermediate files, then the directory that held them if nothing
 * else is left in it. Failures are logged; cleanup never fails a run.
 */
export async function cleanupIntermediates(
	filePaths: readonly string[],
	dirPath?: string,
) {
	for (const filePath of filePaths) {
		try {
			await rm(filePath, { force: true })
		} catch (error) {
			logWarn(`Failed to delete ${filePath}: ${describeError(error)}`)
		}
	}
	if (dirPath) {
		await removeDirIfEmpty(dirPath)
	}
}

export async function removeDirIfEmpty(dirPath: string): Promise<boolean> {
	try {
		const entries = await readdir(dirPath)
		if (entries.length > 0) {
			return false
		}
		await rmdir(dirPath)
		return true
	} catch (error) {
		const code = errorCode(error)
		if (code !== 'ENOENT' && code !== 'ENOTEMPTY') {
			logWarn(`Failed to remove directory ${dirPath}: ${describeError(error)}`)
		}
		return false
	}
}
