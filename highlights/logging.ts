import { formatCommand } from '../utils'

type LogHook = () => void

let beforeLogHook: LogHook | null = null
let afterLogHook: LogHook | null = null

// Lets an active spinner step aside while a line is printed.
export function setLogHooks(hooks: {
	beforeLog?: LogHook
	afterLog?: LogHook
}) {
	beforeLogHook = hooks.beforeLog ?? null
	afterLogHook = hooks.afterLog ?? null
}

function withLogHooks(callback: () => void) {
	beforeLogHook?.()
	try {
		callback()
	} finally {
		afterLogHook?.()
	}
}

export function logCommand(command: string[]) {
	withLogHooks(() => {
		console.log(`[cmd] ${formatCommand(command)}`)
	})
}

export function logInfo(message: string) {
	withLogHooks(() => {
		console.log(`[info] ${message}`)
	})
}

export function logWarn(message: string) {
	withLogHooks(() => {
		console.warn(`[warn] ${message}`)
	})
}
