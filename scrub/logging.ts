import { formatCommand } from '../utils'

export type LogHooks = {
	beforeLog?: () => void
	afterLog?: () => void
}

type LogChannel = {
	prefix: string
	write: (line: string) => void
}

const CHANNELS = {
	cmd: { prefix: '[cmd]', write: (line) => console.log(line) },
	info: { prefix: '[info]', write: (line) => console.log(line) },
	warn: { prefix: '[warn]', write: (line) => console.warn(line) },
} satisfies Record<string, LogChannel>

let hooks: LogHooks = {}

/**
 * Install callbacks that run around every log line, e.g. to stop a spinner
 * while the line is printed. Pass `{}` to clear them.
 */
export function setLogHooks(next: LogHooks) {
	hooks = next
}

function emit(channel: LogChannel, message: string) {
	hooks.beforeLog?.()
	try {
		channel.write(`${channel.prefix} ${message}`)
	} finally {
		hooks.afterLog?.()
	}
}

export function logCommand(command: string[]) {
	emit(CHANNELS.cmd, formatCommand(command))
}

export function logInfo(message: string) {
	emit(CHANNELS.info, message)
}

export function logWarn(message: string) {
	emit(CHANNELS.warn, message)
}
