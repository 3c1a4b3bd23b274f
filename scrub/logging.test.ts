import { afterEach, expect, test, vi } from 'vitest'
import { logCommand, logInfo, logWarn, setLogHooks } from './logging'

afterEach(() => {
	setLogHooks({})
	vi.restoreAllMocks()
})

test('logInfo prefixes messages', () => {
	const log = vi.spyOn(console, 'log').mockImplementation(() => {})
	logInfo('found 3 silences')
	expect(log).toHaveBeenCalledWith('[info] found 3 silences')
})

test('logWarn writes to stderr with a prefix', () => {
	const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
	logWarn('no silences detected')
	expect(warn).toHaveBeenCalledWith('[warn] no silences detected')
})

test('logCommand formats the command line', () => {
	const log = vi.spyOn(console, 'log').mockImplementation(() => {})
	logCommand(['ffmpeg', '-i', 'my talk.mkv'])
	expect(log).toHaveBeenCalledWith('[cmd] ffmpeg -i "my talk.mkv"')
})

test('log hooks run around each message', () => {
	const calls: string[] = []
	vi.spyOn(console, 'log').mockImplementation(() => {
		calls.push('log')
	})
	setLogHooks({
		beforeLog: () => calls.push('before'),
		afterLog: () => calls.push('after'),
	})
	logInfo('hello')
	expect(calls).toEqual(['before', 'log', 'after'])
})

test('afterLog runs even when writing the line throws', () => {
	const calls: string[] = []
	vi.spyOn(console, 'warn').mockImplementation(() => {
		throw new Error('stream closed')
	})
	setLogHooks({ afterLog: () => calls.push('after') })
	expect(() => logWarn('disk full')).toThrow('stream closed')
	expect(calls).toEqual(['after'])
})
