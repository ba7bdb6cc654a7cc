import { afterEach, describe, expect, it } from 'vitest'
import { getEnvBoolean, getEnvNumber } from './env'

describe('getEnvBoolean', () => {
	const ORIGINAL_ENV = { ...process.env }

	afterEach(() => {
		process.env = { ...ORIGINAL_ENV }
	})

	it('returns default when unset', () => {
		delete process.env.TEST_FLAG
		expect(getEnvBoolean('TEST_FLAG', false)).toBe(false)
		expect(getEnvBoolean('TEST_FLAG', true)).toBe(true)
	})

	it('treats truthy strings as true', () => {
		for (const v of ['1', 'true', 'yes', 'on', ' TRUE  ']) {
			process.env.TEST_FLAG = v
			expect(getEnvBoolean('TEST_FLAG', false)).toBe(true)
		}
	})

	it('treats falsy strings as false', () => {
		for (const v of ['0', 'false', 'no', 'off', ' False ']) {
			process.env.TEST_FLAG = v
			expect(getEnvBoolean('TEST_FLAG', true)).toBe(false)
		}
	})
})

describe('getEnvNumber', () => {
	const ORIGINAL_ENV = { ...process.env }

	afterEach(() => {
		process.env = { ...ORIGINAL_ENV }
	})

	it('parses numeric values', () => {
		process.env.TEST_PORT = ' 8080 '
		expect(getEnvNumber('TEST_PORT', 5000)).toBe(8080)
	})

	it('falls back on missing or invalid values', () => {
		delete process.env.TEST_PORT
		expect(getEnvNumber('TEST_PORT', 5000)).toBe(5000)
		process.env.TEST_PORT = 'eighty'
		expect(getEnvNumber('TEST_PORT', 5000)).toBe(5000)
	})
})
