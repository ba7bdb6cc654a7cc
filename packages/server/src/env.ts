export function getEnvBoolean(key: string, defaultValue = false): boolean {
	const raw = process.env[key]
	if (raw === undefined || raw === '') {
		return defaultValue
	}

	const normalized = raw.trim().toLowerCase()
	if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
	if (['0', 'false', 'no', 'off'].includes(normalized)) return false

	return defaultValue
}

export function getEnvNumber(key: string, defaultValue: number): number {
	const raw = process.env[key]
	if (raw === undefined || raw.trim() === '') {
		return defaultValue
	}

	const value = Number(raw.trim())
	return Number.isFinite(value) ? value : defaultValue
}
