import dotenv from 'dotenv'
import type { AppConfig } from './app'
import { getEnvBoolean, getEnvNumber } from './env'

dotenv.config()

export const NODE_ENV = process.env.NODE_ENV ?? 'development'
export const PORT = getEnvNumber('PORT', 5000)
export const HOST = process.env.HOST || (NODE_ENV === 'production' ? '0.0.0.0' : '127.0.0.1')

export const MAX_UPLOAD_BYTES = getEnvNumber('MAX_UPLOAD_BYTES', 25 * 1024 * 1024)
export const TOP_COLORS = getEnvNumber('TOP_COLORS', 5)
export const HASH_SIZE = getEnvNumber('HASH_SIZE', 8)

export const LOG_REQUESTS = getEnvBoolean('LOG_REQUESTS', true)

export interface ServerConfig extends AppConfig {
	port: number
	host: string
}

export const config: ServerConfig = {
	nodeEnv: NODE_ENV,
	port: PORT,
	host: HOST,
	maxUploadBytes: MAX_UPLOAD_BYTES,
	topColors: TOP_COLORS,
	hashSize: HASH_SIZE,
	logRequests: LOG_REQUESTS,
}
