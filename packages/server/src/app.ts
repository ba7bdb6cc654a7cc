import express, {
	type ErrorRequestHandler,
	type Express,
	type NextFunction,
	type Request,
	type Response,
} from 'express'
import morgan from 'morgan'
import multer from 'multer'
import { DecodeError, extractMetadata, loadImage, UnsupportedFormatError } from 'pixmeta'

/** Settings the app reads; see config.ts for the environment defaults */
export interface AppConfig {
	nodeEnv: string
	maxUploadBytes: number
	topColors: number
	hashSize: number
	logRequests: boolean
}

interface HttpError {
	status: number
	message: string
}

/**
 * Reject settings every request would fail on
 *
 * Throws a RangeError naming the environment variable to fix.
 */
export function validateConfig(config: AppConfig): void {
	const positive: Array<[string, number]> = [
		['MAX_UPLOAD_BYTES', config.maxUploadBytes],
		['TOP_COLORS', config.topColors],
		['HASH_SIZE', config.hashSize],
	]
	for (const [name, value] of positive) {
		if (!Number.isInteger(value) || value < 1) {
			throw new RangeError(`${name} must be a positive integer, got ${value}`)
		}
	}
	if (config.hashSize < 2 || (config.hashSize & (config.hashSize - 1)) !== 0) {
		throw new RangeError(`HASH_SIZE must be a power of two of at least 2, got ${config.hashSize}`)
	}
}

export function createApp(config: AppConfig): Express {
	validateConfig(config)
	const app = express()

	// logging
	if (config.logRequests) {
		app.use(morgan(config.nodeEnv === 'production' ? 'combined' : 'dev'))
	}

	const upload = multer({
		storage: multer.memoryStorage(),
		limits: { fileSize: config.maxUploadBytes, files: 1 },
	})

	app.get('/health', (_req: Request, res: Response) => {
		res.json({ status: 'ok' })
	})

	app.post('/extract', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
		const file = req.file
		if (!file) {
			res.status(400).json({ error: 'No file uploaded (expected multipart field "file")' })
			return
		}

		try {
			const started = Date.now()
			const decoded = await loadImage(file.buffer, { filename: file.originalname })
			const record = extractMetadata(decoded, { topColors: config.topColors, hashSize: config.hashSize })
			console.log(`[extract] ${file.originalname}: ${record.width}x${record.height} in ${Date.now() - started}ms`)
			res.json(record)
		} catch (err) {
			next(err)
		}
	})

	// error handler
	const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
		const { status, message } = toHttpError(err, config)
		if (status >= 500) {
			console.error('[server error]', err)
		}
		res.status(status).json({ error: message })
	}
	app.use(handleError)

	return app
}

function toHttpError(err: unknown, config: AppConfig): HttpError {
	if (err instanceof multer.MulterError) {
		if (err.code === 'LIMIT_FILE_SIZE') {
			return { status: 413, message: `File exceeds the ${config.maxUploadBytes}-byte upload limit` }
		}
		return { status: 400, message: err.message }
	}
	if (err instanceof UnsupportedFormatError) {
		return { status: 400, message: err.message }
	}
	if (err instanceof DecodeError) {
		return { status: 422, message: err.message }
	}
	return { status: 500, message: 'Internal Server Error' }
}
