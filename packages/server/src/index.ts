import { createApp } from './app'
import { config } from './config'

const app = createApp(config)

const server = app.listen(config.port, config.host, () => {
	console.log(`[server] listening on http://${config.host}:${config.port} (${config.nodeEnv})`)
})

server.on('error', (err) => {
	console.error('[server] failed to start:', err)
	process.exit(1)
})

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
	process.on(signal, () => {
		console.log(`[server] ${signal} received, closing`)
		server.close(() => process.exit(0))
	})
}
