import { serve } from '@hono/node-server'
import { openStore } from '@layerfarm/db'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { log, setLogLevel } from './lib/log.js'

// ============================================
// Server
// ============================================

async function main() {
  const config = loadConfig()
  setLogLevel(config.logLevel)

  const store = await openStore({ dataDir: config.dataDir, log: log.info })
  const app = createApp(store)

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`layerfarm API http://localhost:${info.port}`)
  })

  let stopping = false
  const shutdown = (signal: string) => {
    if (stopping) return
    stopping = true
    log.info(`${signal} received, shutting down`)
    server.close()
    store
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error(`Failed to close store: ${error instanceof Error ? error.message : String(error)}`)
        process.exit(1)
      })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
