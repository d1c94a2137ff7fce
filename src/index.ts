import { createServer } from "node:http"
import { createServerContext } from "./app"
import { loadConfig } from "./config"
import { createRequestListener } from "./server"

const config = loadConfig()
const ctx = createServerContext(config)
const { loggers, db } = ctx

const purgeTimer = setInterval(() => {
  try {
    const removed = db.purgeExpiredData(config.retentionDays)
    loggers.app.debug({ removed }, "purged expired audit entries")
  } catch (error) {
    loggers.app.error({ error }, "failed to purge expired data")
  }
}, 30 * 60 * 1000)
purgeTimer.unref()

const server = createServer(createRequestListener(ctx))

server.listen(config.port, config.host, () => {
  loggers.app.info(
    {
      host: config.host,
      port: config.port,
      defaultAction: config.defaultSettings.action,
      providers: config.defaultSettings.providers,
      rulesPath: config.rulesPath ?? null,
      geoipPath: config.geoipPath ?? null,
    },
    "portcullis started",
  )

  console.log(`portcullis listening on http://${config.host}:${config.port}`)
})

function shutdown(signal: string): void {
  loggers.app.info({ signal }, "portcullis shutting down")
  clearInterval(purgeTimer)
  server.close(() => {
    db.close()
    process.exit(0)
  })
}

process.on("SIGINT", () => shutdown("SIGINT"))
process.on("SIGTERM", () => shutdown("SIGTERM"))
