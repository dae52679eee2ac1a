import type { Server } from "http"
import { MatchAnalyzer } from "../core/llm/analyzer.js"
import { ENGINE_VERSION } from "../core/versioning/versions.js"
import { openDatabase } from "../infra/db/database.js"
import { OpenAIAdapter } from "../infra/openai-adapter.js"
import { createApp } from "./index.js"
import { AuthService } from "./lib/auth.js"
import { ConfigError, loadConfig } from "./lib/config.js"
import { createLogger, parseLogLevel } from "./lib/log.js"
import { errorMessage } from "./lib/errors.js"

function main(): void {
  const config = loadConfig()
  const log = createLogger(config.logLevel, { service: "cv-shortlist-api" })
  const clock = () => new Date()

  const db = openDatabase(config.databasePath, config.migrationsDir)

  const openai = new OpenAIAdapter({ ...config.openai, log })
  const deps = {
    db,
    embedder: openai,
    analyzer: new MatchAnalyzer(openai, log),
    log,
    clock,
    auth: new AuthService(db, config.auth, clock, log),
    maxUploadBytes: config.maxUploadBytes,
  }

  const server: Server = createApp(deps).listen(config.port, () => {
    log.info("server_listening", { port: config.port, engineVersion: ENGINE_VERSION })
  })

  let closing = false
  const shutdown = (signal: string) => {
    if (closing) return
    closing = true
    log.info("server_shutdown", { signal })
    server.close((err) => {
      if (err) log.error("server_close_failed", { err: err.message })
      db.close()
      process.exit(err ? 1 : 0)
    })
  }
  process.on("SIGINT", () => shutdown("SIGINT"))
  process.on("SIGTERM", () => shutdown("SIGTERM"))
}

try {
  main()
} catch (e: unknown) {
  const log = createLogger(parseLogLevel(process.env.LOG_LEVEL))
  log.error(e instanceof ConfigError ? "config_error" : "startup_failed", { err: errorMessage(e) })
  process.exit(1)
}
