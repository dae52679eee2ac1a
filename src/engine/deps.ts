import type { EmbeddingProvider } from "../../core/llm/adapter.js"
import type { MatchAnalyzer } from "../../core/llm/analyzer.js"
import type { Db } from "../../infra/db/database.js"
import type { Logger } from "../lib/log.js"

// Constructed once at startup (src/server.ts) and passed down; tests build their own.
export type EngineDeps = {
  db: Db
  embedder: EmbeddingProvider
  analyzer: MatchAnalyzer
  log: Logger
  clock: () => Date
}
