import { parseLogLevel, type LogLevel } from "./log.js"

export interface AppConfig {
  port: number
  databasePath: string
  migrationsDir: string
  openai: {
    apiKey: string
    baseUrl: string
    embeddingModel: string
    completionModel: string
    timeoutMs: number
    maxAttempts: number
  }
  auth: {
    jwtSecret: string
    accessTokenExpireMinutes: number
    refreshTokenExpireDays: number
    clientTokenExpireSeconds: number
    defaultRateLimitPerHour: number
  }
  maxUploadBytes: number
  logLevel: LogLevel
}

export class ConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`)
    this.name = "ConfigError"
  }
}

type Env = Record<string, string | undefined>

function num(raw: string | undefined, fallback: number): number {
  const n = Number(raw || fallback)
  return Number.isFinite(n) ? n : fallback
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing = ["OPENAI_API_KEY", "JWT_SECRET"].filter((k) => !env[k]?.trim())
  if (missing.length) throw new ConfigError(missing)

  return Object.freeze({
    port: num(env.PORT, 8080),
    databasePath: env.DATABASE_PATH || "./shortlist.db",
    migrationsDir: env.MIGRATIONS_DIR || "./migrations",
    openai: {
      apiKey: env.OPENAI_API_KEY ?? "",
      baseUrl: env.OPENAI_BASE_URL || "https://api.openai.com/v1",
      embeddingModel: env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
      completionModel: env.OPENAI_COMPLETION_MODEL || "gpt-4o-mini",
      timeoutMs: num(env.OPENAI_TIMEOUT_MS, 25000),
      maxAttempts: Math.max(1, num(env.OPENAI_MAX_ATTEMPTS, 3)),
    },
    auth: {
      jwtSecret: env.JWT_SECRET ?? "",
      accessTokenExpireMinutes: num(env.ACCESS_TOKEN_EXPIRE_MINUTES, 30),
      refreshTokenExpireDays: num(env.REFRESH_TOKEN_EXPIRE_DAYS, 7),
      clientTokenExpireSeconds: num(env.CLIENT_TOKEN_EXPIRE_SECONDS, 3600),
      defaultRateLimitPerHour: num(env.DEFAULT_RATE_LIMIT_PER_HOUR, 1000),
    },
    maxUploadBytes: num(env.MAX_UPLOAD_BYTES, 6 * 1024 * 1024),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  })
}
