// Structured one-line JSON logs (view with `jq` or any log shipper).

export type LogLevel = "debug" | "info" | "error" | "silent"

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, error: 30, silent: 100 }

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  child(fields: LogFields): Logger
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const v = (raw || "").toLowerCase()
  return v === "debug" || v === "info" || v === "error" || v === "silent" ? v : "info"
}

export function createLogger(level: LogLevel, base: LogFields = {}): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level]

  const line = (msg: string, fields: LogFields | undefined) =>
    JSON.stringify({ msg, ...base, ...fields, ts: new Date().toISOString() })

  return {
    debug(msg, fields) {
      if (enabled("debug")) console.log(line(msg, fields))
    },
    info(msg, fields) {
      if (enabled("info")) console.log(line(msg, fields))
    },
    error(msg, fields) {
      if (enabled("error")) console.error(line(msg, fields))
    },
    child(fields) {
      return createLogger(level, { ...base, ...fields })
    },
  }
}
