// JSON columns come back from SQLite as TEXT; parse them without trusting them.

export function safeJson(input: string | null | undefined): unknown {
  if (input == null || !input.trim()) return null
  try {
    return JSON.parse(input)
  } catch {
    return null
  }
}

export function jsonStringArray(input: string | null | undefined): string[] {
  const v = safeJson(input)
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : []
}

export function jsonNumberArray(input: string | null | undefined): number[] {
  const v = safeJson(input)
  return Array.isArray(v) ? v.filter((x): x is number => typeof x === "number") : []
}

export function jsonStringRecord(input: string | null | undefined): Record<string, string> | null {
  const v = safeJson(input)
  if (typeof v !== "object" || v === null || Array.isArray(v)) return null
  const out: Record<string, string> = {}
  for (const [k, val] of Object.entries(v)) {
    if (typeof val === "string") out[k] = val
  }
  return out
}
