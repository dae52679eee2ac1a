// Best-effort heuristics over extracted document text.
// Results are advisory: callers must cope with null.

export type ContactInfo = {
  email: string | null
  phone: string | null
}

const EMAIL_RE = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/
const PHONE_RE = /(\+?1?[-.\s]?)?\(?([0-9]{3})\)?[-.\s]?([0-9]{3})[-.\s]?([0-9]{4})/

export function normalizeDocumentText(raw: string): string {
  return raw
    .normalize("NFKC")
    .replace(/\u00a0/g, " ")
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
}

/**
 * First of the first 10 non-empty lines that is 3..99 chars long and has no digit.
 * Resumes usually open with the candidate's name; this is a guess, not a parse.
 */
export function extractCandidateName(text: string): string | null {
  const lines = text
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean)
    .slice(0, 10)

  for (const line of lines) {
    if (line.length >= 3 && line.length <= 99 && !/\d/.test(line)) return line
  }
  return null
}

export function formatPhone(area: string, exchange: string, line: string): string {
  return `+1-${area}-${exchange}-${line}`
}

/**
 * First email and first phone-shaped token anywhere in the text.
 * Null (not an empty object) when neither is present.
 */
export function extractContactInfo(text: string): ContactInfo | null {
  const email = text.match(EMAIL_RE)?.[0] ?? null

  const pm = text.match(PHONE_RE)
  const phone = pm ? formatPhone(pm[2], pm[3], pm[4]) : null

  if (!email && !phone) return null
  return { email, phone }
}
