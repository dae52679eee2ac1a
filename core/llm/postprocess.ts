import type { MatchAnalysisPayload } from "./schemas/matchAnalysisSchema.js"

// Trim strings and drop blank list entries so stored rows have no whitespace noise.
export function cleanList(items: readonly string[]): string[] {
  return items.map((s) => s.trim()).filter(Boolean)
}

export function postProcessAnalysis(p: MatchAnalysisPayload): MatchAnalysisPayload {
  return {
    summary: p.summary.trim(),
    strengths: cleanList(p.strengths),
    gaps: cleanList(p.gaps),
    reasoning: p.reasoning.trim(),
    recommendation: p.recommendation.trim(),
  }
}

/**
 * Models sometimes wrap JSON in a Markdown fence even when told not to.
 */
export function stripCodeFences(text: string): string {
  let t = text.trim()
  if (t.startsWith("```")) {
    t = t.replace(/^```(?:json)?\s*\n?/i, "").replace(/\n?```\s*$/, "").trim()
  }
  return t
}
