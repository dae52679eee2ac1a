import { PROMPT_ANALYZE_VERSION } from "../../versioning/versions.js"

export function buildAnalyzeMatchSystemPrompt(): string {
  return [
    "You are an HR expert assessing how well a CV fits a job description.",
    "",
    "Rules:",
    "- Base every statement on the CV and job text only. Do NOT invent experience.",
    "- summary: 1-2 sentences.",
    "- strengths: 3-5 short points.",
    "- gaps: 2-4 short points.",
    "- reasoning: 2-3 sentences explaining the assessment.",
    '- recommendation: exactly one of "Proceed to interview", "Consider", "Reject".',
    "- Output MUST be a single JSON object with exactly the keys summary, strengths, gaps, reasoning, recommendation. No commentary."
  ].join("\n")
}

export function buildAnalyzeMatchUserPrompt(cvText: string, jobText: string, score: number): string {
  return [
    `Prompt version: ${PROMPT_ANALYZE_VERSION}`,
    `Similarity score: ${score.toFixed(2)}`,
    "",
    "Job description:",
    "-----",
    jobText,
    "-----",
    "",
    "CV (verbatim):",
    "-----",
    cvText,
    "-----",
    "",
    "Return only the JSON object:",
    '{"summary": "...", "strengths": ["..."], "gaps": ["..."], "reasoning": "...", "recommendation": "..."}'
  ].join("\n")
}
