import type { CompletionProvider } from "./adapter.js"
import { buildAnalyzeMatchSystemPrompt, buildAnalyzeMatchUserPrompt } from "./prompts/analyzeMatch.js"
import { buildExtractRequirementsSystemPrompt, buildExtractRequirementsUserPrompt } from "./prompts/extractRequirements.js"
import { matchAnalysisSchema, requirementsSchema } from "./schemas/matchAnalysisSchema.js"
import { cleanList, postProcessAnalysis, stripCodeFences } from "./postprocess.js"
import type { AnalysisSource, Recommendation } from "../domain/shortlist.js"
import { errorMessage } from "../../src/lib/errors.js"
import type { Logger } from "../../src/lib/log.js"

export type MatchAnalysis = {
  summary: string
  strengths: string[]
  gaps: string[]
  reasoning: string
  recommendation: Recommendation
  source: AnalysisSource
  // Why the fallback was used; null on the primary path.
  error: string | null
}

export const REQUIREMENTS_FAILED = "Requirements extraction failed"

const ANALYZE_TEMPERATURE = 0.3
const ANALYZE_MAX_TOKENS = 500
const REQUIREMENTS_TEMPERATURE = 0.2
const REQUIREMENTS_MAX_TOKENS = 200

export function fallbackRecommendation(score: number): Recommendation {
  return score > 0.5 ? "Consider" : "Reject"
}

/**
 * Templated assessment used whenever the completion path fails.
 * Pure and total: it cannot throw.
 */
export function fallbackAnalysis(score: number, cause: string): MatchAnalysis {
  const s = Number.isFinite(score) ? score.toFixed(2) : String(score)
  return {
    summary: `Analysis based on similarity score of ${s}`,
    strengths: ["Content analysis unavailable"],
    gaps: ["Content analysis unavailable"],
    reasoning: `Assessment based on similarity score of ${s}. AI analysis failed: ${cause}`,
    recommendation: fallbackRecommendation(score),
    source: "fallback",
    error: cause,
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(stripCodeFences(text))
  } catch {
    throw new Error("LLM_NON_JSON_RESPONSE")
  }
}

/**
 * Qualitative assessment on top of the embedding score.
 * Public methods never reject: provider failures degrade to templated output.
 */
export class MatchAnalyzer {
  constructor(
    private readonly completion: CompletionProvider,
    private readonly log?: Logger
  ) {}

  async analyze(cvText: string, jobText: string, score: number): Promise<MatchAnalysis> {
    try {
      const out = await this.completion.complete({
        systemPrompt: buildAnalyzeMatchSystemPrompt(),
        userPrompt: buildAnalyzeMatchUserPrompt(cvText, jobText, score),
        temperature: ANALYZE_TEMPERATURE,
        maxTokens: ANALYZE_MAX_TOKENS,
        json: true,
      })

      const parsed = matchAnalysisSchema.safeParse(parseJson(out.text))
      if (!parsed.success) throw new Error("LLM_ANALYSIS_FAILED_SCHEMA")

      return { ...postProcessAnalysis(parsed.data), source: "llm", error: null }
    } catch (err: unknown) {
      const cause = errorMessage(err)
      this.log?.info("analysis_fallback", { err: cause, score })
      return fallbackAnalysis(score, cause)
    }
  }

  async extractRequirements(jobText: string): Promise<string[]> {
    try {
      const out = await this.completion.complete({
        systemPrompt: buildExtractRequirementsSystemPrompt(),
        userPrompt: buildExtractRequirementsUserPrompt(jobText),
        temperature: REQUIREMENTS_TEMPERATURE,
        maxTokens: REQUIREMENTS_MAX_TOKENS,
      })

      const parsed = requirementsSchema.safeParse(parseJson(out.text))
      if (!parsed.success) throw new Error("LLM_REQUIREMENTS_FAILED_SCHEMA")

      return cleanList(parsed.data)
    } catch (err: unknown) {
      this.log?.info("requirements_fallback", { err: errorMessage(err) })
      return [REQUIREMENTS_FAILED]
    }
  }
}
