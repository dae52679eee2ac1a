import { describe, expect, it } from "vitest"
import { MatchAnalyzer, REQUIREMENTS_FAILED, fallbackAnalysis } from "./analyzer.js"
import { FakeCompletion, analysisJson } from "../../src/testing/fakes.js"
import { ProviderError } from "../../src/lib/errors.js"

describe("MatchAnalyzer.analyze", () => {
  it("returns the parsed model assessment", async () => {
    const completion = new FakeCompletion(analysisJson({ strengths: [" Python ", "", "APIs"] }))
    const out = await new MatchAnalyzer(completion).analyze("cv", "job", 0.8)

    expect(out).toEqual({
      summary: "Solid backend profile.",
      strengths: ["Python", "APIs"],
      gaps: ["No Kubernetes"],
      reasoning: "Experience lines up with the role.",
      recommendation: "Proceed to interview",
      source: "llm",
      error: null,
    })
  })

  it("asks for low temperature JSON with a bounded length", async () => {
    const completion = new FakeCompletion(analysisJson())
    await new MatchAnalyzer(completion).analyze("the cv", "the job", 0.4567)

    const call = completion.calls[0]
    expect(call.temperature).toBe(0.3)
    expect(call.maxTokens).toBe(500)
    expect(call.json).toBe(true)
    expect(call.userPrompt).toContain("Similarity score: 0.46")
    expect(call.userPrompt).toContain("the cv")
    expect(call.userPrompt).toContain("the job")
  })

  it("accepts fenced JSON", async () => {
    const completion = new FakeCompletion("```json\n" + analysisJson({ recommendation: "Consider" }) + "\n```")
    const out = await new MatchAnalyzer(completion).analyze("cv", "job", 0.7)
    expect(out.source).toBe("llm")
    expect(out.recommendation).toBe("Consider")
  })

  it("falls back when the provider fails", async () => {
    const completion = new FakeCompletion(new ProviderError("OPENAI_TIMEOUT"))
    const out = await new MatchAnalyzer(completion).analyze("cv", "job", 0.73)

    expect(out).toEqual({
      summary: "Analysis based on similarity score of 0.73",
      strengths: ["Content analysis unavailable"],
      gaps: ["Content analysis unavailable"],
      reasoning: "Assessment based on similarity score of 0.73. AI analysis failed: OPENAI_TIMEOUT",
      recommendation: "Consider",
      source: "fallback",
      error: "OPENAI_TIMEOUT",
    })
  })

  it("falls back on malformed JSON", async () => {
    const out = await new MatchAnalyzer(new FakeCompletion("not json")).analyze("cv", "job", 0.2)
    expect(out.source).toBe("fallback")
    expect(out.error).toBe("LLM_NON_JSON_RESPONSE")
    expect(out.recommendation).toBe("Reject")
  })

  it("falls back when fields are missing", async () => {
    const completion = new FakeCompletion(JSON.stringify({ summary: "ok", strengths: [] }))
    const out = await new MatchAnalyzer(completion).analyze("cv", "job", 0.9)
    expect(out.error).toBe("LLM_ANALYSIS_FAILED_SCHEMA")
    expect(out.recommendation).toBe("Consider")
  })
})

describe("fallbackAnalysis", () => {
  it("recommends Consider iff score > 0.5", () => {
    expect(fallbackAnalysis(0.51, "x").recommendation).toBe("Consider")
    expect(fallbackAnalysis(0.5, "x").recommendation).toBe("Reject")
    expect(fallbackAnalysis(-0.1, "x").recommendation).toBe("Reject")
    expect(fallbackAnalysis(Number.NaN, "x").recommendation).toBe("Reject")
  })
})

describe("MatchAnalyzer.extractRequirements", () => {
  it("reads a JSON array", async () => {
    const completion = new FakeCompletion('["Python", " 5 years backend "]')
    const out = await new MatchAnalyzer(completion).extractRequirements("job")
    expect(out).toEqual(["Python", "5 years backend"])
    expect(completion.calls[0].temperature).toBe(0.2)
    expect(completion.calls[0].maxTokens).toBe(200)
  })

  it("reads a wrapped array", async () => {
    const completion = new FakeCompletion('{"requirements": ["SQL"]}')
    expect(await new MatchAnalyzer(completion).extractRequirements("job")).toEqual(["SQL"])
  })

  it("returns the sentinel on any failure", async () => {
    expect(await new MatchAnalyzer(new FakeCompletion()).extractRequirements("job")).toEqual([REQUIREMENTS_FAILED])
    expect(await new MatchAnalyzer(new FakeCompletion('{"skills": []}')).extractRequirements("job")).toEqual([
      REQUIREMENTS_FAILED,
    ])
  })
})
