// core/domain/shortlist.ts
import type { ContactInfo } from "./document.js"

export const DEFAULT_THRESHOLD = 0.6

// Open set: the model may answer with something else and we keep it verbatim.
export type Recommendation = "Proceed to interview" | "Consider" | "Reject" | (string & {})

export type AnalysisSource = "llm" | "fallback"

export type JobDescription = {
  id: number
  owner_id: string
  title: string
  summary: string
  key_requirements: string[]
  content: string
  created_at: string
  updated_at: string
}

// What callers see. The embedding never leaves the service.
export type Cv = {
  id: number
  owner_id: string
  filename: string
  candidate_name: string | null
  contact_info: ContactInfo | null
  content: string
  created_at: string
}

export type CvWithEmbedding = Cv & { embedding: number[] }

export type ShortlistResult = {
  id: number
  shortlist_id: number
  cv_id: number
  score: number
  match_summary: string
  strengths: string[]
  gaps: string[]
  reasoning: string
  recommendation: Recommendation
  analysis_source: AnalysisSource
  cv: Cv
}

export type Shortlist = {
  id: number
  owner_id: string
  job_description_id: number
  threshold: number
  created_at: string
  results: ShortlistResult[]
}

export type ShortlistReport = {
  shortlist_id: number
  job_description: JobDescription
  shortlisted: ShortlistResult[]
  rejected: ShortlistResult[]
  threshold: number
  total_candidates: number
  shortlisted_count: number
  rejected_count: number
}

export function isValidThreshold(t: number): boolean {
  return Number.isFinite(t) && t >= 0 && t <= 1
}

// Boundary is inclusive: a score equal to the threshold is shortlisted.
export function isShortlisted(score: number, threshold: number): boolean {
  return score >= threshold
}

/**
 * Split results by threshold. Input order is preserved inside each side.
 */
export function partitionResults<T extends { score: number }>(
  results: readonly T[],
  threshold: number
): { shortlisted: T[]; rejected: T[] } {
  const shortlisted: T[] = []
  const rejected: T[] = []
  for (const r of results) {
    if (isShortlisted(r.score, threshold)) shortlisted.push(r)
    else rejected.push(r)
  }
  return { shortlisted, rejected }
}

export function buildReport(
  shortlistId: number,
  job: JobDescription,
  results: readonly ShortlistResult[],
  threshold: number
): ShortlistReport {
  const { shortlisted, rejected } = partitionResults(results, threshold)
  return {
    shortlist_id: shortlistId,
    job_description: job,
    shortlisted,
    rejected,
    threshold,
    total_candidates: results.length,
    shortlisted_count: shortlisted.length,
    rejected_count: rejected.length,
  }
}
