import { describeCaller, ownerKey, type Caller } from "../../core/domain/caller.js"
import { cosineSimilarity } from "../../core/domain/similarity.js"
import {
  DEFAULT_THRESHOLD,
  buildReport,
  isShortlisted,
  isValidThreshold,
  type ShortlistReport,
} from "../../core/domain/shortlist.js"
import { ENGINE_VERSION } from "../../core/versioning/versions.js"
import { existingCvIds, getCvsWithEmbeddings } from "../../infra/db/cvs.js"
import { getJobForOwner } from "../../infra/db/jobs.js"
import { getShortlistForOwner, insertShortlistRun, type NewResult } from "../../infra/db/shortlists.js"
import { noCandidates, notFound, providerFailure, validationError } from "../lib/errors.js"
import type { EngineDeps } from "./deps.js"

export type RunShortlistArgs = {
  caller: Caller
  jobDescriptionId: number
  cvIds: readonly number[]
  threshold?: number
}

/**
 * Score every candidate CV against a job description, annotate each with
 * the analyzer, and persist the run.
 *
 * Everything that can fail hard (ownership, provider embedding) happens
 * before the single write transaction, so a failed run leaves no rows.
 * Analyzer failures are absorbed by its fallback and never abort the run.
 * Candidates are processed sequentially in input order.
 */
export async function runShortlist(deps: EngineDeps, args: RunShortlistArgs): Promise<ShortlistReport> {
  const { caller, jobDescriptionId, cvIds } = args
  const threshold = args.threshold ?? DEFAULT_THRESHOLD
  const owner = ownerKey(caller)
  const started = Date.now()

  // 1) Validate input
  if (!isValidThreshold(threshold)) {
    throw validationError("threshold must be a number between 0 and 1", { threshold })
  }
  if (!cvIds.length) throw noCandidates()

  const duplicates = [...new Set(cvIds.filter((id, i) => cvIds.indexOf(id) !== i))]
  if (duplicates.length) {
    throw validationError("cv_ids must not repeat", { cv_ids: duplicates })
  }

  // 2) Resolve job + candidates, owner-scoped. Any foreign or missing id rejects the whole run.
  const job = getJobForOwner(deps.db, jobDescriptionId, owner)
  if (!job) throw notFound("Job description not found or not accessible", { job_description_id: jobDescriptionId })

  const found = getCvsWithEmbeddings(deps.db, cvIds, owner)
  const byId = new Map(found.map((cv) => [cv.id, cv]))
  const missing = cvIds.filter((id) => !byId.has(id))
  if (missing.length) {
    throw notFound(`CVs not found or not accessible: ${missing.join(", ")}`, { cv_ids: missing })
  }

  const log = deps.log.child({ caller: describeCaller(caller), jobId: job.id })
  log.info("shortlist_start", { engineVersion: ENGINE_VERSION, candidates: cvIds.length, threshold })

  // 3) Job embedding: once per run, never cached (content may change between runs)
  let jobEmbedding: number[]
  try {
    jobEmbedding = await deps.embedder.embed(job.content)
  } catch (e: unknown) {
    throw providerFailure("Job embedding", e)
  }

  // 4) Score + annotate, in input order
  const results: NewResult[] = []
  for (const id of cvIds) {
    const cv = byId.get(id)
    if (!cv) continue // unreachable: checked above

    const score = cosineSimilarity(cv.embedding, jobEmbedding)
    const analysis = await deps.analyzer.analyze(cv.content, job.content, score)

    const { embedding: _embedding, ...publicCv } = cv
    results.push({
      cv: publicCv,
      score,
      matchSummary: analysis.summary,
      strengths: analysis.strengths,
      gaps: analysis.gaps,
      reasoning: analysis.reasoning,
      recommendation: analysis.recommendation,
      analysisSource: analysis.source,
    })

    log.debug("shortlist_candidate_scored", {
      cvId: id,
      score,
      shortlisted: isShortlisted(score, threshold),
      analysisSource: analysis.source,
    })
  }

  // 5) Persist all-or-nothing. The job or a CV may have been deleted while we awaited the provider.
  const shortlist = deps.db.transaction(() => {
    if (!getJobForOwner(deps.db, job.id, owner)) {
      throw notFound("Job description not found or not accessible", { job_description_id: job.id })
    }
    const still = new Set(existingCvIds(deps.db, cvIds, owner))
    const gone = cvIds.filter((id) => !still.has(id))
    if (gone.length) {
      throw notFound(`CVs not found or not accessible: ${gone.join(", ")}`, { cv_ids: gone })
    }

    return insertShortlistRun(deps.db, {
      ownerId: owner,
      jobDescriptionId: job.id,
      threshold,
      now: deps.clock().toISOString(),
      results,
    })
  })()

  const report = buildReport(shortlist.id, job, shortlist.results, threshold)

  log.info("shortlist_done", {
    shortlistId: shortlist.id,
    total: report.total_candidates,
    shortlisted: report.shortlisted_count,
    rejected: report.rejected_count,
    fallbacks: results.filter((r) => r.analysisSource === "fallback").length,
    ms: Date.now() - started,
  })

  return report
}

/**
 * Rebuild the report of a stored run from its persisted rows and threshold.
 */
export function loadShortlistReport(deps: EngineDeps, caller: Caller, shortlistId: number): ShortlistReport {
  const owner = ownerKey(caller)
  const shortlist = getShortlistForOwner(deps.db, shortlistId, owner)
  if (!shortlist) throw notFound("Shortlist not found", { shortlist_id: shortlistId })

  const job = getJobForOwner(deps.db, shortlist.job_description_id, owner)
  if (!job) throw notFound("Job description not found", { job_description_id: shortlist.job_description_id })

  return buildReport(shortlist.id, job, shortlist.results, shortlist.threshold)
}
