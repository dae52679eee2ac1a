import type { AnalysisSource, Cv, Shortlist, ShortlistResult } from "../../core/domain/shortlist.js"
import { jsonStringArray } from "../../src/lib/json.js"
import { toCv, type CvRow } from "./cvs.js"
import { rowId, type Db } from "./database.js"

type ShortlistRow = {
  id: number
  owner_id: string
  job_description_id: number
  threshold: number
  created_at: string
}

type ResultRow = {
  id: number
  shortlist_id: number
  cv_id: number
  score: number
  match_summary: string
  strengths_json: string
  gaps_json: string
  reasoning: string
  recommendation: string
  analysis_source: string
}

type ResultWithCvRow = ResultRow & { [K in keyof CvRow as `cv_${K}`]: CvRow[K] }

function toSource(v: string): AnalysisSource {
  return v === "fallback" ? "fallback" : "llm"
}

function toResult(r: ResultWithCvRow): ShortlistResult {
  return {
    id: r.id,
    shortlist_id: r.shortlist_id,
    cv_id: r.cv_id,
    score: r.score,
    match_summary: r.match_summary,
    strengths: jsonStringArray(r.strengths_json),
    gaps: jsonStringArray(r.gaps_json),
    reasoning: r.reasoning,
    recommendation: r.recommendation,
    analysis_source: toSource(r.analysis_source),
    cv: toCv({
      id: r.cv_id,
      owner_id: r.cv_owner_id,
      filename: r.cv_filename,
      candidate_name: r.cv_candidate_name,
      contact_info_json: r.cv_contact_info_json,
      content: r.cv_content,
      created_at: r.cv_created_at,
    }),
  }
}

export type NewResult = {
  cv: Cv
  score: number
  matchSummary: string
  strengths: string[]
  gaps: string[]
  reasoning: string
  recommendation: string
  analysisSource: AnalysisSource
}

export type NewShortlistRun = {
  ownerId: string
  jobDescriptionId: number
  threshold: number
  now: string
  results: NewResult[]
}

/**
 * One shortlist row plus one result row per candidate, in a single transaction.
 * Results keep the order they were given in.
 */
export function insertShortlistRun(db: Db, run: NewShortlistRun): Shortlist {
  const insertShortlist = db.prepare(
    `INSERT INTO shortlists (owner_id, job_description_id, threshold, created_at) VALUES (?, ?, ?, ?)`
  )
  const insertResult = db.prepare(
    `INSERT INTO shortlist_results
       (shortlist_id, cv_id, score, match_summary, strengths_json, gaps_json, reasoning, recommendation, analysis_source)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  )

  return db.transaction((): Shortlist => {
    const shortlistId = rowId(insertShortlist.run(run.ownerId, run.jobDescriptionId, run.threshold, run.now).lastInsertRowid)

    const results = run.results.map((r): ShortlistResult => {
      const id = rowId(
        insertResult.run(
          shortlistId,
          r.cv.id,
          r.score,
          r.matchSummary,
          JSON.stringify(r.strengths),
          JSON.stringify(r.gaps),
          r.reasoning,
          r.recommendation,
          r.analysisSource
        ).lastInsertRowid
      )
      return {
        id,
        shortlist_id: shortlistId,
        cv_id: r.cv.id,
        score: r.score,
        match_summary: r.matchSummary,
        strengths: r.strengths,
        gaps: r.gaps,
        reasoning: r.reasoning,
        recommendation: r.recommendation,
        analysis_source: r.analysisSource,
        cv: r.cv,
      }
    })

    return {
      id: shortlistId,
      owner_id: run.ownerId,
      job_description_id: run.jobDescriptionId,
      threshold: run.threshold,
      created_at: run.now,
      results,
    }
  })()
}

function resultsFor(db: Db, shortlistId: number): ShortlistResult[] {
  return db
    .prepare<[number], ResultWithCvRow>(
      `SELECT r.*,
              c.owner_id AS cv_owner_id, c.filename AS cv_filename, c.candidate_name AS cv_candidate_name,
              c.contact_info_json AS cv_contact_info_json, c.content AS cv_content, c.created_at AS cv_created_at
         FROM shortlist_results r
         JOIN cvs c ON c.id = r.cv_id
        WHERE r.shortlist_id = ?
        ORDER BY r.id`
    )
    .all(shortlistId)
    .map(toResult)
}

export function getShortlistForOwner(db: Db, id: number, ownerId: string): Shortlist | null {
  const row = db
    .prepare<[number, string], ShortlistRow>(`SELECT * FROM shortlists WHERE id = ? AND owner_id = ?`)
    .get(id, ownerId)
  return row ? { ...row, results: resultsFor(db, row.id) } : null
}

export function listShortlistsForOwner(db: Db, ownerId: string): Shortlist[] {
  return db
    .prepare<[string], ShortlistRow>(`SELECT * FROM shortlists WHERE owner_id = ? ORDER BY id`)
    .all(ownerId)
    .map((row) => ({ ...row, results: resultsFor(db, row.id) }))
}

// Stored shortlists that hold a result for the CV.
export function shortlistIdsForCv(db: Db, cvId: number): number[] {
  return db
    .prepare<[number], { shortlist_id: number }>(
      `SELECT DISTINCT shortlist_id FROM shortlist_results WHERE cv_id = ? ORDER BY shortlist_id`
    )
    .all(cvId)
    .map((r) => r.shortlist_id)
}

export function deleteShortlistForOwner(db: Db, id: number, ownerId: string): boolean {
  return db.prepare(`DELETE FROM shortlists WHERE id = ? AND owner_id = ?`).run(id, ownerId).changes > 0
}

export function countResults(db: Db, shortlistId?: number): number {
  const row =
    shortlistId == null
      ? db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM shortlist_results`).get()
      : db.prepare<[number], { n: number }>(`SELECT COUNT(*) AS n FROM shortlist_results WHERE shortlist_id = ?`).get(shortlistId)
  return row?.n ?? 0
}
