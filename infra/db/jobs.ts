// Job description rows. Every query is scoped by owner.
import type { JobDescription } from "../../core/domain/shortlist.js"
import { jsonStringArray } from "../../src/lib/json.js"
import { rowId, type Db } from "./database.js"

type JobRow = {
  id: number
  owner_id: string
  title: string
  summary: string
  key_requirements_json: string
  content: string
  created_at: string
  updated_at: string
}

function toJob(r: JobRow): JobDescription {
  return {
    id: r.id,
    owner_id: r.owner_id,
    title: r.title,
    summary: r.summary,
    key_requirements: jsonStringArray(r.key_requirements_json),
    content: r.content,
    created_at: r.created_at,
    updated_at: r.updated_at,
  }
}

export type NewJob = {
  ownerId: string
  title: string
  summary: string
  keyRequirements: string[]
  content: string
  now: string
}

export function insertJob(db: Db, j: NewJob): JobDescription {
  const res = db
    .prepare(
      `INSERT INTO job_descriptions (owner_id, title, summary, key_requirements_json, content, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    )
    .run(j.ownerId, j.title, j.summary, JSON.stringify(j.keyRequirements), j.content, j.now, j.now)

  return {
    id: rowId(res.lastInsertRowid),
    owner_id: j.ownerId,
    title: j.title,
    summary: j.summary,
    key_requirements: j.keyRequirements,
    content: j.content,
    created_at: j.now,
    updated_at: j.now,
  }
}

export function getJobForOwner(db: Db, id: number, ownerId: string): JobDescription | null {
  const row = db
    .prepare<[number, string], JobRow>(`SELECT * FROM job_descriptions WHERE id = ? AND owner_id = ?`)
    .get(id, ownerId)
  return row ? toJob(row) : null
}

export function listJobsForOwner(db: Db, ownerId: string): JobDescription[] {
  return db
    .prepare<[string], JobRow>(`SELECT * FROM job_descriptions WHERE owner_id = ? ORDER BY id`)
    .all(ownerId)
    .map(toJob)
}

export type JobPatch = {
  title?: string
  summary?: string
  content?: string
  keyRequirements?: string[]
}

export function updateJob(db: Db, current: JobDescription, patch: JobPatch, now: string): JobDescription {
  const next: JobDescription = {
    ...current,
    title: patch.title ?? current.title,
    summary: patch.summary ?? current.summary,
    content: patch.content ?? current.content,
    key_requirements: patch.keyRequirements ?? current.key_requirements,
    updated_at: now,
  }

  db.prepare(
    `UPDATE job_descriptions
        SET title = ?, summary = ?, content = ?, key_requirements_json = ?, updated_at = ?
      WHERE id = ? AND owner_id = ?`
  ).run(next.title, next.summary, next.content, JSON.stringify(next.key_requirements), now, current.id, current.owner_id)

  return next
}

// Shortlists (and their results) go with the job via ON DELETE CASCADE.
export function deleteJobForOwner(db: Db, id: number, ownerId: string): boolean {
  return db.prepare(`DELETE FROM job_descriptions WHERE id = ? AND owner_id = ?`).run(id, ownerId).changes > 0
}
