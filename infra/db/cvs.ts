import type { ContactInfo } from "../../core/domain/document.js"
import type { Cv, CvWithEmbedding } from "../../core/domain/shortlist.js"
import { jsonNumberArray, jsonStringRecord } from "../../src/lib/json.js"
import { rowId, type Db } from "./database.js"

export type CvRow = {
  id: number
  owner_id: string
  filename: string
  candidate_name: string | null
  contact_info_json: string | null
  content: string
  created_at: string
}

type CvRowWithEmbedding = CvRow & { embedding_json: string }

const PUBLIC_COLUMNS = `id, owner_id, filename, candidate_name, contact_info_json, content, created_at`

function toContact(json: string | null): ContactInfo | null {
  const rec = jsonStringRecord(json)
  if (!rec) return null
  return { email: rec.email ?? null, phone: rec.phone ?? null }
}

export function toCv(r: CvRow): Cv {
  return {
    id: r.id,
    owner_id: r.owner_id,
    filename: r.filename,
    candidate_name: r.candidate_name,
    contact_info: toContact(r.contact_info_json),
    content: r.content,
    created_at: r.created_at,
  }
}

export type NewCv = {
  ownerId: string
  filename: string
  candidateName: string | null
  contactInfo: ContactInfo | null
  content: string
  embedding: number[]
  now: string
}

export function insertCv(db: Db, c: NewCv): Cv {
  const res = db
    .prepare(
      `INSERT INTO cvs (owner_id, filename, candidate_name, contact_info_json, content, embedding_json, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      c.ownerId,
      c.filename,
      c.candidateName,
      c.contactInfo ? JSON.stringify(c.contactInfo) : null,
      c.content,
      JSON.stringify(c.embedding),
      c.now
    )

  return {
    id: rowId(res.lastInsertRowid),
    owner_id: c.ownerId,
    filename: c.filename,
    candidate_name: c.candidateName,
    contact_info: c.contactInfo,
    content: c.content,
    created_at: c.now,
  }
}

export function getCvForOwner(db: Db, id: number, ownerId: string): Cv | null {
  const row = db
    .prepare<[number, string], CvRow>(`SELECT ${PUBLIC_COLUMNS} FROM cvs WHERE id = ? AND owner_id = ?`)
    .get(id, ownerId)
  return row ? toCv(row) : null
}

export function listCvsForOwner(db: Db, ownerId: string): Cv[] {
  return db
    .prepare<[string], CvRow>(`SELECT ${PUBLIC_COLUMNS} FROM cvs WHERE owner_id = ? ORDER BY id`)
    .all(ownerId)
    .map(toCv)
}

/**
 * Load the requested CVs with their stored embeddings, owner-scoped.
 * Ids that are missing or belong to someone else are simply absent from the result.
 */
export function getCvsWithEmbeddings(db: Db, ids: readonly number[], ownerId: string): CvWithEmbedding[] {
  if (!ids.length) return []
  const placeholders = ids.map(() => "?").join(", ")
  return db
    .prepare<Array<number | string>, CvRowWithEmbedding>(
      `SELECT ${PUBLIC_COLUMNS}, embedding_json FROM cvs WHERE owner_id = ? AND id IN (${placeholders})`
    )
    .all(ownerId, ...ids)
    .map((r) => ({ ...toCv(r), embedding: jsonNumberArray(r.embedding_json) }))
}

// Which of the ids still exist for this owner.
export function existingCvIds(db: Db, ids: readonly number[], ownerId: string): number[] {
  if (!ids.length) return []
  const placeholders = ids.map(() => "?").join(", ")
  return db
    .prepare<Array<number | string>, { id: number }>(
      `SELECT id FROM cvs WHERE owner_id = ? AND id IN (${placeholders})`
    )
    .all(ownerId, ...ids)
    .map((r) => r.id)
}

// Refused by the database (ON DELETE RESTRICT) while a stored shortlist result references the CV.
export function deleteCvForOwner(db: Db, id: number, ownerId: string): boolean {
  return db.prepare(`DELETE FROM cvs WHERE id = ? AND owner_id = ?`).run(id, ownerId).changes > 0
}
