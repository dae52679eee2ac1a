// CV and job-description ingestion: extract, enrich with AI, persist.
import { ownerKey, type Caller } from "../../core/domain/caller.js"
import type { Cv, JobDescription } from "../../core/domain/shortlist.js"
import { insertCv } from "../../infra/db/cvs.js"
import { insertJob, updateJob, type JobPatch } from "../../infra/db/jobs.js"
import { extractionFailed, providerFailure } from "../lib/errors.js"
import type { EngineDeps } from "./deps.js"
import { extractDocument } from "./extract_text.js"

export const MIN_JOB_CONTENT_CHARS = 50
export const DEFAULT_JOB_TITLE = "Job Description"

/**
 * The embedding is computed here, once. Shortlisting reuses it and never re-embeds a CV.
 */
export async function ingestCv(deps: EngineDeps, caller: Caller, file: { bytes: Buffer; filename: string }): Promise<Cv> {
  const doc = await extractDocument(file.bytes, file.filename)

  let embedding: number[]
  try {
    embedding = await deps.embedder.embed(doc.content)
  } catch (e: unknown) {
    throw providerFailure("CV embedding", e)
  }

  const cv = insertCv(deps.db, {
    ownerId: ownerKey(caller),
    filename: file.filename,
    candidateName: doc.candidateName,
    contactInfo: doc.contactInfo,
    content: doc.content,
    embedding,
    now: deps.clock().toISOString(),
  })

  deps.log.info("cv_ingested", {
    cvId: cv.id,
    owner: cv.owner_id,
    chars: cv.content.length,
    hasName: cv.candidate_name != null,
    hasContact: cv.contact_info != null,
    dims: embedding.length,
  })
  return cv
}

function requireJobContent(content: string): string {
  const trimmed = content.trim()
  if (trimmed.length < MIN_JOB_CONTENT_CHARS) {
    throw extractionFailed("Could not extract meaningful content from the job description")
  }
  return trimmed
}

export type JobInput = {
  title?: string
  summary?: string
  content: string
}

export async function createJob(deps: EngineDeps, caller: Caller, input: JobInput): Promise<JobDescription> {
  const content = requireJobContent(input.content)
  const keyRequirements = await deps.analyzer.extractRequirements(content)

  const job = insertJob(deps.db, {
    ownerId: ownerKey(caller),
    title: input.title?.trim() || DEFAULT_JOB_TITLE,
    summary: input.summary?.trim() ?? "",
    keyRequirements,
    content,
    now: deps.clock().toISOString(),
  })

  deps.log.info("job_created", { jobId: job.id, owner: job.owner_id, requirements: keyRequirements.length })
  return job
}

export async function createJobFromFile(
  deps: EngineDeps,
  caller: Caller,
  file: { bytes: Buffer; filename: string },
  meta: { title?: string; summary?: string } = {}
): Promise<JobDescription> {
  const doc = await extractDocument(file.bytes, file.filename)
  return createJob(deps, caller, { ...meta, content: doc.content })
}

/**
 * Replacing the content re-derives the key requirements; title/summary edits do not.
 */
export async function reviseJob(
  deps: EngineDeps,
  current: JobDescription,
  patch: { title?: string; summary?: string; content?: string }
): Promise<JobDescription> {
  const next: JobPatch = { title: patch.title?.trim() || undefined, summary: patch.summary?.trim() }

  if (patch.content !== undefined) {
    next.content = requireJobContent(patch.content)
    next.keyRequirements = await deps.analyzer.extractRequirements(next.content)
  }

  return updateJob(deps.db, current, next, deps.clock().toISOString())
}
