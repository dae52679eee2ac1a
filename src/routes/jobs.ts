import { Router } from "express"
import { z } from "zod"
import { ownerKey } from "../../core/domain/caller.js"
import { deleteJobForOwner, getJobForOwner, listJobsForOwner } from "../../infra/db/jobs.js"
import type { AppDeps } from "../app_deps.js"
import { createJob, createJobFromFile, reviseJob } from "../engine/ingest.js"
import { notFound } from "../lib/errors.js"
import { requireCaller, route } from "../middleware.js"
import { uploadSingle } from "./cvs.js"
import { idParam } from "./params.js"

const jobMeta = z.object({
  title: z.string().max(200).optional(),
  summary: z.string().max(2000).optional(),
})

const jobBody = jobMeta.extend({ content: z.string() })

const jobPatch = jobMeta.extend({ content: z.string().optional() })

export function jobsRouter(deps: AppDeps): Router {
  const r = Router()

  // multipart with a `file` field, or JSON with `content`
  r.post(
    "/",
    uploadSingle(deps.maxUploadBytes),
    route(async (req, res) => {
      const caller = requireCaller(req)
      const job = req.file
        ? await createJobFromFile(
            deps,
            caller,
            { bytes: req.file.buffer, filename: req.file.originalname },
            jobMeta.parse(req.body ?? {})
          )
        : await createJob(deps, caller, jobBody.parse(req.body))
      res.status(201).json(job)
    })
  )

  r.get(
    "/",
    route(async (req, res) => {
      res.json(listJobsForOwner(deps.db, ownerKey(requireCaller(req))))
    })
  )

  r.get(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      const job = getJobForOwner(deps.db, id, ownerKey(requireCaller(req)))
      if (!job) throw notFound("Job description not found", { job_description_id: id })
      res.json(job)
    })
  )

  r.put(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      const patch = jobPatch.parse(req.body)
      const current = getJobForOwner(deps.db, id, ownerKey(requireCaller(req)))
      if (!current) throw notFound("Job description not found", { job_description_id: id })
      res.json(await reviseJob(deps, current, patch))
    })
  )

  // Shortlists built from the job go with it.
  r.delete(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      if (!deleteJobForOwner(deps.db, id, ownerKey(requireCaller(req)))) {
        throw notFound("Job description not found", { job_description_id: id })
      }
      res.status(204).end()
    })
  )

  return r
}
