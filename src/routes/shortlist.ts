import { Router } from "express"
import { z } from "zod"
import { ownerKey } from "../../core/domain/caller.js"
import { partitionResults, type Shortlist } from "../../core/domain/shortlist.js"
import { deleteShortlistForOwner, getShortlistForOwner, listShortlistsForOwner } from "../../infra/db/shortlists.js"
import type { AppDeps } from "../app_deps.js"
import { loadShortlistReport, runShortlist } from "../engine/run_shortlist.js"
import { notFound } from "../lib/errors.js"
import { requireCaller, route } from "../middleware.js"
import { idParam } from "./params.js"

const shortlistBody = z.object({
  job_description_id: z.number().int().positive(),
  cv_ids: z.array(z.number().int().positive()),
  // range is checked by the engine so the error matches the domain rule
  threshold: z.number().optional(),
})

function summarize(s: Shortlist) {
  const { shortlisted, rejected } = partitionResults(s.results, s.threshold)
  return {
    id: s.id,
    job_description_id: s.job_description_id,
    threshold: s.threshold,
    created_at: s.created_at,
    total_candidates: s.results.length,
    shortlisted_count: shortlisted.length,
    rejected_count: rejected.length,
  }
}

export function shortlistRouter(deps: AppDeps): Router {
  const r = Router()

  r.post(
    "/",
    route(async (req, res) => {
      const body = shortlistBody.parse(req.body)
      const report = await runShortlist(deps, {
        caller: requireCaller(req),
        jobDescriptionId: body.job_description_id,
        cvIds: body.cv_ids,
        threshold: body.threshold,
      })
      res.status(201).json(report)
    })
  )

  r.get(
    "/",
    route(async (req, res) => {
      res.json(listShortlistsForOwner(deps.db, ownerKey(requireCaller(req))).map(summarize))
    })
  )

  r.get(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      const shortlist = getShortlistForOwner(deps.db, id, ownerKey(requireCaller(req)))
      if (!shortlist) throw notFound("Shortlist not found", { shortlist_id: id })
      res.json(shortlist)
    })
  )

  r.get(
    "/:id/report",
    route(async (req, res) => {
      res.json(loadShortlistReport(deps, requireCaller(req), idParam(req)))
    })
  )

  r.delete(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      if (!deleteShortlistForOwner(deps.db, id, ownerKey(requireCaller(req)))) {
        throw notFound("Shortlist not found", { shortlist_id: id })
      }
      res.status(204).end()
    })
  )

  return r
}
