import { Router } from "express"
import multer from "multer"
import { ownerKey } from "../../core/domain/caller.js"
import { deleteCvForOwner, getCvForOwner, listCvsForOwner } from "../../infra/db/cvs.js"
import { shortlistIdsForCv } from "../../infra/db/shortlists.js"
import type { AppDeps } from "../app_deps.js"
import { ingestCv } from "../engine/ingest.js"
import { conflict, notFound, validationError } from "../lib/errors.js"
import { requireCaller, route } from "../middleware.js"
import { idParam } from "./params.js"

export function uploadSingle(maxUploadBytes: number) {
  return multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes, files: 1 } }).single("file")
}

export function cvsRouter(deps: AppDeps): Router {
  const r = Router()

  r.post(
    "/upload",
    uploadSingle(deps.maxUploadBytes),
    route(async (req, res) => {
      if (!req.file) throw validationError("A file is required in the 'file' form field")
      const cv = await ingestCv(deps, requireCaller(req), {
        bytes: req.file.buffer,
        filename: req.file.originalname,
      })
      res.status(201).json(cv)
    })
  )

  r.get(
    "/",
    route(async (req, res) => {
      res.json(listCvsForOwner(deps.db, ownerKey(requireCaller(req))))
    })
  )

  r.get(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      const cv = getCvForOwner(deps.db, id, ownerKey(requireCaller(req)))
      if (!cv) throw notFound("CV not found", { cv_id: id })
      res.json(cv)
    })
  )

  // Stored shortlists are immutable: a CV they reference cannot be deleted until they are.
  r.delete(
    "/:id",
    route(async (req, res) => {
      const id = idParam(req)
      const owner = ownerKey(requireCaller(req))
      if (!getCvForOwner(deps.db, id, owner)) throw notFound("CV not found", { cv_id: id })

      const shortlistIds = shortlistIdsForCv(deps.db, id)
      if (shortlistIds.length) {
        throw conflict("CV is part of stored shortlists; delete those first", { cv_id: id, shortlist_ids: shortlistIds })
      }

      deleteCvForOwner(deps.db, id, owner)
      res.status(204).end()
    })
  )

  return r
}
