import { Router } from "express"
import { getAllClientStatistics, getClientStatistics, getSystemOverview } from "../../infra/db/analytics.js"
import type { AppDeps } from "../app_deps.js"
import { notFound } from "../lib/errors.js"
import { route } from "../middleware.js"

export function analyticsRouter(deps: AppDeps): Router {
  const r = Router()

  r.get(
    "/overview",
    route(async (_req, res) => {
      res.json(getSystemOverview(deps.db, deps.clock().toISOString()))
    })
  )

  r.get(
    "/clients",
    route(async (_req, res) => {
      res.json(getAllClientStatistics(deps.db))
    })
  )

  r.get(
    "/client/:clientId",
    route(async (req, res) => {
      const stats = getClientStatistics(deps.db, req.params.clientId)
      if (!stats) throw notFound("Client not found")
      res.json(stats)
    })
  )

  return r
}
