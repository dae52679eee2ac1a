// API client administration. Mounted behind requireSuperAdmin.
import { Router } from "express"
import { z } from "zod"
import {
  deleteClientCascade,
  getClient,
  listClients,
  listTokens,
  updateClient,
  withoutSecret,
} from "../../infra/db/clients.js"
import type { AppDeps } from "../app_deps.js"
import { notFound } from "../lib/errors.js"
import { requireCaller, route } from "../middleware.js"
import { paging, queryBool } from "./params.js"

const scopeList = z.array(z.enum(["read", "write"])).min(1)

const createBody = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(500).nullish(),
  scopes: scopeList.optional(),
  rate_limit_per_hour: z.number().int().positive().optional(),
})

const updateBody = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  description: z.string().max(500).nullable().optional(),
  is_active: z.boolean().optional(),
  rate_limit_per_hour: z.number().int().positive().optional(),
  scopes: scopeList.optional(),
})

const tokenQuery = paging.extend({
  client_id: z.string().optional(),
  active_only: queryBool.default("true"),
})

export function clientsRouter(deps: AppDeps): Router {
  const r = Router()

  r.post(
    "/",
    route(async (req, res) => {
      const caller = requireCaller(req)
      const body = createBody.parse(req.body)
      const client = await deps.auth.createClient({
        name: body.name,
        description: body.description,
        scopes: body.scopes,
        rateLimitPerHour: body.rate_limit_per_hour,
        createdBy: caller.kind === "user" ? caller.userId : null,
      })
      res.status(201).json(client)
    })
  )

  r.get(
    "/",
    route(async (req, res) => {
      const { skip, limit } = paging.parse(req.query)
      res.json(listClients(deps.db, skip, limit).map(withoutSecret))
    })
  )

  // before /:clientId so "tokens" is not taken for an id
  r.get(
    "/tokens",
    route(async (req, res) => {
      const q = tokenQuery.parse(req.query)
      res.json(listTokens(deps.db, { clientId: q.client_id, activeOnly: q.active_only, skip: q.skip, limit: q.limit }))
    })
  )

  r.get(
    "/:clientId",
    route(async (req, res) => {
      const client = getClient(deps.db, req.params.clientId)
      if (!client) throw notFound("Client not found")
      res.json(withoutSecret(client))
    })
  )

  r.put(
    "/:clientId",
    route(async (req, res) => {
      const patch = updateBody.parse(req.body)
      const current = getClient(deps.db, req.params.clientId)
      if (!current) throw notFound("Client not found")

      const next = updateClient(
        deps.db,
        current,
        {
          name: patch.name,
          description: patch.description,
          isActive: patch.is_active,
          rateLimitPerHour: patch.rate_limit_per_hour,
          scopes: patch.scopes,
        },
        deps.clock().toISOString()
      )
      res.json(withoutSecret(next))
    })
  )

  r.post(
    "/:clientId/regenerate-secret",
    route(async (req, res) => {
      res.json(await deps.auth.regenerateSecret(req.params.clientId))
    })
  )

  r.delete(
    "/:clientId",
    route(async (req, res) => {
      if (!deleteClientCascade(deps.db, req.params.clientId)) throw notFound("Client not found")
      deps.log.info("client_deleted", { clientId: req.params.clientId })
      res.status(204).end()
    })
  )

  return r
}
