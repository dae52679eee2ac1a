import { Router } from "express"
import { z } from "zod"
import type { AppDeps } from "../app_deps.js"
import { forbidden, validationError } from "../lib/errors.js"
import { authenticate, requireCaller, route } from "../middleware.js"

const registerBody = z.object({
  email: z.string().trim().email(),
  username: z.string().trim().min(3).max(50),
  password: z.string().min(8).max(128),
})

const loginBody = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
})

const refreshBody = z.object({ refresh_token: z.string().min(1) })

// OAuth2 token endpoint: form-encoded per RFC 6749, JSON accepted as well.
const tokenBody = z.object({
  grant_type: z.string(),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  scope: z.string().optional(),
})

const revokeBody = z.object({ token: z.string().min(1) })

export function authRouter(deps: AppDeps): Router {
  const r = Router()

  r.post(
    "/register",
    route(async (req, res) => {
      const body = registerBody.parse(req.body)
      res.status(201).json(await deps.auth.register(body))
    })
  )

  r.post(
    "/login",
    route(async (req, res) => {
      const { username, password } = loginBody.parse(req.body)
      res.json(await deps.auth.login(username, password))
    })
  )

  r.post(
    "/refresh",
    route(async (req, res) => {
      const { refresh_token } = refreshBody.parse(req.body)
      res.json(await deps.auth.refresh(refresh_token))
    })
  )

  r.post(
    "/token",
    route(async (req, res) => {
      const body = tokenBody.parse(req.body)
      if (body.grant_type !== "client_credentials") {
        throw validationError("Unsupported grant_type", { supported: ["client_credentials"] })
      }
      const token = await deps.auth.issueClientToken({
        clientId: body.client_id,
        clientSecret: body.client_secret,
        scope: body.scope,
      })
      res.set("Cache-Control", "no-store").json(token)
    })
  )

  r.post(
    "/revoke",
    authenticate(deps.auth),
    route(async (req, res) => {
      const caller = requireCaller(req)
      if (caller.kind !== "client") throw forbidden("Only API clients can revoke tokens")
      const { token } = revokeBody.parse(req.body)
      res.json({ revoked: deps.auth.revokeClientToken(caller, token) })
    })
  )

  return r
}
