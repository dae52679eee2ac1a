// entrypoint: routing only
import express, { type Express } from "express"
import type { AppDeps } from "./app_deps.js"
import {
  authenticate,
  clientUsage,
  errorHandler,
  requestContext,
  requireScope,
  requireSuperAdmin,
} from "./middleware.js"
import { analyticsRouter } from "./routes/analytics.js"
import { authRouter } from "./routes/auth.js"
import { clientsRouter } from "./routes/clients.js"
import { cvsRouter } from "./routes/cvs.js"
import { jobsRouter } from "./routes/jobs.js"
import { shortlistRouter } from "./routes/shortlist.js"

export function createApp(deps: AppDeps): Express {
  const app = express()
  app.disable("x-powered-by")

  app.use(requestContext(deps.log))
  app.use(express.json({ limit: "1mb" }))
  app.use(express.urlencoded({ extended: false }))

  app.get("/healthz", (_req, res) => {
    res.status(200).send("ok")
  })

  // Public: credentials in, tokens out
  app.use("/auth", authRouter(deps))

  // Caller-scoped data. Clients are metered; GET needs read, writes need write.
  const data = [authenticate(deps.auth), clientUsage(deps.db, deps.clock, deps.log), requireScope]
  app.use("/cvs", ...data, cvsRouter(deps))
  app.use("/jobs", ...data, jobsRouter(deps))
  app.use("/shortlist", ...data, shortlistRouter(deps))

  // Super admin only
  const admin = [authenticate(deps.auth), requireSuperAdmin]
  app.use("/clients", ...admin, clientsRouter(deps))
  app.use("/analytics", ...admin, analyticsRouter(deps))

  app.use((req, res) => {
    res.status(404).json({ error: "not_found", message: `No route for ${req.method} ${req.path}`, requestId: req.requestId })
  })
  app.use(errorHandler(deps.log, deps.maxUploadBytes))

  return app
}
