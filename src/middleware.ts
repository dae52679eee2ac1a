import type { NextFunction, Request, RequestHandler, Response } from "express"
import multer from "multer"
import { ZodError } from "zod"
import { describeCaller, hasScope, type Caller, type Scope } from "../core/domain/caller.js"
import type { Db } from "../infra/db/database.js"
import { countUsageSince, logApiUsage, type OAuthClient } from "../infra/db/clients.js"
import type { AuthService } from "./lib/auth.js"
import { newRequestId } from "./lib/crypto.js"
import { AppError, errorMessage, forbidden, rateLimited, unauthorized, validationError } from "./lib/errors.js"
import type { Logger } from "./lib/log.js"

declare global {
  namespace Express {
    interface Request {
      requestId: string
      caller?: Caller
      client?: OAuthClient | null
    }
  }
}

const HOUR_MS = 60 * 60 * 1000

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>

// Express 4 does not await handlers; route rejections go to the error middleware.
export function route(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next)
  }
}

export function getBearerToken(req: Request): string | null {
  const h = req.header("authorization")
  if (!h) return null
  const m = h.match(/^Bearer\s+(.+)$/i)
  return m ? m[1].trim() : null
}

// Request ID + request_done log line
export function requestContext(log: Logger): RequestHandler {
  return (req, res, next) => {
    const started = Date.now()
    req.requestId = req.header("x-request-id") || newRequestId()
    res.setHeader("x-request-id", req.requestId)

    res.on("finish", () => {
      log.info("request_done", {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl.split("?")[0],
        status: res.statusCode,
        ms: Date.now() - started,
        caller: req.caller ? describeCaller(req.caller) : null,
      })
    })
    next()
  }
}

export function authenticate(auth: AuthService): RequestHandler {
  return route(async (req, _res, next) => {
    const token = getBearerToken(req)
    if (!token) throw unauthorized("Not authenticated")

    const resolved = await auth.resolveBearer(token)
    req.caller = resolved.caller
    req.client = resolved.client
    next()
  })
}

export function requireCaller(req: Request): Caller {
  if (!req.caller) throw unauthorized("Not authenticated")
  return req.caller
}

export function scopeFor(method: string): Scope {
  return method === "GET" || method === "HEAD" ? "read" : "write"
}

// GET needs read; anything that changes state needs write.
export const requireScope: RequestHandler = (req, _res, next) => {
  const caller = requireCaller(req)
  const scope = scopeFor(req.method)
  if (!hasScope(caller, scope)) throw forbidden(`Insufficient scope: '${scope}' required`)
  next()
}

export const requireSuperAdmin: RequestHandler = (req, _res, next) => {
  const caller = requireCaller(req)
  if (caller.kind !== "user" || !caller.isSuperAdmin) throw forbidden("Super admin access required")
  next()
}

/**
 * Sliding one-hour window over the client's `api_usage` rows.
 * Every client request, refused or not, is recorded when the response finishes.
 */
export function clientUsage(db: Db, clock: () => Date, log: Logger): RequestHandler {
  return (req, res, next) => {
    const client = req.client
    if (!client) return next()

    const started = Date.now()
    res.on("finish", () => {
      try {
        logApiUsage(db, {
          clientId: client.client_id,
          endpoint: req.originalUrl.split("?")[0],
          method: req.method,
          statusCode: res.statusCode,
          responseTimeMs: Date.now() - started,
          ipAddress: req.ip ?? null,
          now: clock().toISOString(),
        })
      } catch (e: unknown) {
        log.error("api_usage_write_failed", { requestId: req.requestId, clientId: client.client_id, err: errorMessage(e) })
      }
    })

    const since = new Date(clock().getTime() - HOUR_MS).toISOString()
    if (countUsageSince(db, client.client_id, since) >= client.rate_limit_per_hour) {
      throw rateLimited(client.rate_limit_per_hour)
    }
    next()
  }
}

type ErrorBody = {
  error: string
  message?: string
  details?: unknown
  requestId: string
}

function toAppError(err: unknown, maxUploadBytes: number): AppError | null {
  if (err instanceof AppError) return err
  if (err instanceof ZodError) return validationError("Invalid request", err.flatten())
  if (err instanceof multer.MulterError) {
    return err.code === "LIMIT_FILE_SIZE"
      ? validationError(`File exceeds the ${maxUploadBytes} byte upload limit`)
      : validationError(`Upload rejected: ${err.message}`)
  }
  // body-parser
  if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
    return validationError("Malformed JSON body")
  }
  return null
}

export function errorHandler(log: Logger, maxUploadBytes: number) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = req.requestId
    const appErr = toAppError(err, maxUploadBytes)

    if (!appErr) {
      log.error("unhandled_error", {
        requestId,
        path: req.originalUrl.split("?")[0],
        err: errorMessage(err),
        stack: err instanceof Error ? err.stack : undefined,
      })
      const body: ErrorBody = { error: "internal_error", requestId }
      res.status(500).json(body)
      return
    }

    if (appErr.code === "unauthorized") res.setHeader("WWW-Authenticate", "Bearer")
    if (appErr.code === "rate_limited") res.setHeader("Retry-After", "3600")

    const body: ErrorBody = { error: appErr.code, message: appErr.message, requestId }
    if (appErr.details !== undefined) body.details = appErr.details
    res.status(appErr.status).json(body)
  }
}
