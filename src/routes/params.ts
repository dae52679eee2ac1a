import type { Request } from "express"
import { z } from "zod"

const positiveId = z.coerce.number().int().positive()

export function idParam(req: Request, name = "id"): number {
  return positiveId.parse(req.params[name])
}

// Query-string booleans arrive as text.
export const queryBool = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1")

export const paging = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
})
