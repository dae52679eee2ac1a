import { z } from "zod"

export const matchAnalysisSchema = z.object({
  summary: z.string().trim().min(1),
  strengths: z.array(z.string()),
  gaps: z.array(z.string()),
  reasoning: z.string().trim().min(1),
  recommendation: z.string().trim().min(1),
})

export type MatchAnalysisPayload = z.infer<typeof matchAnalysisSchema>

// Bare array, or wrapped when the model insists on an object.
export const requirementsSchema = z.union([
  z.array(z.string()),
  z.object({ requirements: z.array(z.string()) }).transform((o) => o.requirements),
])
