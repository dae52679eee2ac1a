import type { EngineDeps } from "./engine/deps.js"
import type { AuthService } from "./lib/auth.js"

// Everything the HTTP layer needs, built once in src/server.ts (or by a test).
export type AppDeps = EngineDeps & {
  auth: AuthService
  maxUploadBytes: number
}
