// Who is calling. Resolved once at the HTTP boundary, then passed down explicitly.

export type Scope = "read" | "write"

export const ALL_SCOPES: readonly Scope[] = ["read", "write"]

export type UserCaller = {
  kind: "user"
  userId: number
  username: string
  isSuperAdmin: boolean
}

export type ClientCaller = {
  kind: "client"
  clientId: string
  scopes: Scope[]
}

export type Caller = UserCaller | ClientCaller

// Owner id stored on every owned row (jobs, CVs, shortlists).
export function ownerKey(caller: Caller): string {
  return caller.kind === "user" ? `user:${caller.userId}` : `client:${caller.clientId}`
}

export function clientOwnerKey(clientId: string): string {
  return `client:${clientId}`
}

export function hasScope(caller: Caller, scope: Scope): boolean {
  // Users authenticated with a password hold every scope.
  return caller.kind === "user" || caller.scopes.includes(scope)
}

export function isScope(v: string): v is Scope {
  return v === "read" || v === "write"
}

/**
 * Parse an OAuth2 `scope` parameter (space separated).
 * Returns null when any entry is unknown.
 */
export function parseScopes(raw: string): Scope[] | null {
  const parts = raw.split(/\s+/).filter(Boolean)
  const out: Scope[] = []
  for (const p of parts) {
    if (!isScope(p)) return null
    if (!out.includes(p)) out.push(p)
  }
  return out
}

export function describeCaller(caller: Caller): string {
  return caller.kind === "user" ? `user:${caller.username}` : `client:${caller.clientId}`
}
