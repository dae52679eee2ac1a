// OAuth2 clients, their access tokens and per-request usage rows.
import { isScope, clientOwnerKey, type Scope } from "../../core/domain/caller.js"
import { jsonStringArray } from "../../src/lib/json.js"
import { rowId, type Db } from "./database.js"

type ClientRow = {
  id: number
  client_id: string
  client_secret_hash: string
  name: string
  description: string | null
  scopes_json: string
  rate_limit_per_hour: number
  is_active: number
  created_by: number | null
  last_used_at: string | null
  created_at: string
  updated_at: string
}

export type OAuthClient = {
  id: number
  client_id: string
  name: string
  description: string | null
  scopes: Scope[]
  rate_limit_per_hour: number
  is_active: boolean
  created_by: number | null
  last_used_at: string | null
  created_at: string
  updated_at: string
}

export type ClientWithSecretHash = OAuthClient & { client_secret_hash: string }

type TokenRow = {
  id: number
  client_id: string
  scopes_json: string
  is_active: number
  expires_at: string
  last_used_at: string | null
  created_at: string
}

export type AccessTokenInfo = {
  id: number
  client_id: string
  scopes: Scope[]
  is_active: boolean
  expires_at: string
  last_used_at: string | null
  created_at: string
}

const scopesOf = (json: string): Scope[] => jsonStringArray(json).filter(isScope)

function toClient(r: ClientRow): ClientWithSecretHash {
  return {
    id: r.id,
    client_id: r.client_id,
    client_secret_hash: r.client_secret_hash,
    name: r.name,
    description: r.description,
    scopes: scopesOf(r.scopes_json),
    rate_limit_per_hour: r.rate_limit_per_hour,
    is_active: r.is_active === 1,
    created_by: r.created_by,
    last_used_at: r.last_used_at,
    created_at: r.created_at,
    updated_at: r.updated_at,
  }
}

export function withoutSecret(c: ClientWithSecretHash): OAuthClient {
  const { client_secret_hash: _hash, ...rest } = c
  return rest
}

function toToken(r: TokenRow): AccessTokenInfo {
  return {
    id: r.id,
    client_id: r.client_id,
    scopes: scopesOf(r.scopes_json),
    is_active: r.is_active === 1,
    expires_at: r.expires_at,
    last_used_at: r.last_used_at,
    created_at: r.created_at,
  }
}

export type NewClient = {
  clientId: string
  secretHash: string
  name: string
  description: string | null
  scopes: Scope[]
  rateLimitPerHour: number
  createdBy: number | null
  now: string
}

export function insertClient(db: Db, c: NewClient): ClientWithSecretHash {
  const res = db
    .prepare(
      `INSERT INTO oauth2_clients
         (client_id, client_secret_hash, name, description, scopes_json, rate_limit_per_hour, is_active, created_by, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, 1, ?, ?, ?)`
    )
    .run(c.clientId, c.secretHash, c.name, c.description, JSON.stringify(c.scopes), c.rateLimitPerHour, c.createdBy, c.now, c.now)

  return {
    id: rowId(res.lastInsertRowid),
    client_id: c.clientId,
    client_secret_hash: c.secretHash,
    name: c.name,
    description: c.description,
    scopes: c.scopes,
    rate_limit_per_hour: c.rateLimitPerHour,
    is_active: true,
    created_by: c.createdBy,
    last_used_at: null,
    created_at: c.now,
    updated_at: c.now,
  }
}

export function getClient(db: Db, clientId: string): ClientWithSecretHash | null {
  const row = db.prepare<[string], ClientRow>(`SELECT * FROM oauth2_clients WHERE client_id = ?`).get(clientId)
  return row ? toClient(row) : null
}

export function listClients(db: Db, skip = 0, limit = 100): ClientWithSecretHash[] {
  return db
    .prepare<[number, number], ClientRow>(`SELECT * FROM oauth2_clients ORDER BY id LIMIT ? OFFSET ?`)
    .all(limit, skip)
    .map(toClient)
}

export type ClientPatch = {
  name?: string
  description?: string | null
  isActive?: boolean
  rateLimitPerHour?: number
  scopes?: Scope[]
}

export function updateClient(db: Db, current: ClientWithSecretHash, patch: ClientPatch, now: string): ClientWithSecretHash {
  const next: ClientWithSecretHash = {
    ...current,
    name: patch.name ?? current.name,
    description: patch.description !== undefined ? patch.description : current.description,
    is_active: patch.isActive ?? current.is_active,
    rate_limit_per_hour: patch.rateLimitPerHour ?? current.rate_limit_per_hour,
    scopes: patch.scopes ?? current.scopes,
    updated_at: now,
  }
  db.prepare(
    `UPDATE oauth2_clients
        SET name = ?, description = ?, is_active = ?, rate_limit_per_hour = ?, scopes_json = ?, updated_at = ?
      WHERE client_id = ?`
  ).run(
    next.name,
    next.description,
    next.is_active ? 1 : 0,
    next.rate_limit_per_hour,
    JSON.stringify(next.scopes),
    now,
    current.client_id
  )
  return next
}

export function setClientSecret(db: Db, clientId: string, secretHash: string, now: string): void {
  db.prepare(`UPDATE oauth2_clients SET client_secret_hash = ?, updated_at = ? WHERE client_id = ?`).run(
    secretHash,
    now,
    clientId
  )
}

export function touchClient(db: Db, clientId: string, now: string): void {
  db.prepare(`UPDATE oauth2_clients SET last_used_at = ? WHERE client_id = ?`).run(now, clientId)
}

export function revokeClientTokens(db: Db, clientId: string): number {
  return db.prepare(`UPDATE access_tokens SET is_active = 0 WHERE client_id = ? AND is_active = 1`).run(clientId).changes
}

/**
 * Remove a client and everything it owns. Tokens and usage rows cascade
 * from the client row; owned jobs, CVs and shortlists are keyed by owner id.
 */
export function deleteClientCascade(db: Db, clientId: string): boolean {
  const owner = clientOwnerKey(clientId)
  return db.transaction(() => {
    revokeClientTokens(db, clientId)
    db.prepare(`DELETE FROM shortlists WHERE owner_id = ?`).run(owner)
    db.prepare(`DELETE FROM cvs WHERE owner_id = ?`).run(owner)
    db.prepare(`DELETE FROM job_descriptions WHERE owner_id = ?`).run(owner)
    return db.prepare(`DELETE FROM oauth2_clients WHERE client_id = ?`).run(clientId).changes > 0
  })()
}

export function insertToken(
  db: Db,
  t: { tokenHash: string; clientId: string; scopes: Scope[]; expiresAt: string; now: string }
): void {
  db.prepare(
    `INSERT INTO access_tokens (token_hash, client_id, scopes_json, is_active, expires_at, created_at)
     VALUES (?, ?, ?, 1, ?, ?)`
  ).run(t.tokenHash, t.clientId, JSON.stringify(t.scopes), t.expiresAt, t.now)
}

export type ActiveToken = { token: AccessTokenInfo; client: ClientWithSecretHash }

// Active, unexpired token whose client is also active.
export function findActiveToken(db: Db, tokenHash: string, now: string): ActiveToken | null {
  const row = db
    .prepare<[string, string], TokenRow>(
      `SELECT * FROM access_tokens WHERE token_hash = ? AND is_active = 1 AND expires_at > ?`
    )
    .get(tokenHash, now)
  if (!row) return null

  const client = getClient(db, row.client_id)
  if (!client || !client.is_active) return null

  db.prepare(`UPDATE access_tokens SET last_used_at = ? WHERE id = ?`).run(now, row.id)
  return { token: { ...toToken(row), last_used_at: now }, client }
}

export function revokeTokenByHash(db: Db, tokenHash: string, clientId: string): boolean {
  return (
    db.prepare(`UPDATE access_tokens SET is_active = 0 WHERE token_hash = ? AND client_id = ?`).run(tokenHash, clientId)
      .changes > 0
  )
}

export function listTokens(
  db: Db,
  filter: { clientId?: string; activeOnly: boolean; skip: number; limit: number }
): AccessTokenInfo[] {
  const where: string[] = []
  const params: Array<string | number> = []
  if (filter.activeOnly) where.push("is_active = 1")
  if (filter.clientId) {
    where.push("client_id = ?")
    params.push(filter.clientId)
  }
  const sql =
    `SELECT id, client_id, scopes_json, is_active, expires_at, last_used_at, created_at FROM access_tokens` +
    (where.length ? ` WHERE ${where.join(" AND ")}` : "") +
    ` ORDER BY id LIMIT ? OFFSET ?`
  return db
    .prepare<Array<string | number>, TokenRow>(sql)
    .all(...params, filter.limit, filter.skip)
    .map(toToken)
}

export type UsageEntry = {
  clientId: string
  endpoint: string
  method: string
  statusCode: number
  responseTimeMs: number
  ipAddress: string | null
  now: string
}

export function logApiUsage(db: Db, u: UsageEntry): void {
  db.prepare(
    `INSERT INTO api_usage (client_id, endpoint, method, status_code, response_time_ms, ip_address, request_time)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  ).run(u.clientId, u.endpoint, u.method, u.statusCode, u.responseTimeMs, u.ipAddress, u.now)
}

export function countUsageSince(db: Db, clientId: string, sinceIso: string): number {
  return (
    db
      .prepare<[string, string], { n: number }>(
        `SELECT COUNT(*) AS n FROM api_usage WHERE client_id = ? AND request_time >= ?`
      )
      .get(clientId, sinceIso)?.n ?? 0
  )
}
