import { clientOwnerKey } from "../../core/domain/caller.js"
import { getClient, listClients } from "./clients.js"
import type { Db } from "./database.js"

export type ClientStats = {
  client_id: string
  client_name: string
  total_cvs: number
  total_jobs: number
  total_shortlists: number
  is_active: boolean
  last_used_at: string | null
  created_at: string
}

export type SystemOverview = {
  total_clients: number
  active_clients: number
  active_tokens: number
  total_cvs: number
  total_jobs: number
  total_shortlists: number
  system_status: "operational"
}

type Table = "cvs" | "job_descriptions" | "shortlists"

function countOwned(db: Db, table: Table, ownerId: string): number {
  return db.prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM ${table} WHERE owner_id = ?`).get(ownerId)?.n ?? 0
}

function count(db: Db, sql: string): number {
  return db.prepare<[], { n: number }>(sql).get()?.n ?? 0
}

export function getClientStatistics(db: Db, clientId: string): ClientStats | null {
  const client = getClient(db, clientId)
  if (!client) return null

  const owner = clientOwnerKey(clientId)
  return {
    client_id: client.client_id,
    client_name: client.name,
    total_cvs: countOwned(db, "cvs", owner),
    total_jobs: countOwned(db, "job_descriptions", owner),
    total_shortlists: countOwned(db, "shortlists", owner),
    is_active: client.is_active,
    last_used_at: client.last_used_at,
    created_at: client.created_at,
  }
}

export function getSystemOverview(db: Db, now: string): SystemOverview {
  return {
    total_clients: count(db, `SELECT COUNT(*) AS n FROM oauth2_clients`),
    active_clients: count(db, `SELECT COUNT(*) AS n FROM oauth2_clients WHERE is_active = 1`),
    active_tokens: db
      .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM access_tokens WHERE is_active = 1 AND expires_at > ?`)
      .get(now)?.n ?? 0,
    total_cvs: count(db, `SELECT COUNT(*) AS n FROM cvs`),
    total_jobs: count(db, `SELECT COUNT(*) AS n FROM job_descriptions`),
    total_shortlists: count(db, `SELECT COUNT(*) AS n FROM shortlists`),
    system_status: "operational",
  }
}

export function getAllClientStatistics(db: Db): ClientStats[] {
  const out: ClientStats[] = []
  for (const c of listClients(db, 0, Number.MAX_SAFE_INTEGER)) {
    const stats = getClientStatistics(db, c.client_id)
    if (stats) out.push(stats)
  }
  return out
}
