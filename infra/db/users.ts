import { rowId, type Db } from "./database.js"

export type UserRow = {
  id: number
  email: string
  username: string
  hashed_password: string
  is_active: number
  is_super_admin: number
  created_at: string
}

export type PublicUser = {
  id: number
  email: string
  username: string
  is_active: boolean
  is_super_admin: boolean
  created_at: string
}

export function toPublicUser(r: UserRow): PublicUser {
  return {
    id: r.id,
    email: r.email,
    username: r.username,
    is_active: r.is_active === 1,
    is_super_admin: r.is_super_admin === 1,
    created_at: r.created_at,
  }
}

export function countUsers(db: Db): number {
  return db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM users`).get()?.n ?? 0
}

export function findUserByUsername(db: Db, username: string): UserRow | null {
  return db.prepare<[string], UserRow>(`SELECT * FROM users WHERE username = ?`).get(username) ?? null
}

export function userExists(db: Db, username: string, email: string): boolean {
  return !!db
    .prepare<[string, string], { id: number }>(`SELECT id FROM users WHERE username = ? OR email = ?`)
    .get(username, email)
}

export function insertUser(
  db: Db,
  u: { email: string; username: string; hashedPassword: string; isSuperAdmin: boolean; now: string }
): UserRow {
  const res = db
    .prepare(
      `INSERT INTO users (email, username, hashed_password, is_active, is_super_admin, created_at)
       VALUES (?, ?, ?, 1, ?, ?)`
    )
    .run(u.email, u.username, u.hashedPassword, u.isSuperAdmin ? 1 : 0, u.now)

  return {
    id: rowId(res.lastInsertRowid),
    email: u.email,
    username: u.username,
    hashed_password: u.hashedPassword,
    is_active: 1,
    is_super_admin: u.isSuperAdmin ? 1 : 0,
    created_at: u.now,
  }
}
