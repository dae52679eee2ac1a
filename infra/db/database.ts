import fs from "fs"
import path from "path"
import Database from "better-sqlite3"

export type Db = Database.Database

/**
 * Open the SQLite database and apply pending migrations in filename order.
 * Applied names are tracked in `_migrations`.
 */
export function openDatabase(file: string, migrationsDir: string): Db {
  const db = new Database(file)
  db.pragma("foreign_keys = ON")
  if (file !== ":memory:") db.pragma("journal_mode = WAL")
  applyMigrations(db, migrationsDir)
  return db
}

export function applyMigrations(db: Db, migrationsDir: string): string[] {
  db.exec(`CREATE TABLE IF NOT EXISTS _migrations (name TEXT PRIMARY KEY, applied_at TEXT NOT NULL)`)

  const applied = new Set(
    db.prepare<[], { name: string }>(`SELECT name FROM _migrations`).all().map((r) => r.name)
  )

  const pending = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql") && !applied.has(f))
    .sort()

  const record = db.prepare<[string, string]>(`INSERT INTO _migrations (name, applied_at) VALUES (?, ?)`)
  for (const name of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, name), "utf8")
    db.transaction(() => {
      db.exec(sql)
      record.run(name, new Date().toISOString())
    })()
  }
  return pending
}

export function rowId(id: number | bigint): number {
  return typeof id === "bigint" ? Number(id) : id
}

export function isUniqueViolation(e: unknown): boolean {
  return e instanceof Database.SqliteError && e.code === "SQLITE_CONSTRAINT_UNIQUE"
}
