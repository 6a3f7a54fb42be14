import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import type { AppDatabase, DbAllResult, DbPreparedStatement, DbRunResult } from '../types/db'

// better-sqlite3 binds neither booleans nor undefined
function normalizeParam(value: unknown) {
  if (value === undefined) return null
  if (typeof value === 'boolean') return value ? 1 : 0
  return value
}

class SqlitePreparedStatement implements DbPreparedStatement {
  constructor(
    private readonly db: Database.Database,
    private readonly sql: string,
    private readonly params: unknown[] = [],
  ) {}

  bind(...params: unknown[]) {
    return new SqlitePreparedStatement(this.db, this.sql, params.map(normalizeParam))
  }

  async first<T>(): Promise<T | null> {
    const row = this.db.prepare(this.sql).get(...this.params)
    return row === undefined ? null : (row as T)
  }

  async all<T>(): Promise<DbAllResult<T>> {
    const rows = this.db.prepare(this.sql).all(...this.params)
    return { results: rows as T[] }
  }

  async run(): Promise<DbRunResult> {
    const info = this.db.prepare(this.sql).run(...this.params)
    return {
      meta: {
        changes: info.changes,
        last_row_id: Number(info.lastInsertRowid),
      },
    }
  }
}

class SqliteDatabase implements AppDatabase {
  readonly dialect = 'sqlite' as const

  constructor(private readonly db: Database.Database) {}

  prepare(sql: string): DbPreparedStatement {
    return new SqlitePreparedStatement(this.db, sql)
  }

  async close() {
    this.db.close()
  }
}

/** Opens (creating the parent directory of) a SQLite file, or `:memory:`. */
export function createSqliteDatabase(path: string): AppDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true })
  }
  const db = new Database(path)
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  return new SqliteDatabase(db)
}
