import mariadb from 'mariadb'
import type { AppDatabase, DbAllResult, DbPreparedStatement, DbRunResult } from '../types/db'

export type MariaDbRuntimeConfig = {
  host: string
  port: number
  user: string
  password: string
  database: string
  connectionLimit: number
}

/** The part of a `mariadb` pool the adapter uses. */
export interface MariaQueryable {
  query(sql: string, values: unknown[]): Promise<unknown>
  end(): Promise<void>
}

type OkPacket = {
  affectedRows: number | bigint
  insertId: number | bigint
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOkPacket(value: unknown): value is OkPacket {
  return isRecord(value) && 'affectedRows' in value && 'insertId' in value
}

function toSafeNumber(value: number | bigint, column: string) {
  if (typeof value === 'number') return value
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new Error(`MariaDB value out of range for ${column}: ${value}`)
  }
  return Number(value)
}

// epoch-ms and id columns are BIGINT; rows carry them as numbers like SQLite does
function normalizeRow(row: unknown) {
  if (!isRecord(row)) return row
  const normalized: Record<string, unknown> = {}
  for (const [column, value] of Object.entries(row)) {
    normalized[column] = typeof value === 'bigint' ? toSafeNumber(value, column) : value
  }
  return normalized
}

function normalizeParam(value: unknown) {
  if (value === undefined) return null
  if (typeof value === 'boolean') return value ? 1 : 0
  return value
}

class MariaPreparedStatement implements DbPreparedStatement {
  constructor(
    private readonly pool: MariaQueryable,
    private readonly sql: string,
    private readonly params: unknown[] = [],
  ) {}

  bind(...params: unknown[]) {
    return new MariaPreparedStatement(this.pool, this.sql, params.map(normalizeParam))
  }

  async first<T>(): Promise<T | null> {
    const rows = await this.rows()
    return rows.length === 0 ? null : (rows[0] as T)
  }

  async all<T>(): Promise<DbAllResult<T>> {
    const rows = await this.rows()
    return { results: rows as T[] }
  }

  async run(): Promise<DbRunResult> {
    const result = await this.pool.query(this.sql, this.params)
    if (!isOkPacket(result)) {
      return { meta: { changes: 0, last_row_id: 0 } }
    }
    return {
      meta: {
        changes: toSafeNumber(result.affectedRows, 'affectedRows'),
        last_row_id: toSafeNumber(result.insertId, 'insertId'),
      },
    }
  }

  private async rows() {
    const result = await this.pool.query(this.sql, this.params)
    return Array.isArray(result) ? result.map(normalizeRow) : []
  }
}

class MariaDatabase implements AppDatabase {
  readonly dialect = 'mariadb' as const

  constructor(private readonly pool: MariaQueryable) {}

  prepare(sql: string): DbPreparedStatement {
    return new MariaPreparedStatement(this.pool, sql)
  }

  close() {
    return this.pool.end()
  }
}

export function createMariaPool(config: MariaDbRuntimeConfig) {
  return mariadb.createPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectionLimit: config.connectionLimit,
    bigIntAsNumber: true,
    insertIdAsNumber: true,
    decimalAsNumber: true,
    timezone: 'Z',
  })
}

export function createMariaDatabase(pool: MariaQueryable): AppDatabase {
  return new MariaDatabase(pool)
}
