import { readFile } from 'node:fs/promises'
import type { AppDatabase } from '../types/db'

export function splitSqlStatements(sql: string) {
  return sql
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0)
}

/** Applies `migrations/<dialect>.sql`; every statement is idempotent. */
export async function ensureSchema(db: AppDatabase) {
  const migrationUrl = new URL(`../../migrations/${db.dialect}.sql`, import.meta.url)
  const sql = await readFile(migrationUrl, 'utf8')
  for (const statement of splitSqlStatements(sql)) {
    await db.prepare(statement).run()
  }
}
