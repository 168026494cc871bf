import type Database from 'better-sqlite3'

interface SchemaEntry {
  name: string
  sql: string
}

function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`
}

function isSchemaEntry(row: unknown): row is SchemaEntry {
  return (
    typeof row === 'object' &&
    row !== null &&
    'name' in row &&
    typeof row.name === 'string' &&
    'sql' in row &&
    typeof row.sql === 'string'
  )
}

function columnName(row: unknown): string {
  if (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string') {
    return row.name
  }
  throw new TypeError('Unexpected table_info row')
}

function readSchema(db: Database.Database, sql: string): SchemaEntry[] {
  return db.prepare(sql).all().filter(isSchemaEntry)
}

function dumpRows(db: Database.Database, table: string): string[] {
  const quoted = quoteIdentifier(table)
  const columns = db.prepare(`PRAGMA table_info(${quoted})`).all().map(columnName)
  const values = columns.map((column) => `'||quote(${quoteIdentifier(column)})||'`).join(',')
  const insert = `SELECT 'INSERT INTO ${quoted.replaceAll("'", "''")} VALUES(${values})' FROM ${quoted}`
  return db
    .prepare(insert)
    .pluck()
    .all()
    .map((line) => `${String(line)};`)
}

/**
 * Render the database as SQL text, one statement per entry.
 *
 * Tables come first in name order, each followed by its rows as INSERTs,
 * then indexes, triggers and views. Internal `sqlite_` tables are skipped
 * except the autoincrement sequence and analyzer statistics.
 */
export function dumpDatabase(db: Database.Database): string[] {
  const lines = ['BEGIN TRANSACTION;']

  const tables = readSchema(
    db,
    `SELECT "name", "type", "sql" FROM "sqlite_master" WHERE "sql" NOT NULL AND "type" == 'table' ORDER BY "name"`,
  )
  for (const table of tables) {
    if (table.name === 'sqlite_sequence') {
      lines.push('DELETE FROM "sqlite_sequence";')
    } else if (table.name === 'sqlite_stat1') {
      lines.push('ANALYZE "sqlite_master";')
    } else if (table.name.startsWith('sqlite_')) {
      continue
    } else {
      lines.push(`${table.sql};`)
    }
    lines.push(...dumpRows(db, table.name))
  }

  const others = readSchema(
    db,
    `SELECT "name", "type", "sql" FROM "sqlite_master" WHERE "sql" NOT NULL AND "type" IN ('index', 'trigger', 'view')`,
  )
  for (const entry of others) {
    lines.push(`${entry.sql};`)
  }

  lines.push('COMMIT;')
  return lines
}
