/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Loan profiles stored as validated JSON documents',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS loan_profiles (
          loan_id TEXT PRIMARY KEY,
          loan_name TEXT NOT NULL,
          borrower_name TEXT NOT NULL,
          profile_json TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `)
    },
  },
  {
    version: 2,
    description: 'Requirement count and recency index for profile listings',
    up(db) {
      db.exec(`
        ALTER TABLE loan_profiles ADD COLUMN requirement_count INTEGER NOT NULL DEFAULT 0;
        CREATE INDEX IF NOT EXISTS idx_loan_profiles_updated ON loan_profiles(updated_at);
      `)
    },
  },
]

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1]?.version ?? 0

const VersionRowSchema = z.object({ version: z.number().int().nullable() })

export function currentSchemaVersion(db: Database.Database): number {
  const row = VersionRowSchema.safeParse(db.prepare('SELECT MAX(version) as version FROM schema_version').get())
  return row.success ? (row.data.version ?? 0) : 0
}

export function runMigrations(db: Database.Database): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`)

  const applied = currentSchemaVersion(db)

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}
