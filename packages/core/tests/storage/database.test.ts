import { describe, it, expect } from 'vitest'
import { openDatabase, currentSchemaVersion, LATEST_SCHEMA_VERSION, runMigrations } from '../../src/storage/index.js'

describe('openDatabase', () => {
  it('creates the loan profile table and the schema version table', () => {
    const db = openDatabase(':memory:')
    const names = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => (typeof row === 'object' && row !== null ? Reflect.get(row, 'name') : undefined))

    expect(names).toContain('loan_profiles')
    expect(names).toContain('schema_version')
    db.close()
  })

  it('in-memory databases report the memory journal mode', () => {
    const db = openDatabase(':memory:')
    expect(db.pragma('journal_mode', { simple: true })).toBe('memory')
    db.close()
  })

  it('enables foreign keys', () => {
    const db = openDatabase(':memory:')
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1)
    db.close()
  })

  it('records the latest schema version', () => {
    const db = openDatabase(':memory:')
    expect(LATEST_SCHEMA_VERSION).toBe(2)
    expect(currentSchemaVersion(db)).toBe(2)
    db.close()
  })

  it('re-running migrations is a no-op', () => {
    const db = openDatabase(':memory:')
    expect(() => runMigrations(db)).not.toThrow()
    const count = db.prepare('SELECT COUNT(*) AS n FROM schema_version').pluck().get()
    expect(count).toBe(2)
    db.close()
  })
})
