import type Database from "better-sqlite3";

interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: "job_runs",
    sql: `
      CREATE TABLE IF NOT EXISTS job_runs (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL CHECK (
          status IN ('running', 'succeeded', 'failed', 'cancelled')
        ),
        input TEXT NOT NULL,
        output_dir TEXT NOT NULL,
        stages TEXT NOT NULL DEFAULT '[]',
        outputs TEXT NOT NULL DEFAULT '[]',
        error TEXT,
        error_code TEXT,
        created_at DATETIME NOT NULL,
        updated_at DATETIME NOT NULL
      );
    `,
  },
  {
    version: 2,
    name: "job_runs_indexes",
    sql: `
      CREATE INDEX IF NOT EXISTS idx_job_runs_status ON job_runs(status);
      CREATE INDEX IF NOT EXISTS idx_job_runs_created_at ON job_runs(created_at);
    `,
  },
];

/** Applies every migration newer than the recorded schema version. */
export const migrate = async (db: Database.Database): Promise<number> => {
  const apply = db.transaction((): number => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
    `);

    const current =
      db
        .prepare<[], { version: number | null }>(
          "SELECT MAX(version) AS version FROM schema_migrations",
        )
        .get()?.version ?? 0;

    const record = db.prepare<[number, string]>(
      "INSERT INTO schema_migrations (version, name) VALUES (?, ?)",
    );

    let applied = 0;
    for (const migration of MIGRATIONS) {
      if (migration.version <= current) continue;
      db.exec(migration.sql);
      record.run(migration.version, migration.name);
      applied++;
    }
    return applied;
  });

  return apply();
};
