import Database from "better-sqlite3";
import { z } from "zod";
import {
  toError,
  type JobHistoryPort,
  type JobRunRecord,
  type JobStatus,
  type MurmurErrorCode,
  type StageRecord,
} from "@murmur/core";
import { migrate } from "./migrations/index.js";

export interface SqliteStorageOptions {
  path: string;
  /**
   * If true, runs migrations on creation
   * @default true
   */
  migrate?: boolean;
}

export class SqliteError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "SqliteError";
  }
}

export class SqliteInitializationError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "SqliteInitializationError";
  }
}

export class RunNotFoundError extends SqliteError {
  constructor(public readonly id: string) {
    super(`Run with id ${id} not found`);
    this.name = "RunNotFoundError";
  }
}

interface JobRunRow {
  id: string;
  status: JobStatus;
  input: string;
  output_dir: string;
  stages: string;
  outputs: string;
  error: string | null;
  error_code: MurmurErrorCode | null;
  created_at: string;
  updated_at: string;
}

const stagesSchema = z.array(
  z.object({
    kind: z.enum(["download", "transcribe"]),
    state: z.enum(["not-started", "running", "succeeded", "failed", "cancelled"]),
    exitCode: z.number().nullable(),
    startedAt: z.coerce.date().optional(),
    finishedAt: z.coerce.date().optional(),
  }),
);

const outputsSchema = z.array(z.string());

// Timestamps are stored as UTC without a zone suffix
const parseTimestamp = (value: string): Date =>
  new Date(`${value.replace(" ", "T")}Z`);

const parseRun = (row: JobRunRow): JobRunRecord => ({
  id: row.id,
  status: row.status,
  input: row.input,
  outputDir: row.output_dir,
  stages: stagesSchema.parse(JSON.parse(row.stages)),
  outputs: outputsSchema.parse(JSON.parse(row.outputs)),
  error: row.error ?? undefined,
  errorCode: row.error_code ?? undefined,
  createdAt: parseTimestamp(row.created_at),
  updatedAt: parseTimestamp(row.updated_at),
});

const isSqliteError = (
  error: unknown,
): error is Error & { code?: string } =>
  error instanceof Error && "code" in error;

interface CreateRunParams {
  id: string;
  status: JobStatus;
  input: string;
  output_dir: string;
  stages: string;
  outputs: string;
  error: string | null;
  error_code: string | null;
}

interface UpdateRunParams {
  id: string;
  status: JobStatus | null;
  stages: string | null;
  outputs: string | null;
  error: string | null;
  error_code: string | null;
}

const serializeStages = (stages: StageRecord[]): string =>
  JSON.stringify(stages);

export const createSqliteStorage = async (
  options: SqliteStorageOptions,
): Promise<JobHistoryPort> => {
  let db: Database.Database;

  try {
    db = new Database(options.path);

    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");

    // Test the connection
    db.prepare("SELECT 1").get();

    if (options.migrate !== false) {
      await migrate(db);
    }

    const tables = db
      .prepare(
        `
        SELECT name FROM sqlite_master
        WHERE type='table' AND name IN ('job_runs')
      `,
      )
      .all();

    if (tables.length !== 1) {
      const notInitialized = (): never => {
        throw new SqliteError(
          "Database not initialized: no such table: job_runs",
        );
      };
      return {
        createRun: async () => notInitialized(),
        updateRun: async () => notInitialized(),
        getRun: async () => notInitialized(),
        listRuns: async () => notInitialized(),
        close: async () => {
          db.close();
        },
      };
    }

    const createRunStmt = db.prepare<CreateRunParams, JobRunRow>(`
      INSERT INTO job_runs (
        id,
        status,
        input,
        output_dir,
        stages,
        outputs,
        error,
        error_code,
        created_at,
        updated_at
      ) VALUES (
        @id,
        @status,
        @input,
        @output_dir,
        @stages,
        @outputs,
        @error,
        @error_code,
        strftime('%Y-%m-%d %H:%M:%f', 'now'),
        strftime('%Y-%m-%d %H:%M:%f', 'now')
      ) RETURNING *
    `);

    const updateRunStmt = db.prepare<UpdateRunParams, JobRunRow>(`
      UPDATE job_runs
      SET
        status = COALESCE(@status, status),
        stages = COALESCE(@stages, stages),
        outputs = COALESCE(@outputs, outputs),
        error = COALESCE(@error, error),
        error_code = COALESCE(@error_code, error_code),
        updated_at = strftime('%Y-%m-%d %H:%M:%f', 'now')
      WHERE id = @id
      RETURNING *
    `);

    const getRunStmt = db.prepare<{ id: string }, JobRunRow>(`
      SELECT * FROM job_runs WHERE id = @id
    `);

    const listRunsStmt = db.prepare<{ limit: number }, JobRunRow>(`
      SELECT * FROM job_runs
      ORDER BY created_at DESC, rowid DESC
      LIMIT @limit
    `);

    const storage: JobHistoryPort = {
      async createRun(run) {
        try {
          const row = createRunStmt.get({
            id: run.id,
            status: run.status,
            input: run.input,
            output_dir: run.outputDir,
            stages: serializeStages(run.stages),
            outputs: JSON.stringify(run.outputs),
            error: run.error ?? null,
            error_code: run.errorCode ?? null,
          });
          if (!row) {
            throw new SqliteError("Failed to create run: no row returned");
          }
          return parseRun(row);
        } catch (error) {
          if (error instanceof SqliteError) throw error;
          throw new SqliteError("Failed to create run", toError(error));
        }
      },

      async updateRun(id, update) {
        let row: JobRunRow | undefined;
        try {
          row = updateRunStmt.get({
            id,
            status: update.status ?? null,
            stages: update.stages ? serializeStages(update.stages) : null,
            outputs: update.outputs ? JSON.stringify(update.outputs) : null,
            error: update.error ?? null,
            error_code: update.errorCode ?? null,
          });
        } catch (error) {
          throw new SqliteError("Failed to update run", toError(error));
        }
        if (!row) {
          throw new RunNotFoundError(id);
        }
        return parseRun(row);
      },

      async getRun(id) {
        try {
          const row = getRunStmt.get({ id });
          return row ? parseRun(row) : null;
        } catch (error) {
          throw new SqliteError("Failed to get run", toError(error));
        }
      },

      async listRuns(limit = 50) {
        try {
          return listRunsStmt.all({ limit }).map(parseRun);
        } catch (error) {
          throw new SqliteError("Failed to list runs", toError(error));
        }
      },

      async close() {
        try {
          if (db.open) {
            db.close();
          }
        } catch (error) {
          throw new SqliteError(
            "Failed to close database connection",
            toError(error),
          );
        }
      },
    };

    return storage;
  } catch (error: unknown) {
    if (isSqliteError(error) && error.code === "SQLITE_NOTADB") {
      throw new SqliteInitializationError(
        "Invalid database file. The file might be corrupted or not a SQLite database.",
        error,
      );
    }

    throw new SqliteInitializationError(
      "Failed to initialize SQLite database: " + toError(error).message,
      toError(error),
    );
  }
};
