// api/src/db.ts
import pg from "pg";
import { parse as parsePg } from "pg-connection-string";
import { AsyncLocalStorage } from "node:async_hooks";
import { config } from "./config.js";
import { AppError, describeError } from "./middleware/errorHandler.js";

const { Pool } = pg;

// Parse DATABASE_URL ourselves so stray PG* env vars cannot override it
const cn = parsePg(config.databaseUrl);
const resolvedHost = cn.host || "127.0.0.1";
const isLocalHost =
  resolvedHost === "127.0.0.1" || resolvedHost === "localhost" || resolvedHost === "::1";

export const pool = new Pool({
  host: resolvedHost,
  port: cn.port ? Number(cn.port) : 5432,
  user: cn.user ?? undefined,
  password: cn.password ?? undefined,
  database: cn.database ?? undefined,
  // Managed Postgres providers require SSL; local dev Postgres usually doesn't.
  ssl: isLocalHost ? false : { rejectUnauthorized: false },
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 10_000,
});

const txStorage = new AsyncLocalStorage<pg.PoolClient>();

pool.on("connect", () => {
  if (config.nodeEnv !== "production") console.log("DB: connected");
});
pool.on("error", (err) => {
  console.error("DB: unexpected error", err);
});

/** SQL helper; joins the surrounding transaction when there is one. */
export async function q<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<T[]> {
  const t0 = Date.now();
  try {
    const client = txStorage.getStore();
    const res = client ? await client.query<T>(text, params) : await pool.query<T>(text, params);
    if (config.nodeEnv !== "production") {
      console.log(`SQL ok (${Date.now() - t0}ms, rows=${res.rowCount}) ::`, text.trim().split("\n")[0]);
    }
    return res.rows;
  } catch (err) {
    console.error("DB ERROR:", describeError(err), { text, params });
    throw new AppError("Database operation failed", 503, { code: "db_error", cause: err });
  }
}

export async function withTransaction<T>(fn: () => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await txStorage.run(client, async () => fn());
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      console.error("DB: rollback failed", describeError(rollbackErr));
    }
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool() {
  await pool.end();
  if (config.nodeEnv !== "production") console.log("DB: pool closed");
}

// ============================================================================
// SCHEMA
// ============================================================================

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS trainings (
     id text PRIMARY KEY,
     trainee_id text NOT NULL,
     name text NOT NULL,
     description text NOT NULL DEFAULT '',
     difficulty text NOT NULL DEFAULT 'beginner',
     scheduled_date date NOT NULL,
     exercises jsonb NOT NULL DEFAULT '[]'::jsonb,
     notes text NULL,
     is_completed boolean NOT NULL DEFAULT false,
     completed_at timestamptz NULL,
     updated_at timestamptz NOT NULL DEFAULT now()
   )`,
  `CREATE INDEX IF NOT EXISTS idx_trainings_trainee ON trainings(trainee_id, scheduled_date)`,
  `CREATE TABLE IF NOT EXISTS exercise_history (
     id uuid PRIMARY KEY,
     trainee_id text NOT NULL,
     training_id text NOT NULL,
     exercise_name text NOT NULL,
     workout_date date NOT NULL,
     completed_at timestamptz NOT NULL,
     sets jsonb NOT NULL
   )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_exercise_history_key
     ON exercise_history(trainee_id, exercise_name, workout_date)`,
  `CREATE TABLE IF NOT EXISTS measurements (
     id uuid PRIMARY KEY,
     trainee_id text NOT NULL,
     measured_on date NOT NULL,
     weight numeric NOT NULL,
     body jsonb NOT NULL DEFAULT '{}'::jsonb,
     updated_at timestamptz NOT NULL DEFAULT now(),
     UNIQUE (trainee_id, measured_on)
   )`,
  `CREATE TABLE IF NOT EXISTS steps_entries (
     trainee_id text NOT NULL,
     step_date date NOT NULL,
     steps int NOT NULL CHECK (steps >= 0),
     origin text NOT NULL DEFAULT 'manual',
     updated_at timestamptz NOT NULL DEFAULT now(),
     PRIMARY KEY (trainee_id, step_date)
   )`,
  `CREATE TABLE IF NOT EXISTS device_step_samples (
     id uuid PRIMARY KEY,
     trainee_id text NOT NULL,
     step_date date NOT NULL,
     steps int NOT NULL CHECK (steps >= 0),
     synced_at timestamptz NOT NULL DEFAULT now()
   )`,
  `CREATE INDEX IF NOT EXISTS idx_device_step_samples_day ON device_step_samples(trainee_id, step_date)`,
  `CREATE TABLE IF NOT EXISTS goals (
     id text PRIMARY KEY,
     trainee_id text NOT NULL,
     goal_type text NOT NULL,
     name text NOT NULL,
     current_value numeric NOT NULL,
     target_value numeric NOT NULL,
     unit text NOT NULL,
     deadline date NOT NULL,
     is_completed boolean NOT NULL DEFAULT false,
     subject text NULL,
     created_at timestamptz NOT NULL DEFAULT now()
   )`,
  `CREATE TABLE IF NOT EXISTS nutrition_plans (
     id text PRIMARY KEY,
     trainee_id text NOT NULL,
     name text NOT NULL,
     daily_calories int NOT NULL,
     macros jsonb NOT NULL DEFAULT '{}'::jsonb,
     created_at timestamptz NOT NULL DEFAULT now()
   )`,
  `CREATE TABLE IF NOT EXISTS nutrition_entries (
     id uuid PRIMARY KEY,
     trainee_id text NOT NULL,
     entry_date date NOT NULL,
     foods jsonb NOT NULL,
     created_at timestamptz NOT NULL DEFAULT now()
   )`,
  `CREATE INDEX IF NOT EXISTS idx_nutrition_entries_day ON nutrition_entries(trainee_id, entry_date)`,
  `CREATE TABLE IF NOT EXISTS user_settings (
     trainee_id text NOT NULL,
     key text NOT NULL,
     value text NOT NULL,
     updated_at timestamptz NOT NULL DEFAULT now(),
     PRIMARY KEY (trainee_id, key)
   )`,
];

/** Creates missing tables and indexes. Safe to run on every start. */
export async function migrate(): Promise<void> {
  console.log("🔧 Ensuring schema...");
  for (const statement of SCHEMA) {
    await pool.query(statement);
  }
  console.log("✅ Schema ensured");
}
