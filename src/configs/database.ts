import fs from "fs";
import path from "path";
import type { PoolConfig } from "pg";
import { loadConfig } from "./environment";

const config = loadConfig();

export const DATABASE_CONFIG: PoolConfig = {
  host: config.database.host,
  port: config.database.port,
  database: config.database.name,
  user: config.database.user,
  password: config.database.password,
  ssl: config.database.sslCertPath
    ? {
        rejectUnauthorized: true,
        ca: fs
          .readFileSync(path.resolve(config.database.sslCertPath))
          .toString(),
      }
    : undefined,
};

// Idempotent; run on every startup
export const WORKOUT_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS exercises (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    sets INTEGER NOT NULL DEFAULT 3,
    reps_min INTEGER,
    reps_max INTEGER,
    to_failure BOOLEAN NOT NULL DEFAULT false,
    comment TEXT,
    rest_seconds INTEGER
);

CREATE TABLE IF NOT EXISTS workouts (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    comment TEXT,
    exercise_ids INTEGER[] NOT NULL DEFAULT '{}',
    paired_sets JSONB NOT NULL DEFAULT '[]'
);

CREATE TABLE IF NOT EXISTS performance (
    id SERIAL PRIMARY KEY,
    workout_id INTEGER NOT NULL,
    exercise_id INTEGER NOT NULL,
    performed_on DATE NOT NULL,
    reps INTEGER[] NOT NULL DEFAULT '{}',
    weights DOUBLE PRECISION[] NOT NULL DEFAULT '{}',
    created_at TIMESTAMP DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_performance_workout_id
ON performance(workout_id);

CREATE INDEX IF NOT EXISTS idx_performance_exercise_id
ON performance(exercise_id);
`;
