// Applied in order; PRAGMA user_version records how many have run.
export const migrations: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS processes (
    id TEXT PRIMARY KEY,
    summary TEXT NOT NULL,
    inputs TEXT NOT NULL DEFAULT '{}',
    outputs TEXT NOT NULL DEFAULT '{}'
  );

  CREATE TABLE IF NOT EXISTS jobs (
    job_id TEXT PRIMARY KEY,
    process_id TEXT NOT NULL,
    status TEXT NOT NULL
      CHECK (status IN ('accepted', 'running', 'successful', 'failed', 'dismissed')),
    message TEXT,
    progress INTEGER,
    inputs TEXT NOT NULL DEFAULT '{}',
    results TEXT,
    created TEXT NOT NULL,
    started TEXT,
    finished TEXT,
    updated TEXT NOT NULL,
    heartbeat_at TEXT,
    CHECK ((status = 'successful') = (results IS NOT NULL))
  );

  CREATE INDEX IF NOT EXISTS jobs_created_idx ON jobs (created, job_id);
  CREATE INDEX IF NOT EXISTS jobs_status_idx ON jobs (status, heartbeat_at);
  `,
];
