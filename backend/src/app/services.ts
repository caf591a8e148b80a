import type { ApiConfig } from '../lib/config.js';
import type { Db } from '../lib/db/client.js';
import { openDatabase } from '../lib/db/client.js';
import { JobExecutionController } from '../lib/jobs/controller.js';
import type { StatusListener } from '../lib/jobs/controller.js';
import { PooledTaskQueue } from '../lib/jobs/queue.js';
import type { TaskQueue } from '../lib/jobs/queue.js';
import { SqliteJobStore } from '../lib/jobs/store.js';
import type { JobStore } from '../lib/jobs/store.js';
import { builtinProcesses } from '../lib/processes/builtins/index.js';
import { ProcessRegistry } from '../lib/processes/registry.js';
import type { ProcessDefinition } from '../lib/processes/types.js';
import { notifyJobStatus } from '../ws/domains/jobs.js';

export type Services = {
  config: ApiConfig;
  db: Db;
  store: JobStore;
  registry: ProcessRegistry;
  queue: TaskQueue;
  controller: JobExecutionController;
  close(): Promise<void>;
};

export type ServiceOverrides = {
  queue?: TaskQueue;
  processes?: readonly ProcessDefinition[];
  onStatusChange?: StatusListener;
  now?: () => Date;
};

export function createServices(config: ApiConfig, overrides: ServiceOverrides = {}): Services {
  const db = openDatabase(config.databasePath);
  const store = new SqliteJobStore(db, { now: overrides.now });
  const registry = new ProcessRegistry(db, overrides.processes ?? builtinProcesses);
  registry.seed();

  const queue = overrides.queue ?? new PooledTaskQueue(config.jobs.concurrency);
  const controller = new JobExecutionController({
    store,
    registry,
    queue,
    heartbeatIntervalMs: config.jobs.heartbeatIntervalMs,
    onStatusChange: overrides.onStatusChange ?? notifyJobStatus,
    now: overrides.now,
  });

  return {
    config,
    db,
    store,
    registry,
    queue,
    controller,
    async close() {
      await controller.shutdown();
      db.close();
    },
  };
}
