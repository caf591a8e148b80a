import { createServer } from 'node:http';
import { createApp } from './app/createApp.js';
import { createServices } from './app/services.js';
import { loadConfig } from './lib/config.js';
import { logger } from './lib/logger/logger.js';
import { recoverOrphanedJobs, startStalledJobSweep } from './workers/stalledJobs.js';
import { createWsServer } from './ws/index.js';
import { notifyJobStatus } from './ws/domains/jobs.js';

async function main() {
  const config = loadConfig();
  const services = createServices(config);

  await recoverOrphanedJobs(services.store, notifyJobStatus);
  const stopSweep = startStalledJobSweep(services.store, {
    stalledThresholdMs: config.jobs.stalledThresholdMs,
    stalledSweepMs: config.jobs.stalledSweepMs,
    onFailed: notifyJobStatus,
  });

  const server = createServer(createApp(services));
  const wss = createWsServer(server, { path: `${config.apiPrefix}/ws` });

  server.listen(config.port, () => {
    logger.info('API listening', { url: config.publicUrl, port: config.port });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    stopSweep();
    wss.close();
    server.close();
    services
      .close()
      .then(() => process.exit(0))
      .catch(err => {
        logger.error('Shutdown failed', { error: err });
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
  logger.error('Startup failed', { error: err });
  process.exit(1);
});
