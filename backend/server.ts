/**
 * 工作端入口：等待推理服务就绪后启动 HTTP 服务
 */
import 'dotenv/config';
import type { Server } from 'http';
import { loadWorkerConfig } from './app-config.js';
import { errorMessage } from './domain/index.js';
import { waitForServerReady } from './infrastructure/inference/comfy/http-client.js';
import { createApp } from './interfaces/http/index.js';
import { LogManager } from './services/log-manager.js';
import { initializeServices } from './services/service-initializer.js';

const HOUSEKEEPING_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  const config = loadWorkerConfig();
  const logManager = new LogManager();
  const logger = logManager.createLogger({ component: 'server' });

  const services = await initializeServices(config, logManager);
  await waitForServerReady(
    services.server,
    { intervalMs: config.readyIntervalMs, timeoutMs: config.readyTimeoutMs },
    logger
  );

  const app = createApp({
    runJob: services.runJob,
    tasks: services.tasks,
    workspace: services.workspace,
    logger,
    inferenceServer: config.comfyUrl,
    publicUrl: config.publicUrl,
    token: config.token,
  });

  const server: Server = app.listen(config.port, config.host, () => {
    logger.info(`Lip-sync worker listening on http://${config.host}:${config.port}`);
  });

  const sweep = () => {
    void services.housekeeping().catch((error: unknown) => {
      logger.warn(`Housekeeping failed: ${errorMessage(error)}`);
    });
  };
  sweep();
  const housekeepingTimer = setInterval(sweep, HOUSEKEEPING_INTERVAL_MS);
  housekeepingTimer.unref();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    clearInterval(housekeepingTimer);
    server.close(() => {
      void logManager.flush().then(() => process.exit(0));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error(`Worker failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
