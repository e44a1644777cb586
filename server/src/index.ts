import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { ConfigError, loadConfig, type AppConfig } from './config/env.js';
import { createServices, disposeServices } from './services.js';
import { logger } from './utils/logger.js';

// Global process-level safety nets
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandled_rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaught_exception');
});

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logger.error({ err, issues: err instanceof ConfigError ? err.issues : undefined }, 'config_invalid_exit');
  process.exit(1);
}

const services = createServices(config);
const app = createApp(services, { rateLimit: config.rateLimit });

function listen(port: number) {
  return new Promise<Server>((resolve, reject) => {
    const srv = app.listen(port, () => {
      logger.info({ port, env: config.env }, 'server_listening');
      resolve(srv);
    });
    srv.on('error', reject);
  });
}

function shutdown(server: Server, signal: string) {
  logger.info({ signal }, 'server_shutdown');
  disposeServices(services);
  server.close((err) => {
    if (err) logger.error({ err }, 'server_close_failed');
    process.exit(err ? 1 : 0);
  });
  // open event streams keep the server alive; do not wait on them forever
  setTimeout(() => process.exit(0), 5000).unref();
}

listen(config.port).then(
  (server) => {
    process.once('SIGINT', () => shutdown(server, 'SIGINT'));
    process.once('SIGTERM', () => shutdown(server, 'SIGTERM'));
  },
  (err: unknown) => {
    logger.error({ err, port: config.port }, 'server_listen_failed');
    process.exit(1);
  }
);
