import type { Server as HttpServer } from 'http';
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { DefaultUserService } from './application/users/userService.js';
import { createPool } from './infra/db/pool.js';
import { runMigrations } from './infra/db/migrate.js';
import { PgUserRepo } from './infra/db/userRepo.js';
import { UserGrpcHandler } from './infra/grpc/userHandler.js';
import { USER_SERVICE_NAME, loadUserProto } from './infra/grpc/userProto.js';
import { bindGrpcServer, createGrpcServer, shutdownGrpcServer } from './infra/grpc/server.js';
import { createHttpApp } from './infra/http/app.js';
import { createMetrics } from './infra/metrics.js';

dotenv.config();

function listen(app: ReturnType<typeof createHttpApp>, port: number, host: string): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once('error', reject);
  });
}

function closeHttp(server: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, serviceName: config.serviceName });
  logger.info({ version: config.build.version }, 'Starting user service');

  const pool = createPool(config.database, logger);
  if (config.database.runMigrations) {
    const applied = await runMigrations(pool, logger, config.database.migrationsDir);
    logger.info({ applied }, 'Database migrations complete');
  }

  const metrics = createMetrics();
  const userService = new DefaultUserService(new PgUserRepo(pool), logger);
  const handler = new UserGrpcHandler(userService, logger);

  const { server: grpcServer, health } = createGrpcServer({
    handler,
    logger,
    metrics,
    packageDefinition: loadUserProto(),
  });
  const grpcPort = await bindGrpcServer(grpcServer, `${config.server.host}:${config.server.grpcPort}`);
  logger.info({ port: grpcPort }, 'gRPC server listening');

  const app = createHttpApp({
    pingDatabase: () => pool.query('SELECT 1'),
    metrics,
    build: config.build,
    logger,
  });
  const httpServer = await listen(app, config.server.httpPort, config.server.host);
  logger.info({ port: config.server.httpPort }, 'HTTP server listening');

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    health.setStatus('', 'NOT_SERVING');
    health.setStatus(USER_SERVICE_NAME, 'NOT_SERVING');
    try {
      await closeHttp(httpServer);
      await shutdownGrpcServer(grpcServer, config.server.shutdownTimeoutMs);
      await pool.end();
      logger.info('Shutdown complete');
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exitCode = 1;
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start user service:', error);
  process.exit(1);
});
