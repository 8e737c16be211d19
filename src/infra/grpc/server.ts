import { Server, ServerCredentials } from '@grpc/grpc-js';
import type { PackageDefinition } from '@grpc/proto-loader';
import { ReflectionService } from '@grpc/reflection';
import { HealthImplementation } from 'grpc-health-check';
import type { Logger } from 'pino';
import type { Metrics } from '../metrics.js';
import type { UserGrpcHandler } from './userHandler.js';
import { unary } from './unary.js';
import { USER_SERVICE_NAME, userServiceDefinition } from './userProto.js';

export interface GrpcServerDeps {
  handler: UserGrpcHandler;
  logger: Logger;
  metrics?: Metrics;
  packageDefinition: PackageDefinition;
}

export interface GrpcServer {
  server: Server;
  health: HealthImplementation;
}

export function createGrpcServer(deps: GrpcServerDeps): GrpcServer {
  const { handler, logger, metrics, packageDefinition } = deps;
  const server = new Server();

  server.addService(userServiceDefinition(packageDefinition), {
    CreateUser: unary({ method: 'CreateUser', logger, metrics, handler: (req, ctx) => handler.createUser(req, ctx) }),
    GetUser: unary({ method: 'GetUser', logger, metrics, handler: (req, ctx) => handler.getUser(req, ctx) }),
    GetUserByEmail: unary({
      method: 'GetUserByEmail',
      logger,
      metrics,
      handler: (req, ctx) => handler.getUserByEmail(req, ctx),
    }),
    UpdateUser: unary({ method: 'UpdateUser', logger, metrics, handler: (req, ctx) => handler.updateUser(req, ctx) }),
    DeleteUser: unary({ method: 'DeleteUser', logger, metrics, handler: (req, ctx) => handler.deleteUser(req, ctx) }),
    ListUsers: unary({ method: 'ListUsers', logger, metrics, handler: (req, ctx) => handler.listUsers(req, ctx) }),
  });

  // '' is the overall server status
  const health = new HealthImplementation({
    '': 'SERVING',
    [USER_SERVICE_NAME]: 'SERVING',
  });
  health.addToServer(server);

  new ReflectionService(packageDefinition).addToServer(server);

  return { server, health };
}

/**
 * Binds and starts serving. Resolves with the bound port, which differs from
 * the requested one when binding to port 0.
 */
export function bindGrpcServer(server: Server, address: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(address, ServerCredentials.createInsecure(), (error, port) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(port);
    });
  });
}

/**
 * Lets in-flight calls finish, then cancels whatever is left after `timeoutMs`.
 */
export function shutdownGrpcServer(server: Server, timeoutMs: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      server.forceShutdown();
      resolve();
    }, timeoutMs);

    server.tryShutdown(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}
