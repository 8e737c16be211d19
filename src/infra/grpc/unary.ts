import { randomUUID } from 'crypto';
import { status, type Metadata, type sendUnaryData } from '@grpc/grpc-js';
import type { Logger } from 'pino';
import type { RequestContext } from '../../application/context.js';
import type { Metrics } from '../metrics.js';
import { RpcError } from './rpcError.js';

export const REQUEST_ID_HEADER = 'x-request-id';

// Longer delays overflow setTimeout and fire after 1 ms
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * The part of a grpc-js ServerUnaryCall the adapter relies on.
 */
export interface UnaryCall {
  request: unknown;
  metadata: Metadata;
  getDeadline(): Date | number;
  once(event: 'cancelled', listener: () => void): unknown;
}

export interface UnaryOptions<Res> {
  method: string;
  logger: Logger;
  metrics?: Metrics;
  handler: (request: unknown, ctx: RequestContext) => Promise<Res>;
}

function requestIdFrom(metadata: Metadata): string {
  const [value] = metadata.get(REQUEST_ID_HEADER);
  return typeof value === 'string' && value !== '' ? value : randomUUID();
}

function deadlineMillis(deadline: Date | number): number {
  return deadline instanceof Date ? deadline.getTime() : deadline;
}

/**
 * Binds a promise-returning handler to grpc-js. The handler gets a
 * RequestContext whose signal aborts when the client cancels or the call
 * deadline passes.
 */
export function unary<Res>(options: UnaryOptions<Res>) {
  const { method, logger, metrics, handler } = options;

  return (call: UnaryCall, callback: sendUnaryData<Res>): void => {
    const requestId = requestIdFrom(call.metadata);
    const controller = new AbortController();
    call.once('cancelled', () => controller.abort(new Error('call cancelled')));

    // grpc-js also emits `cancelled` once the deadline passes, so a deadline
    // beyond the timer range is left to that event
    let deadlineTimer: NodeJS.Timeout | undefined;
    const delay = deadlineMillis(call.getDeadline()) - Date.now();
    if (Number.isFinite(delay) && delay <= MAX_TIMER_DELAY_MS) {
      deadlineTimer = setTimeout(() => controller.abort(new Error('deadline exceeded')), Math.max(0, delay));
    }

    const endTimer = metrics?.rpcDuration.startTimer({ method });
    const startedAt = Date.now();
    logger.debug({ method, requestId }, 'gRPC request started');

    const finish = (code: status): void => {
      clearTimeout(deadlineTimer);
      endTimer?.();
      metrics?.rpcRequests.inc({ method, code: status[code] });
    };

    void handler(call.request, { signal: controller.signal, requestId }).then(
      (response) => {
        finish(status.OK);
        logger.debug({ method, requestId, durationMs: Date.now() - startedAt }, 'gRPC request completed');
        callback(null, response);
      },
      (error: unknown) => {
        const durationMs = Date.now() - startedAt;
        let rpcError: RpcError;
        if (error instanceof RpcError) {
          // Handlers log the cause of their own INTERNAL failures
          rpcError = error;
          logger.info({ method, requestId, code: status[rpcError.code], durationMs }, 'gRPC request failed');
        } else {
          rpcError = new RpcError(status.INTERNAL, 'internal error');
          logger.error({ err: error, method, requestId, durationMs }, 'Unhandled error in gRPC handler');
        }
        finish(rpcError.code);
        callback({ code: rpcError.code, details: rpcError.message });
      }
    );
  };
}
