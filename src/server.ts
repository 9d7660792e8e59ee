// This module wires the HTTP application: logging hooks, operational endpoints, and the RPC route.

import Fastify, { type FastifyInstance } from 'fastify';
import type { ServerConfig } from './config/config.js';
import { registerRpcRoute } from './http/routes.js';
import { JsonRpcCodec } from './jsonrpc/codec.js';
import { describeMethods } from './jsonrpc/method.js';
import { ServeMux, type Handler } from './rpc/handler.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

export interface ServerOptions {
  config: Pick<ServerConfig, 'logLevel' | 'rpcPath' | 'bodyLimitBytes'>;
  handler: Handler;
  // Defaults to true; tests pass false to keep output quiet.
  logger?: boolean;
}

// This function builds and configures the full HTTP application.
export function createServer(options: ServerOptions): FastifyInstance {
  const { config, handler } = options;

  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(config.logLevel),
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  // This hook emits explicit timeout events to simplify debugging of stalled requests.
  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  app.get('/health', async () => {
    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/version', async () => {
    return {
      ok: true,
      name: SERVER_NAME,
      version: SERVER_VERSION
    };
  });

  registerRpcRoute(app, {
    path: config.rpcPath,
    codec: new JsonRpcCodec(),
    handler,
    describe: handler instanceof ServeMux ? () => describeMethods(handler) : undefined
  });

  // This handler maps failures outside the RPC bridge into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = typeof error.statusCode === 'number' && error.statusCode >= 400 ? error.statusCode : normalized.statusCode;

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return app;
}
