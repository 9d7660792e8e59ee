// This module mounts an RPC endpoint on Fastify with the body left raw for the codec to read.

import type { FastifyInstance } from 'fastify';
import type { Handler } from '../rpc/handler.js';
import { createHttpHandler, type HttpCodec } from './bridge.js';

export interface RpcRouteOptions {
  path: string;
  codec: HttpCodec;
  handler: Handler;
  // Serves GET on the same path when provided.
  describe?: () => unknown;
}

// This function registers POST (and optionally GET discovery) for one RPC endpoint in its own plugin scope.
export function registerRpcRoute(fastify: FastifyInstance, options: RpcRouteOptions): void {
  const rpcHandler = createHttpHandler(options.codec, options.handler);

  void fastify.register(async (scope) => {
    // Parsers registered here stay inside this scope, so other routes keep Fastify's JSON parsing.
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post(options.path, rpcHandler);

    const describe = options.describe;
    if (describe) {
      scope.get(options.path, async (request) => {
        request.log.debug({ event: 'rpc_discovery_requested' }, 'rpc_discovery_requested');
        return {
          ok: true,
          endpoint: options.path,
          methods: describe()
        };
      });
    }
  });
}
