// This module turns Fastify requests into calls through a pluggable codec and writes each call's result back.

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Call } from '../rpc/call.js';
import { CallContext, createContextKey } from '../rpc/context.js';
import type { Handler } from '../rpc/handler.js';
import { failure, type RpcResult } from '../rpc/result.js';
import { toError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';

// A codec translates one wire protocol between Fastify's request/reply and calls.
export interface HttpCodec {
  // The returned Call must be built on ctx, possibly with more values layered on top.
  newCall(ctx: CallContext, reply: FastifyReply, request: FastifyRequest): Promise<Call>;

  // Encodes and sends result. contextReply(call.context()) yields the reply to write to.
  respond(call: Call, result: RpcResult): Promise<void>;
}

export type RpcRouteHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;

const requestKey = createContextKey<FastifyRequest>('http.request');
const replyKey = createContextKey<FastifyReply>('http.reply');

const PLAIN_TEXT = 'text/plain; charset=utf-8';

// Returns the Fastify request behind a context built by createHttpHandler.
export function contextRequest(ctx: CallContext): FastifyRequest | undefined {
  return ctx.value(requestKey);
}

// Returns the Fastify reply behind a context built by createHttpHandler.
export function contextReply(ctx: CallContext): FastifyReply | undefined {
  return ctx.value(replyKey);
}

// This helper derives a context cancelled when the connection closes before the response is ended.
function requestContext(request: FastifyRequest, reply: FastifyReply): CallContext {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort(new Error('client disconnected'));
    }
  });

  return CallContext.fromSignal(controller.signal).withValue(requestKey, request).withValue(replyKey, reply);
}

// This helper keeps a misbehaving Handler from escaping the result channel.
async function serve(handler: Handler, call: Call): Promise<RpcResult> {
  try {
    return await handler.serveRpc(call);
  } catch (error) {
    return failure(toError(error));
  }
}

function messageOf(error: unknown, fallback: string): string {
  const message = toError(error).message;
  return message.length > 0 ? message : fallback;
}

// This function builds a Fastify route handler that decodes with codec, dispatches to handler, and responds.
export function createHttpHandler(codec: HttpCodec, handler: Handler): RpcRouteHandler {
  return async (request, reply) => {
    const startedAt = Date.now();
    const ctx = requestContext(request, reply);

    let call: Call;
    try {
      call = await codec.newCall(ctx, reply, request);
    } catch (error) {
      request.log.warn(
        {
          event: 'rpc_call_decode_failed',
          requestId: request.id,
          error: errorForLog(error)
        },
        'rpc_call_decode_failed'
      );
      return reply.code(400).type(PLAIN_TEXT).send(messageOf(error, 'Bad Request'));
    }

    const method = call.method();
    request.log.debug({ event: 'rpc_call_received', requestId: request.id, method }, 'rpc_call_received');

    const result = await serve(handler, call);

    try {
      await codec.respond(call, result);
    } catch (error) {
      request.log.error(
        {
          event: 'rpc_respond_failed',
          requestId: request.id,
          method,
          error: errorForLog(error)
        },
        'rpc_respond_failed'
      );

      // Headers or body may already be on the wire; only answer when nothing was sent.
      if (!reply.sent) {
        return reply.code(500).type(PLAIN_TEXT).send(messageOf(error, 'Internal Server Error'));
      }
      return reply;
    }

    request.log.info(
      {
        event: 'rpc_call_completed',
        requestId: request.id,
        method,
        outcome: result.ok ? 'success' : 'failure',
        errorMessage: result.ok ? undefined : result.error.message,
        durationMs: Date.now() - startedAt
      },
      'rpc_call_completed'
    );
    return reply;
  };
}
