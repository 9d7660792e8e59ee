// This module implements the HTTP codec for JSON-RPC 2.0 requests and responses.
//
//   const handler = createHttpHandler(new JsonRpcCodec(), mux);

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { contextReply, type HttpCodec } from '../http/bridge.js';
import { describeIssues, type ArgsSchema, type Call } from '../rpc/call.js';
import { createContextKey, type CallContext } from '../rpc/context.js';
import { failure, success, type Result, type RpcResult } from '../rpc/result.js';
import { AppError, DecodeError } from '../utils/errors.js';
import { JSONRPC_VERSION } from '../version.js';
import { isJsonRpcError } from './error.js';
import { readObjectMembers, type RawMessage } from './raw-json.js';
import { ErrCode, type JsonRpcErrorObject, type JsonRpcRequest } from './types.js';

const CONTENT_TYPE = 'application/json; charset=utf-8';

const requestEnvelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  method: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' })
});

const requestKey = createContextKey<JsonRpcRequest>('jsonrpc.request');

// Returns the parsed request behind a call context produced by JsonRpcCodec.
export function contextJsonRpcRequest(ctx: CallContext): JsonRpcRequest | undefined {
  return ctx.value(requestKey);
}

// This function parses one JSON-RPC request object while keeping params and id as raw text.
export function parseRequest(text: string): JsonRpcRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'malformed JSON';
    throw new AppError(400, 'parse_error', `Invalid JSON-RPC request body: ${reason}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new AppError(400, 'invalid_request', 'Invalid JSON-RPC request: expected a JSON object.');
  }

  const envelope = requestEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new AppError(
      400,
      'invalid_request',
      `Invalid JSON-RPC request: ${describeIssues(envelope.error.issues)}`,
      envelope.error.issues
    );
  }

  const members = readObjectMembers(text);
  const request: JsonRpcRequest = {
    jsonrpc: envelope.data.jsonrpc ?? '',
    method: envelope.data.method
  };

  const params = members.get('params');
  if (params !== undefined) {
    request.params = params;
  }

  const id = members.get('id');
  if (id !== undefined) {
    request.id = id;
  }

  return request;
}

// This helper maps any error value onto the JSON-RPC error object.
export function toErrorObject(error: Error): JsonRpcErrorObject {
  if (isJsonRpcError(error)) {
    return error.toJSON();
  }

  return {
    code: ErrCode.Server,
    message: error.message
  };
}

// This function encodes one response; the id text is inserted verbatim so it round-trips byte-for-byte.
export function encodeResponse(id: RawMessage | undefined, result: RpcResult): string {
  const idText = id ?? 'null';

  if (!result.ok) {
    return `{"jsonrpc":"${JSONRPC_VERSION}","error":${JSON.stringify(toErrorObject(result.error))},"id":${idText}}`;
  }

  const resultText: string | undefined = JSON.stringify(result.value);
  return `{"jsonrpc":"${JSONRPC_VERSION}","result":${resultText ?? 'null'},"id":${idText}}`;
}

// This helper reads the request body whether the route kept it raw or a JSON parser already ran.
function readBody(request: FastifyRequest): string {
  const body: unknown = request.body;
  if (Buffer.isBuffer(body)) {
    return body.toString('utf8');
  }

  if (typeof body === 'string') {
    return body;
  }

  if (body === undefined || body === null) {
    return '';
  }

  return JSON.stringify(body);
}

class JsonRpcCall implements Call {
  private readonly ctx: CallContext;
  public readonly request: JsonRpcRequest;
  private consumed = false;

  public constructor(ctx: CallContext, request: JsonRpcRequest) {
    this.ctx = ctx;
    this.request = request;
  }

  public context(): CallContext {
    return this.ctx;
  }

  public method(): string {
    return this.request.method;
  }

  // Absent params decode as undefined, which the schema may accept or reject.
  public unmarshalArgs<T>(schema: ArgsSchema<T>): Result<T, DecodeError> {
    if (this.consumed) {
      return failure(new DecodeError('arguments already decoded'));
    }
    this.consumed = true;

    let raw: unknown;
    if (this.request.params !== undefined) {
      try {
        raw = JSON.parse(this.request.params);
      } catch (error) {
        return failure(new DecodeError(`invalid params: ${error instanceof Error ? error.message : 'malformed JSON'}`));
      }
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return failure(new DecodeError(`invalid params: ${describeIssues(parsed.error.issues)}`, parsed.error.issues));
    }

    return success(parsed.data);
  }
}

export class JsonRpcCodec implements HttpCodec {
  public async newCall(ctx: CallContext, _reply: FastifyReply, request: FastifyRequest): Promise<Call> {
    const parsed = parseRequest(readBody(request));
    return new JsonRpcCall(ctx.withValue(requestKey, parsed), parsed);
  }

  public async respond(call: Call, result: RpcResult): Promise<void> {
    if (!(call instanceof JsonRpcCall)) {
      throw new AppError(500, 'foreign_call', 'Call was not produced by the JSON-RPC codec.');
    }

    const reply = contextReply(call.context());
    if (!reply) {
      throw new AppError(500, 'missing_reply', 'Call context carries no HTTP reply.');
    }

    const body = encodeResponse(call.request.id, result);
    reply.header('content-type', CONTENT_TYPE).send(body);
  }
}
