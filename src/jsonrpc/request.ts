// This module builds outbound JSON-RPC requests and decodes the responses a client receives.

import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { describeIssues } from '../rpc/call.js';
import { AppError } from '../utils/errors.js';
import { JSONRPC_VERSION } from '../version.js';
import { readObjectMembers } from './raw-json.js';
import type { JsonRpcRequest, JsonRpcResponse } from './types.js';

const ID_BYTES = 16;

const errorResponseSchema = z.object({
  jsonrpc: z.string(),
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional()
  })
});

const successResponseSchema = z.object({
  jsonrpc: z.string(),
  result: z.unknown()
});

// This function encodes method and params into a request carrying a random 16-byte hex id.
export function newRequest(method: string, params?: unknown): JsonRpcRequest {
  const request: JsonRpcRequest = {
    jsonrpc: JSONRPC_VERSION,
    method,
    id: JSON.stringify(randomBytes(ID_BYTES).toString('hex'))
  };

  const encodedParams: string | undefined = JSON.stringify(params);
  if (encodedParams !== undefined) {
    request.params = encodedParams;
  }

  return request;
}

// This function writes a request as wire text; raw params and id are inserted unchanged.
export function encodeRequest(request: JsonRpcRequest): string {
  const members = [`"jsonrpc":${JSON.stringify(request.jsonrpc)}`, `"method":${JSON.stringify(request.method)}`];
  if (request.params !== undefined) {
    members.push(`"params":${request.params}`);
  }
  members.push(`"id":${request.id ?? 'null'}`);
  return `{${members.join(',')}}`;
}

// This function parses a response body; the id is returned as raw text so callers can compare it exactly.
export function decodeResponse(text: string): JsonRpcResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AppError(502, 'invalid_response', 'JSON-RPC response is not valid JSON.', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new AppError(502, 'invalid_response', 'JSON-RPC response must be a JSON object.');
  }

  // Exactly one of result and error must be present; an absent result is not the same as null.
  const hasResult = 'result' in parsed;
  const hasError = 'error' in parsed;
  if (hasResult === hasError) {
    throw new AppError(502, 'invalid_response', 'Invalid JSON-RPC response: expected exactly one of "result" or "error".');
  }

  const id = readObjectMembers(text).get('id') ?? 'null';

  if (hasError) {
    const shaped = errorResponseSchema.safeParse(parsed);
    if (!shaped.success) {
      throw new AppError(502, 'invalid_response', `Invalid JSON-RPC response: ${describeIssues(shaped.error.issues)}`);
    }
    return { jsonrpc: shaped.data.jsonrpc, error: shaped.data.error, id };
  }

  const shaped = successResponseSchema.safeParse(parsed);
  if (!shaped.success) {
    throw new AppError(502, 'invalid_response', `Invalid JSON-RPC response: ${describeIssues(shaped.error.issues)}`);
  }
  return { jsonrpc: shaped.data.jsonrpc, result: shaped.data.result, id };
}
