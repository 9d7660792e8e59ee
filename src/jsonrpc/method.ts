// This module wraps a typed function and its params schema into a Handler, and describes such handlers for discovery.

import { ZodType } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ArgsSchema, Call } from '../rpc/call.js';
import type { Handler, ServeMux } from '../rpc/handler.js';
import { failure, success, type RpcResult } from '../rpc/result.js';
import { toError } from '../utils/errors.js';
import { JsonRpcError } from './error.js';
import { ErrCode } from './types.js';

export interface MethodHandler<P> extends Handler {
  readonly paramsSchema: ArgsSchema<P>;
  readonly description?: string;
}

export interface MethodOptions {
  description?: string;
}

export interface MethodDescription {
  name: string;
  description?: string;
  params?: unknown;
}

// Params that fail the schema are answered with InvalidParams; whatever fn throws becomes the call's error.
export function defineMethod<P, R>(
  paramsSchema: ArgsSchema<P>,
  fn: (params: P, call: Call) => R | Promise<R>,
  options: MethodOptions = {}
): MethodHandler<P> {
  return {
    paramsSchema,
    description: options.description,
    async serveRpc(call: Call): Promise<RpcResult> {
      const decoded = call.unmarshalArgs(paramsSchema);
      if (!decoded.ok) {
        return failure(new JsonRpcError(ErrCode.InvalidParams, decoded.error.message, decoded.error.issues));
      }

      try {
        return success(await fn(decoded.value, call));
      } catch (error) {
        return failure(toError(error));
      }
    }
  };
}

export function isMethodHandler(handler: Handler): handler is MethodHandler<unknown> {
  return 'paramsSchema' in handler && handler.paramsSchema instanceof ZodType;
}

// This function lists the mux's methods, with a JSON Schema for params where the handler declares one.
export function describeMethods(mux: ServeMux): MethodDescription[] {
  return mux.methods().map((name) => {
    const handler = mux.lookup(name);
    if (!handler || !isMethodHandler(handler)) {
      return { name };
    }

    const entry: MethodDescription = {
      name,
      params: zodToJsonSchema(handler.paramsSchema, { target: 'jsonSchema7', $refStrategy: 'none' })
    };
    if (handler.description) {
      entry.description = handler.description;
    }
    return entry;
  });
}
