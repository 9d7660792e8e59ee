// This module defines handlers and the ServeMux that routes calls to them by method name.

import { ErrMethodNotFound, toError } from '../utils/errors.js';
import type { Call } from './call.js';
import { failure, type RpcResult } from './result.js';

export interface Handler {
  serveRpc(call: Call): Promise<RpcResult>;
}

export type HandlerFn = (call: Call) => RpcResult | Promise<RpcResult>;

// This adapter turns a plain function into a Handler; anything it throws comes back as a Failure.
export function handlerFunc(fn: HandlerFn): Handler {
  return {
    async serveRpc(call: Call): Promise<RpcResult> {
      try {
        return await fn(call);
      } catch (error) {
        return failure(toError(error));
      }
    }
  };
}

// This class multiplexes calls by exact method name and answers ErrMethodNotFound otherwise.
//
//   const mux = new ServeMux().handle('foo', fooHandler).handleFunc('bar', barFn);
//
// Register everything before serving; registration is not synchronized with dispatch.
export class ServeMux implements Handler {
  private readonly handlers = new Map<string, Handler>();

  public static from(entries: Record<string, Handler>): ServeMux {
    const mux = new ServeMux();
    for (const [method, handler] of Object.entries(entries)) {
      mux.handle(method, handler);
    }
    return mux;
  }

  public async serveRpc(call: Call): Promise<RpcResult> {
    const handler = this.handlers.get(call.method());
    if (!handler) {
      return failure(ErrMethodNotFound);
    }

    return handler.serveRpc(call);
  }

  // Replaces any handler already registered for method.
  public handle(method: string, handler: Handler): this {
    this.handlers.set(method, handler);
    return this;
  }

  public handleFunc(method: string, fn: HandlerFn): this {
    return this.handle(method, handlerFunc(fn));
  }

  public lookup(method: string): Handler | undefined {
    return this.handlers.get(method);
  }

  public methods(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
