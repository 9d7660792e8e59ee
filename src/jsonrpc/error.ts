// This module provides the protocol-level error value that handlers return to pick their own code and data.

import type { JsonRpcErrorObject } from './types.js';

export class JsonRpcError extends Error {
  public readonly code: number;
  public readonly data?: unknown;

  public constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'JsonRpcError';
    this.code = code;
    this.data = data;
  }

  public toJSON(): JsonRpcErrorObject {
    const payload: JsonRpcErrorObject = {
      code: this.code,
      message: this.message
    };
    if (this.data !== undefined) {
      payload.data = this.data;
    }
    return payload;
  }
}

export function isJsonRpcError(value: unknown): value is JsonRpcError {
  return value instanceof JsonRpcError;
}
