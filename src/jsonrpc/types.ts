// This file defines the JSON-RPC 2.0 wire entities and the standard error codes.

import type { RawMessage } from './raw-json.js';

export const ErrCode = {
  // Invalid JSON was received by the server.
  ParseError: -32700,
  // The JSON sent is not a valid Request object.
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  Internal: -32603,
  // Generic fallback for implementation-defined server errors.
  Server: -32000
} as const;

export type ErrCode = (typeof ErrCode)[keyof typeof ErrCode];

// params and id stay raw: id is never type-checked or normalized and is echoed as-is.
export interface JsonRpcRequest {
  jsonrpc: string;
  method: string;
  params?: RawMessage;
  id?: RawMessage;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: string;
  result: unknown;
  id: RawMessage;
}

export interface JsonRpcErrorResponse {
  jsonrpc: string;
  error: JsonRpcErrorObject;
  id: RawMessage;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;
