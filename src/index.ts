// Public API: the call/handler abstraction, the Fastify bridge, and the JSON-RPC 2.0 codec and client.

export { CallContext, createContextKey, type CancellableContext, type ContextKey } from './rpc/context.js';
export { failure, isFailure, success, type Failure, type Result, type RpcResult, type Success } from './rpc/result.js';
export { DirectCall, newDirectCall, type ArgsSchema, type Call } from './rpc/call.js';
export { ServeMux, handlerFunc, type Handler, type HandlerFn } from './rpc/handler.js';
export { contextReply, contextRequest, createHttpHandler, type HttpCodec, type RpcRouteHandler } from './http/bridge.js';
export { registerRpcRoute, type RpcRouteOptions } from './http/routes.js';
export { JsonRpcCodec, contextJsonRpcRequest, encodeResponse, parseRequest } from './jsonrpc/codec.js';
export { JsonRpcError, isJsonRpcError } from './jsonrpc/error.js';
export { decodeResponse, encodeRequest, newRequest } from './jsonrpc/request.js';
export { JsonRpcClient, type CallOptions, type JsonRpcClientOptions } from './jsonrpc/client.js';
export { defineMethod, describeMethods, type MethodDescription, type MethodHandler } from './jsonrpc/method.js';
export { ErrCode, type JsonRpcErrorObject, type JsonRpcRequest, type JsonRpcResponse } from './jsonrpc/types.js';
export type { RawMessage } from './jsonrpc/raw-json.js';
export { AppError, DecodeError, ErrMethodNotFound, NotAssignableError } from './utils/errors.js';
export { createServer, type ServerOptions } from './server.js';
export { loadServerConfig, type ServerConfig } from './config/config.js';
