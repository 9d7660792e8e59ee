// This module centralizes server identity values reported by the version endpoint and logs.

export const SERVER_NAME = 'rpcbridge';
export const SERVER_VERSION = '0.1.0';
export const JSONRPC_VERSION = '2.0';
