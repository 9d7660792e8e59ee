// This module sends JSON-RPC calls over HTTP with a timeout and maps failures onto typed errors.

import type { FastifyBaseLogger } from 'fastify';
import { describeIssues, type ArgsSchema } from '../rpc/call.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { JsonRpcError } from './error.js';
import { decodeResponse, encodeRequest, newRequest } from './request.js';

export interface JsonRpcClientOptions {
  url: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: FastifyBaseLogger;
}

export interface CallOptions {
  signal?: AbortSignal;
}

// This class performs one POST per call; retrying is left to the caller.
export class JsonRpcClient {
  private readonly url: string;
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger?: FastifyBaseLogger;

  public constructor(options: JsonRpcClientOptions) {
    this.url = options.url;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.headers = options.headers ?? {};
    this.logger = options.logger?.child({
      component: 'jsonrpc_client'
    });
  }

  // This helper writes one structured client event only when a logger is available.
  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitizedDetails = sanitizeForLog(details ?? {});
    this.logger?.[level](
      {
        event,
        details: sanitizedDetails
      },
      event
    );
  }

  // This method calls method with params and validates the result against resultSchema.
  public async call<T>(method: string, params: unknown, resultSchema: ArgsSchema<T>, options: CallOptions = {}): Promise<T> {
    const request = newRequest(method, params);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const startedAt = Date.now();

    try {
      let text: string;
      try {
        const response = await this.fetchFn(this.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
            ...this.headers
          },
          body: encodeRequest(request),
          signal: controller.signal
        });
        text = await response.text();

        if (!response.ok) {
          this.log('error', 'jsonrpc_client_http_error', { method, status: response.status, bodyPreview: text });
          throw new AppError(502, 'transport_error', text || `JSON-RPC endpoint answered HTTP ${response.status}.`, {
            status: response.status
          });
        }
      } catch (error) {
        if (error instanceof AppError) {
          throw error;
        }

        const reason = controller.signal.aborted && !options.signal?.aborted
          ? `timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : 'unknown transport error';
        this.log('error', 'jsonrpc_client_transport_failed', { method, error: errorForLog(error) });
        throw new AppError(502, 'transport_error', `JSON-RPC request failed: ${reason}`);
      }

      const response = decodeResponse(text);
      if (response.id !== request.id) {
        throw new AppError(502, 'invalid_response', 'JSON-RPC response id does not match the request.', {
          expected: request.id,
          received: response.id
        });
      }

      if ('error' in response) {
        this.log('warn', 'jsonrpc_client_call_failed', { method, code: response.error.code });
        throw new JsonRpcError(response.error.code, response.error.message, response.error.data);
      }

      const parsed = resultSchema.safeParse(response.result);
      if (!parsed.success) {
        throw new AppError(502, 'invalid_response', `Unexpected JSON-RPC result: ${describeIssues(parsed.error.issues)}`);
      }

      this.log('debug', 'jsonrpc_client_call_completed', { method, durationMs: Date.now() - startedAt });
      return parsed.data;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
