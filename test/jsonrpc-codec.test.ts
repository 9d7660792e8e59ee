// This test suite verifies the JSON-RPC codec end to end through Fastify: results, error mapping, and id echo.

import Fastify from 'fastify';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { registerRpcRoute } from '../src/http/routes.js';
import { JsonRpcCodec, contextJsonRpcRequest, encodeResponse, parseRequest } from '../src/jsonrpc/codec.js';
import { JsonRpcError } from '../src/jsonrpc/error.js';
import { defineMethod } from '../src/jsonrpc/method.js';
import { encodeRequest, newRequest } from '../src/jsonrpc/request.js';
import { ErrCode } from '../src/jsonrpc/types.js';
import { newDirectCall } from '../src/rpc/call.js';
import { ServeMux } from '../src/rpc/handler.js';
import { failure, success } from '../src/rpc/result.js';
import { AppError, ErrMethodNotFound } from '../src/utils/errors.js';

const detailedError = new JsonRpcError(1, 'another error', { foo: 'bar' });

const mux = new ServeMux()
  .handleFunc('Echo', (call) => {
    const decoded = call.unmarshalArgs(z.unknown());
    return decoded.ok ? success(decoded.value) : decoded;
  })
  .handleFunc('Error1', () => failure(new Error('some error')))
  .handleFunc('Error2', () => failure(detailedError))
  .handleFunc('ContextRequest', (call) => success(contextJsonRpcRequest(call.context())?.params ?? null))
  .handleFunc('Nothing', () => success(undefined))
  .handle('Greet', defineMethod(z.object({ name: z.string() }), ({ name }) => `hello ${name}`));

const app = Fastify({ logger: false });
registerRpcRoute(app, { path: '/rpc', codec: new JsonRpcCodec(), handler: mux });

// This helper posts one raw body to the endpoint.
function post(payload: string) {
  return app.inject({
    method: 'POST',
    url: '/rpc',
    headers: { 'content-type': 'application/json' },
    payload
  });
}

describe('json-rpc codec over http', () => {
  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('echoes params as the result with the request id', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"Echo","params":{"foo":"bar"},"id":"1"}');

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.body).toBe('{"jsonrpc":"2.0","result":{"foo":"bar"},"id":"1"}');
  });

  it('answers unknown methods with the method-not-found message', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"Missing","id":2}');

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: ErrCode.Server, message: ErrMethodNotFound.message },
      id: 2
    });
    expect(response.json().error.message).toBe('method not found');
  });

  it('wraps plain errors as server errors', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"Error1","params":{},"id":3}');

    expect(response.body).toBe('{"jsonrpc":"2.0","error":{"code":-32000,"message":"some error"},"id":3}');
  });

  it('keeps protocol errors with their own code and data', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"Error2","id":4}');

    expect(response.body).toBe('{"jsonrpc":"2.0","error":{"code":1,"message":"another error","data":{"foo":"bar"}},"id":4}');
  });

  it('exposes the raw params of the parsed request to handlers', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"ContextRequest","params":{ "foo" : "bar" },"id":5}');

    expect(response.json().result).toBe('{ "foo" : "bar" }');
  });

  it.each(['1.50', 'null', '"abc"', '12345678901234567890', '-0', '1e3'])('echoes id %s byte-for-byte', async (id) => {
    const response = await post(`{"jsonrpc":"2.0","method":"Echo","params":1,"id":${id}}`);

    expect(response.body).toBe(`{"jsonrpc":"2.0","result":1,"id":${id}}`);
  });

  it('echoes a missing id as null', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"Echo","params":true}');

    expect(response.body).toBe('{"jsonrpc":"2.0","result":true,"id":null}');
  });

  it('encodes an undefined success value as a null result', async () => {
    const response = await post('{"jsonrpc":"2.0","method":"Nothing","id":6}');

    expect(response.body).toBe('{"jsonrpc":"2.0","result":null,"id":6}');
  });

  it('answers invalid params from typed methods with the invalid-params code', async () => {
    const ok = await post('{"jsonrpc":"2.0","method":"Greet","params":{"name":"alice"},"id":7}');
    const bad = await post('{"jsonrpc":"2.0","method":"Greet","params":{"name":5},"id":8}');

    expect(ok.json()).toEqual({ jsonrpc: '2.0', result: 'hello alice', id: 7 });
    expect(bad.json().error.code).toBe(ErrCode.InvalidParams);
    expect(bad.json().error.message).toBe('invalid params: name: Expected string, received number');
  });

  it('round-trips a request built on the client side', async () => {
    const request = newRequest('Echo', { list: [1, 2, 3], nested: { ok: true } });
    const response = await post(encodeRequest(request));

    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      result: { list: [1, 2, 3], nested: { ok: true } },
      id: JSON.parse(request.id ?? 'null')
    });
  });

  it('answers malformed JSON with HTTP 400 and a plain-text reason', async () => {
    const response = await post('{"jsonrpc":"2.0","method":');

    expect(response.statusCode).toBe(400);
    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.body.startsWith('Invalid JSON-RPC request body: ')).toBe(true);
  });

  it('answers an empty body with HTTP 400', async () => {
    const response = await app.inject({ method: 'POST', url: '/rpc' });

    expect(response.statusCode).toBe(400);
    expect(response.body.length).toBeGreaterThan(0);
  });

  it('answers requests without a string method with HTTP 400', async () => {
    const missing = await post('{"jsonrpc":"2.0","id":1}');
    const numeric = await post('{"jsonrpc":"2.0","method":7,"id":1}');
    const array = await post('[]');

    expect(missing.statusCode).toBe(400);
    expect(missing.body).toBe('Invalid JSON-RPC request: method: is required');
    expect(numeric.body).toBe('Invalid JSON-RPC request: method: must be a string');
    expect(array.body).toBe('Invalid JSON-RPC request: expected a JSON object.');
  });
});

describe('json-rpc codec helpers', () => {
  it('parses requests keeping params and id raw', () => {
    expect(parseRequest('{"method":"m","params":[1, 2],"id":1.0}')).toEqual({
      jsonrpc: '',
      method: 'm',
      params: '[1, 2]',
      id: '1.0'
    });
  });

  it('raises a parse error for invalid JSON', () => {
    expect(() => parseRequest('nope')).toThrow(AppError);
  });

  it('never writes both result and error', () => {
    const ok = JSON.parse(encodeResponse('"a"', success({ x: 1 })));
    const bad = JSON.parse(encodeResponse('"a"', failure(new Error('x'))));

    expect(Object.keys(ok)).toEqual(['jsonrpc', 'result', 'id']);
    expect(Object.keys(bad)).toEqual(['jsonrpc', 'error', 'id']);
  });

  it('refuses to respond to calls it did not produce', async () => {
    const codec = new JsonRpcCodec();

    await expect(codec.respond(newDirectCall(undefined, 'Echo', 1), success(1))).rejects.toThrow(
      'Call was not produced by the JSON-RPC codec.'
    );
  });
});
