// This module provides the methods the standalone server exposes out of the box.

import { z } from 'zod';
import { defineMethod } from '../jsonrpc/method.js';
import { ServeMux } from '../rpc/handler.js';
import { success } from '../rpc/result.js';
import { SERVER_NAME, SERVER_VERSION } from '../version.js';

// This builder returns a fresh mux so tests and the process entrypoint never share registrations.
export function createBuiltinMux(): ServeMux {
  const mux = new ServeMux();

  return mux
    .handleFunc('Echo', (call) => {
      const decoded = call.unmarshalArgs(z.unknown());
      return decoded.ok ? success(decoded.value) : decoded;
    })
    .handle(
      'ping',
      defineMethod(z.unknown(), () => ({ pong: true }), {
        description: 'Liveness probe over JSON-RPC.'
      })
    )
    .handle(
      'sum',
      defineMethod(z.array(z.number()), (numbers) => numbers.reduce((total, value) => total + value, 0), {
        description: 'Adds a list of numbers.'
      })
    )
    .handle(
      'server.info',
      defineMethod(z.unknown(), () => ({ name: SERVER_NAME, version: SERVER_VERSION, methods: mux.methods() }), {
        description: 'Reports server identity and registered methods.'
      })
    );
}
