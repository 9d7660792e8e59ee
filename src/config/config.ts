// This module reads process configuration from environment variables and validates it once at startup.

import { z } from 'zod';
import { describeIssues } from '../rpc/call.js';
import { AppError } from '../utils/errors.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  LOG_LEVEL: logLevelSchema.default('info'),
  RPC_PATH: z
    .string()
    .regex(/^\/\S*$/, 'must start with "/" and contain no whitespace')
    .default('/rpc'),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1024 * 1024)
});

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: z.infer<typeof logLevelSchema>;
  rpcPath: string;
  bodyLimitBytes: number;
}

// Empty strings count as unset so `PORT=` in a container env file falls back to the default.
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

// This function builds validated server configuration or raises a controlled configuration error.
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    throw new AppError(
      500,
      'invalid_config',
      `Invalid server configuration: ${describeIssues(parsed.error.issues)}`,
      parsed.error.issues
    );
  }

  return {
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    rpcPath: parsed.data.RPC_PATH,
    bodyLimitBytes: parsed.data.BODY_LIMIT_BYTES
  };
}
