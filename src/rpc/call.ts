// This module defines the transport-independent call and its in-process DirectCall variant.

import type { ZodType, ZodTypeDef } from 'zod';
import { DecodeError, NotAssignableError } from '../utils/errors.js';
import { CallContext } from './context.js';
import { failure, success, type Result } from './result.js';

// The decode target for call arguments; any zod schema whose output is T.
export type ArgsSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface Call {
  // The same Call always returns the same context instance.
  context(): CallContext;

  method(): string;

  // Decodes the call arguments into the shape described by schema. Call this at most once.
  unmarshalArgs<T>(schema: ArgsSchema<T>): Result<T, DecodeError>;
}

// This helper renders zod issues as one short line for error messages.
export function describeIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// This class lets a Handler be invoked without any transport, e.g. from tests or other handlers.
export class DirectCall<A = unknown> implements Call {
  private readonly ctx: CallContext;
  private readonly methodName: string;
  private readonly args: A;
  private consumed = false;

  public constructor(ctx: CallContext | undefined, method: string, args: A) {
    this.ctx = ctx ?? CallContext.background();
    this.methodName = method;
    this.args = args;
  }

  public context(): CallContext {
    return this.ctx;
  }

  public method(): string {
    return this.methodName;
  }

  // The stored value must satisfy schema; a mismatch is reported as NotAssignableError.
  public unmarshalArgs<T>(schema: ArgsSchema<T>): Result<T, DecodeError> {
    if (this.consumed) {
      return failure(new DecodeError('arguments already decoded'));
    }
    this.consumed = true;

    const parsed = schema.safeParse(this.args);
    if (!parsed.success) {
      return failure(
        new NotAssignableError(`arguments are not assignable: ${describeIssues(parsed.error.issues)}`, parsed.error.issues)
      );
    }

    return success(parsed.data);
  }
}

export function newDirectCall<A>(ctx: CallContext | undefined, method: string, args: A): DirectCall<A> {
  return new DirectCall(ctx, method, args);
}
