// This module provides the cancellable, typed context carried by every call.

// A typed attachment key; two keys never collide even with equal descriptions.
export interface ContextKey<T> {
  readonly id: symbol;
  readonly description: string;
  readonly __valueType?: T;
}

export function createContextKey<T>(description: string): ContextKey<T> {
  return { id: Symbol(description), description };
}

export interface CancellableContext {
  context: CallContext;
  cancel: (reason?: unknown) => void;
}

// This class carries cancellation, an optional deadline, and immutable key/value attachments.
export class CallContext {
  public readonly signal: AbortSignal;
  public readonly deadline: Date | null;
  private readonly values: ReadonlyMap<symbol, unknown>;

  private constructor(signal: AbortSignal, deadline: Date | null, values: ReadonlyMap<symbol, unknown>) {
    this.signal = signal;
    this.deadline = deadline;
    this.values = values;
  }

  // This factory returns a root context that is never cancelled and holds no values.
  public static background(): CallContext {
    return new CallContext(new AbortController().signal, null, new Map());
  }

  // This factory returns a root context cancelled together with the given signal.
  public static fromSignal(signal: AbortSignal): CallContext {
    return new CallContext(signal, null, new Map());
  }

  public get cancelled(): boolean {
    return this.signal.aborted;
  }

  public get reason(): unknown {
    return this.signal.reason;
  }

  public throwIfCancelled(): void {
    this.signal.throwIfAborted();
  }

  // This method returns the value attached under key by this context or one of its ancestors.
  public value<T>(key: ContextKey<T>): T | undefined {
    if (!this.values.has(key.id)) {
      return undefined;
    }

    return this.values.get(key.id) as T;
  }

  // This method derives a context that shares cancellation and adds one attachment.
  public withValue<T>(key: ContextKey<T>, value: T): CallContext {
    const values = new Map(this.values);
    values.set(key.id, value);
    return new CallContext(this.signal, this.deadline, values);
  }

  // This method derives a context that is cancelled by its parent or by the returned cancel function.
  public withCancel(): CancellableContext {
    return this.derive(this.deadline);
  }

  // This method derives a context that cancels itself once timeoutMs elapses.
  public withTimeout(timeoutMs: number): CancellableContext {
    const requested = new Date(Date.now() + timeoutMs);
    const deadline = this.deadline && this.deadline < requested ? this.deadline : requested;
    const derived = this.derive(deadline);
    const timer = setTimeout(() => {
      derived.cancel(new Error('context deadline exceeded'));
    }, Math.max(0, deadline.getTime() - Date.now()));
    timer.unref();

    return {
      context: derived.context,
      cancel: (reason?: unknown) => {
        clearTimeout(timer);
        derived.cancel(reason);
      }
    };
  }

  private derive(deadline: Date | null): CancellableContext {
    const controller = new AbortController();
    const parent = this.signal;
    const onParentAbort = (): void => {
      controller.abort(parent.reason);
    };

    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }

    return {
      context: new CallContext(controller.signal, deadline, this.values),
      cancel: (reason?: unknown) => {
        parent.removeEventListener('abort', onParentAbort);
        if (!controller.signal.aborted) {
          controller.abort(reason ?? new Error('context canceled'));
        }
      }
    };
  }
}
