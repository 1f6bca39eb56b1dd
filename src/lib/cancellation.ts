/**
 * Write-once cancellation signal shared between the caller that issues a stream
 * and the task consuming it. Once cancelled it stays cancelled.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private readonly cancelledPromise: Promise<void>;

  constructor() {
    this.cancelledPromise = new Promise<void>((resolve) => {
      this.controller.signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Resolves once the token is cancelled (immediately if it already is).
   */
  cancelled(): Promise<void> {
    return this.cancelledPromise;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}

export const CANCELLED: unique symbol = Symbol('cancelled');

/**
 * Race a pending operation against cancellation. The token is checked first, so
 * an already-cancelled token wins even if the operation has settled too.
 *
 * The losing operation is left running and whatever it settles with later is
 * dropped. Each call listens on the token's signal only until it settles, so a
 * session racing every chunk read keeps no listener per chunk.
 */
export function raceCancellation<T>(
  operation: Promise<T>,
  token: CancellationToken
): Promise<T | typeof CANCELLED> {
  return new Promise<T | typeof CANCELLED>((resolve, reject) => {
    const { signal } = token;
    const onCancel = () => resolve(CANCELLED);
    if (signal.aborted) {
      onCancel();
    } else {
      signal.addEventListener('abort', onCancel, { once: true });
    }

    void operation.then(
      (value) => {
        signal.removeEventListener('abort', onCancel);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onCancel);
        reject(err);
      }
    );
  });
}
