/**
 * Handle returned by {@link runtimeSetTimeout}. Fake timers replace the
 * implementation at runtime but the nominal Node.js shape is kept so call
 * sites can still `unref()` the handle.
 */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

/** Schedules a timeout through the active timer implementation. */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  // Looked up on every call so sinon fake timers installed later still apply.
  return globalThis.setTimeout(callback, delayMs);
}

/** Cancels a timeout scheduled with {@link runtimeSetTimeout}. */
export function runtimeClearTimeout(handle: TimeoutHandle | null | undefined): void {
  if (handle === null || handle === undefined) {
    return;
  }
  globalThis.clearTimeout(handle);
}

/** Resolves after `delayMs`, honouring fake timers. */
export function delay(delayMs: number): Promise<void> {
  return new Promise((resolve) => {
    runtimeSetTimeout(resolve, delayMs);
  });
}

/**
 * Arms a deadline that invokes `onExpire` once after `timeoutMs`. The returned
 * disposer cancels the deadline and is safe to call more than once. A `null`
 * timeout disables the deadline entirely.
 */
export function armDeadline(timeoutMs: number | null, onExpire: () => void): () => void {
  if (timeoutMs === null) {
    return () => {};
  }
  let handle: TimeoutHandle | null = runtimeSetTimeout(() => {
    handle = null;
    onExpire();
  }, timeoutMs);
  return () => {
    runtimeClearTimeout(handle);
    handle = null;
  };
}

/** Deadline whose `expired` promise rejects once the timeout elapses. */
export interface Deadline {
  readonly expired: Promise<never>;
  /** Error the deadline fired with; `null` until then. */
  readonly error: Error | null;
  disarm(): void;
}

/**
 * Arms a deadline usable in `Promise.race`. `expired` rejects with the error
 * built by `makeError`, after `onExpire` ran; with a `null` timeout it never
 * settles. Loops waiting on many items should react through `onExpire`
 * instead of racing `expired` once per item.
 */
export function createDeadline(
  timeoutMs: number | null,
  makeError: () => Error,
  onExpire?: (error: Error) => void,
): Deadline {
  let disarm: () => void = () => {};
  let error: Error | null = null;
  const expired = new Promise<never>((_resolve, reject) => {
    disarm = armDeadline(timeoutMs, () => {
      const failure = makeError();
      error = failure;
      onExpire?.(failure);
      reject(failure);
    });
  });
  return {
    expired,
    get error() {
      return error;
    },
    disarm: () => disarm(),
  };
}

export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  delay,
  armDeadline,
  createDeadline,
} as const;
