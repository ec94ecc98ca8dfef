export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 250;

export class ExternalCallTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExternalCallTimeoutError";
  }
}

export class DeadlineExceededError extends Error {
  constructor(message = "Pipeline deadline exceeded.") {
    super(message);
    this.name = "DeadlineExceededError";
  }
}

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (error: unknown) => boolean;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Returns a signal that aborts as soon as any of the given signals aborts.
 * `detach` removes the listeners once the linked work is finished.
 */
export function linkSignals(signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal;
  detach: () => void;
} {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  for (const source of signals) {
    if (!source) {
      continue;
    }
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = (): void => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    detachers.push(() => source.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    detach: () => {
      for (const detach of detachers) {
        detach();
      }
    }
  };
}

const abortReasonToError = (signal: AbortSignal): Error => {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name !== "AbortError") {
    return reason;
  }
  return new DeadlineExceededError("Operation aborted by caller deadline.");
};

/**
 * Runs `operation` with its own abort signal, rejecting when `timeoutMs`
 * elapses or the parent signal aborts, whether or not the operation honours
 * the signal it was given.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  const timeoutController = new AbortController();
  const linked = linkSignals([parentSignal, timeoutController.signal]);

  const aborted = new Promise<never>((_, reject) => {
    const rejectFromSignal = (): void => {
      if (timeoutController.signal.aborted) {
        reject(new ExternalCallTimeoutError(`External call timed out after ${timeoutMs}ms.`));
        return;
      }
      reject(parentSignal ? abortReasonToError(parentSignal) : new DeadlineExceededError());
    };
    if (linked.signal.aborted) {
      rejectFromSignal();
      return;
    }
    linked.signal.addEventListener("abort", rejectFromSignal, { once: true });
  });
  // Observed through the race below; this only marks the rejection handled.
  aborted.catch(() => undefined);

  const timeoutHandle = setTimeout(() => timeoutController.abort(), timeoutMs);

  try {
    if (linked.signal.aborted) {
      return await aborted;
    }
    return await Promise.race([operation(linked.signal), aborted]);
  } finally {
    clearTimeout(timeoutHandle);
    linked.detach();
  }
}

export async function withRetries<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_RETRY_ATTEMPTS);
  const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
  const sleep = options.sleep ?? delay;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (options.signal?.aborted || error instanceof DeadlineExceededError) {
        break;
      }
      if (options.isRetryable && !options.isRetryable(error)) {
        break;
      }
      if (attempt < attempts) {
        await sleep(delayMs * attempt);
      }
    }
  }

  throw lastError;
}
