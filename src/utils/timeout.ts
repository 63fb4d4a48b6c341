export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Races `work` against a timer. The timer is always cleared, so a settled
 * race never keeps the process alive.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Rejects as soon as `signal` aborts; resolves never otherwise */
export function abortPromise(signal: AbortSignal | undefined, onAbort: () => Error): { promise: Promise<never>; dispose: () => void } {
  if (!signal) {
    return { promise: new Promise<never>(() => undefined), dispose: () => undefined };
  }

  let listener: (() => void) | undefined;
  const promise = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(onAbort());
      return;
    }
    listener = () => reject(onAbort());
    signal.addEventListener('abort', listener, { once: true });
  });

  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener('abort', listener);
    },
  };
}
