const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads a quantity cell as an integer. Numeric input is truncated toward zero; anything that
 * is not a decimal number (blank, text, out of safe range) reads as 0.
 */
export function toInt(value: string | number | null | undefined): number {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return 0;
    }
    parsed = Number(trimmed);
  } else {
    return 0;
  }

  const truncated = Math.trunc(parsed);
  if (!Number.isSafeInteger(truncated) || truncated === 0) {
    return 0;
  }
  return truncated;
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
