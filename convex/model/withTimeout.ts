export class OperationTimeoutError extends Error {
  public readonly details: {
    operation: string;
    timeoutMs: number;
  };

  constructor(details: { operation: string; timeoutMs: number }) {
    super(`${details.operation} timed out after ${details.timeoutMs}ms`);
    this.name = "OperationTimeoutError";
    this.details = details;
  }
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new OperationTimeoutError({ operation, timeoutMs })), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : "unknown_error";
