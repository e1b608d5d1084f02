export class BrokerTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`Broker call timed out: ${operation} after ${timeoutMs}ms`);
    this.name = "BrokerTimeoutError";
  }
}

/**
 * Bounds a broker call. The underlying promise is left to settle on its own;
 * the caller treats a timeout like any other failure of that call.
 */
export async function withBrokerTimeout<T>(operation: string, call: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new BrokerTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
