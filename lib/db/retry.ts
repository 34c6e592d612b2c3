export type RetryOptions = {
  maxRetries?: number;
  initialDelayMs?: number;
  backoffFactor?: number;
  shouldRetry?: (error: unknown) => boolean;
};

// SQLSTATE classes worth another attempt: connection exceptions, admin shutdown, too many connections.
const TRANSIENT_CODES = new Set(["08000", "08001", "08003", "08006", "57P01", "57P02", "57P03", "53300"]);
const TRANSIENT_NETWORK = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export function isTransientDbError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && (TRANSIENT_CODES.has(code) || TRANSIENT_NETWORK.has(code))) return true;
  const message = error instanceof Error ? error.message : String(error);
  return message.includes("Connection terminated") || message.includes("timeout exceeded when trying to connect");
}

export async function executeWithRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, initialDelayMs = 500, backoffFactor = 2, shouldRetry = isTransientDbError } = options;

  let retries = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (retries >= maxRetries || !shouldRetry(err)) {
        throw err;
      }
      retries++;
      // Jitter
      const jitter = Math.random() * 0.1 * initialDelayMs;
      const delay = initialDelayMs * Math.pow(backoffFactor, retries - 1) + jitter;
      console.warn(`[Retry] Attempt ${retries}/${maxRetries} failed. Retrying in ${Math.round(delay)}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
