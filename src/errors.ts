/**
 * Thrown by `loadConfig` when one or more settings are missing or invalid.
 * Fatal at startup; never raised while serving queries.
 */
export class ConfigurationError extends Error {
  constructor(public readonly problems: readonly string[]) {
    super(`Configuration validation failed:\n${problems.join("\n")}`);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown when a query arrives before any vector index has been loaded or built.
 */
export class IndexUnavailableError extends Error {
  constructor(message = "Vector index is not loaded") {
    super(message);
    this.name = "IndexUnavailableError";
  }
}

/**
 * Error raised by an LLM or embedding provider call.
 * `transient` marks failures worth retrying (throttling, timeouts, 5xx).
 */
export class ProviderError extends Error {
  public readonly status?: number;
  public readonly transient: boolean;
  public readonly invalidResponse: boolean;

  constructor(
    message: string,
    options: {
      status?: number;
      transient: boolean;
      invalidResponse?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.status = options.status;
    this.transient = options.transient;
    this.invalidResponse = options.invalidResponse ?? false;
  }
}

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Classify an HTTP status from a provider response
 */
export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUS_CODES.has(status);
}

/**
 * Normalize anything thrown by `fetch` or a provider client into a ProviderError
 */
export function toProviderError(error: unknown, operation: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    const transient =
      error.name === "AbortError" ||
      error.name === "TimeoutError" ||
      msg.includes("timeout") ||
      msg.includes("network") ||
      msg.includes("fetch failed") ||
      msg.includes("econnreset") ||
      msg.includes("econnrefused");

    return new ProviderError(`${operation} failed: ${error.message}`, {
      transient,
      cause: error,
    });
  }

  return new ProviderError(`${operation} failed: ${String(error)}`, {
    transient: false,
  });
}

/**
 * Read a provider's JSON body. A body that does not parse is an invalid
 * response; a stream that fails midway is classified like a fetch error.
 */
export async function readProviderJson<T>(
  response: Response,
  operation: string
): Promise<T | null> {
  try {
    return (await response.json()) as T | null;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ProviderError(`${operation} returned a body that is not JSON`, {
        status: response.status,
        transient: false,
        invalidResponse: true,
        cause: error,
      });
    }
    throw toProviderError(error, operation);
  }
}
