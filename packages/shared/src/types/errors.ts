export type ErrorContext = Record<string, string | number | boolean>;

/**
 * Base error for every gridstash package. `code` is machine-readable,
 * `context` carries the offending values for logs.
 */
export class GridstashError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = "GridstashError";
  }
}

export function isGridstashError(error: unknown): error is GridstashError {
  return error instanceof GridstashError;
}
