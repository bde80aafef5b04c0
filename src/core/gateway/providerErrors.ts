/** Failure raised by a capability provider; the gateway decides whether to retry it. */
export class ProviderCallError extends Error {
  readonly status?: number;
  readonly transient: boolean;

  constructor(message: string, opts: { status?: number; transient?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'ProviderCallError';
    this.status = opts.status;
    this.transient = opts.transient ?? (opts.status === undefined ? true : isTransientStatus(opts.status));
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/** Network-level failures (DNS, reset, refused) surface from fetch as TypeError. */
export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof ProviderCallError) return error.transient;
  return error instanceof TypeError;
}

const REJECTED_STATUSES = new Set([400, 404, 410, 422]);

/** The provider refused the request itself, e.g. an identifier that does not exist. */
export function isRejectedRequest(error: unknown): error is ProviderCallError {
  return error instanceof ProviderCallError && error.status !== undefined && REJECTED_STATUSES.has(error.status);
}
