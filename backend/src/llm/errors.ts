/** A `google.rpc.Status` detail entry; only `@type` is always present. */
export type ErrorDetail = Record<string, unknown> & { '@type'?: unknown };

/** Error reply from the provider, `{error: {code, status, message, details}}`. */
export class ProviderError extends Error {
  constructor(
    /** HTTP status code. */
    readonly code: number,
    /** Machine status name such as `RESOURCE_EXHAUSTED`. */
    readonly status: string,
    message: string,
    readonly details: ErrorDetail[] = []
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  toString(): string {
    return `${this.code} ${this.status}. ${this.message}`;
  }
}

export class ProviderTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Provider did not answer within ${timeoutMs} ms`);
    this.name = 'ProviderTimeoutError';
  }
}
