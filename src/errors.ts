export type FetchErrorKind = 'transport' | 'http_status' | 'decode' | 'cancelled';

export class FetchError extends Error {
  constructor(
    public readonly kind: FetchErrorKind,
    public readonly detail: string,
    public readonly page: number,
    public readonly status?: number
  ) {
    super(`${kind} error on page ${page}: ${detail}`);
    this.name = 'FetchError';
  }
}

export class QueryValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid search query: ${issues.join('; ')}`);
    this.name = 'QueryValidationError';
  }
}
