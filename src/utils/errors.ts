/**
 * Error types raised by the calendar fetcher and the Mastodon client
 */

export type FetchErrorKind = 'invalid-locator' | 'network' | 'timeout' | 'http-status' | 'empty-body';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly locator: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, locator: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.locator = locator;
    this.status = options.status;
  }
}

export class MastodonApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(endpoint: string, status: number, body: string) {
    super(`Mastodon API ${endpoint} failed with HTTP ${status}${body ? `: ${body}` : ''}`);
    this.name = 'MastodonApiError';
    this.status = status;
    this.body = body;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
