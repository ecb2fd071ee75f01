import { CatalogProviderId } from '../types/catalog';

/** Base of every error raised while resolving a catalog link. */
export class CatalogError extends Error {
  readonly provider: CatalogProviderId | undefined;

  constructor(message: string, provider?: CatalogProviderId) {
    super(message);
    this.name = new.target.name;
    this.provider = provider;
  }
}

/** The link matches no known route shape, or the wrong kind of route was given. */
export class InvalidURLError extends CatalogError {}

/** The credential exchange failed or returned something unusable. */
export class AuthError extends CatalogError {
  readonly status: number | undefined;

  constructor(message: string, provider: CatalogProviderId, status?: number) {
    super(message, provider);
    this.status = status;
  }
}

/** A required request (lookup, first page, top tracks) did not succeed. */
export class RequestError extends CatalogError {
  readonly status: number | undefined;
  readonly reason: string;

  constructor(provider: CatalogProviderId, status: number | undefined, reason: string, url?: string) {
    super(
      `Error while fetching results: ${status ?? 'no response'} ${reason}${url ? ` (${url})` : ''}`,
      provider
    );
    this.status = status;
    this.reason = reason;
  }
}

export class EmptyResultError extends CatalogError {}

/** The link belongs to a provider that is disabled or not configured. */
export class ProviderDisabledError extends CatalogError {}
