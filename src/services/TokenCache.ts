import { CatalogProviderId } from '../types/catalog';
import { ScopedLog, scopedLog } from '../utils/logger';

export interface BearerToken {
  value: string;
  expiresAt: number; // epoch ms
}

export type TokenExchange = () => Promise<BearerToken>;

/**
 * Holds one provider's bearer token and refreshes it on demand.
 *
 * Callers that find the token missing or expired share a single in-flight
 * exchange; the token is only ever replaced wholesale.
 */
export class TokenCache {
  private token: BearerToken | null = null;
  private inflight: Promise<BearerToken> | null = null;
  private readonly log: ScopedLog;

  constructor(
    provider: CatalogProviderId,
    private readonly exchange: TokenExchange
  ) {
    this.log = scopedLog(provider);
  }

  async ensureValid(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }
    if (!this.inflight) {
      this.inflight = this.refresh();
    }
    const token = await this.inflight;
    return token.value;
  }

  /** Drops the cached token if it is still the one the API refused. */
  invalidate(rejected: string): void {
    if (this.token?.value === rejected) {
      this.token = null;
    }
  }

  private async refresh(): Promise<BearerToken> {
    try {
      const token = await this.exchange();
      this.token = token;
      this.log.info('token_obtained', { expiresAt: new Date(token.expiresAt).toISOString() });
      return token;
    } catch (error) {
      this.log.error('token_failed', error);
      throw error;
    } finally {
      this.inflight = null;
    }
  }
}
