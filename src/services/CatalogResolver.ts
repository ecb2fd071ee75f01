import {
  AppConfig,
  CatalogEntity,
  CatalogProviderId,
  CatalogTrack,
  PlaylistStreamOptions,
} from '../types/catalog';
import { CatalogProvider } from './providers/types';
import { SpotifyCatalogProvider } from './providers/SpotifyCatalogProvider';
import { AppleMusicCatalogProvider } from './providers/AppleMusicCatalogProvider';
import { detectCatalogProvider } from '../utils/providers';
import { InvalidURLError, ProviderDisabledError } from '../utils/errors';
import { scopedLog } from '../utils/logger';

const log = scopedLog('resolver');

const PROVIDER_NAMES: Record<CatalogProviderId, string> = {
  spotify: 'Spotify',
  applemusic: 'Apple Music',
};

/** Builds the providers an application config enables. */
export function createProviders(config: AppConfig): CatalogProvider[] {
  const providers: CatalogProvider[] = [];
  const shared = {
    timeoutMs: config.http.timeoutMs,
    maxWaves: config.pagination.maxWaves,
    batchSize: config.pagination.batchSize,
    ...(config.pagination.pageLimit !== undefined ? { playlistPageLimit: config.pagination.pageLimit } : {}),
  };

  if (config.spotify.enabled) {
    const { clientId, clientSecret } = config.spotify;
    if (clientId && clientSecret) {
      providers.push(
        new SpotifyCatalogProvider({
          ...shared,
          clientId,
          clientSecret,
          market: config.spotify.market,
          playlistConcurrency: config.spotify.playlistConcurrency,
        })
      );
    } else {
      log.warn('spotify_provider_skipped', { reason: 'SPOTIFY_CLIENT_ID/SPOTIFY_CLIENT_SECRET not set' });
    }
  }

  if (config.appleMusic.enabled) {
    providers.push(
      new AppleMusicCatalogProvider({
        ...shared,
        playlistConcurrency: config.appleMusic.playlistConcurrency,
      })
    );
  }

  return providers;
}

/**
 * Entry point for embedding code: routes a catalog link to the provider that
 * owns its host and returns the resolved entity or a lazy playlist stream.
 */
export class CatalogResolver {
  private readonly providers = new Map<CatalogProviderId, CatalogProvider>();

  constructor(providers: ReadonlyArray<CatalogProvider>) {
    for (const provider of providers) {
      this.providers.set(provider.id, provider);
    }
    log.info('catalog_resolver_ready', { providers: Array.from(this.providers.keys()) });
  }

  static fromConfig(config: AppConfig): CatalogResolver {
    return new CatalogResolver(createProviders(config));
  }

  providerFor(url: string): CatalogProvider {
    const detected = detectCatalogProvider(url);
    if (detected === 'unknown') {
      throw new InvalidURLError(`Unsupported catalog link: ${url}`);
    }
    const provider = this.providers.get(detected);
    if (!provider) {
      throw new ProviderDisabledError(
        `A ${PROVIDER_NAMES[detected]} link was passed in but ${PROVIDER_NAMES[detected]} is not enabled.`,
        detected
      );
    }
    return provider;
  }

  async resolve(url: string): Promise<CatalogEntity> {
    return this.providerFor(url).resolve(url);
  }

  async *iterPlaylistTracks(url: string, opts?: PlaylistStreamOptions): AsyncGenerator<CatalogTrack[]> {
    yield* this.providerFor(url).iterPlaylistTracks(url, opts);
  }
}
