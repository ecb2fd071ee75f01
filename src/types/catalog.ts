export type CatalogProviderId = 'spotify' | 'applemusic';

export type RouteType = 'track' | 'album' | 'playlist' | 'artist';

export interface Route {
  provider: CatalogProviderId;
  type: RouteType;
  id: string;
  region?: string; // Apple Music storefront (e.g. us, br)
}

// How to get the pages after the first one, as described by the first response
export type PageDescriptor =
  | { kind: 'offset'; limit: number; total: number; nextOffsets: number[] }
  | { kind: 'cursor'; next?: string };

// Non-owning back-link from a track to the collection it was resolved from
export interface ParentPlaylistRef {
  readonly name: string;
  readonly uri: string;
}

export interface CatalogTrack {
  readonly kind: 'track';
  readonly source: CatalogProviderId;
  readonly title: string;
  readonly author: string;
  readonly uri: string;
  readonly identifier: string;
  readonly durationMs: number;
  readonly isStream: boolean;
  readonly thumbnail?: string;
  readonly isrc?: string;
  readonly parentPlaylist?: ParentPlaylistRef;
}

export interface CatalogAlbum {
  readonly kind: 'album';
  readonly source: CatalogProviderId;
  readonly name: string;
  readonly author: string;
  readonly uri: string;
  readonly identifier: string;
  readonly thumbnail?: string;
  readonly totalTracks: number;
  readonly tracks: ReadonlyArray<CatalogTrack>;
}

export interface CatalogPlaylist {
  readonly kind: 'playlist';
  readonly source: CatalogProviderId;
  readonly name: string;
  readonly owner: string;
  readonly uri: string;
  readonly identifier: string;
  readonly thumbnail?: string;
  readonly totalTracks: number; // as reported by the provider
  readonly tracks: ReadonlyArray<CatalogTrack>;
  readonly skippedPages: number;
  readonly degraded: boolean;
}

export interface CatalogArtist {
  readonly kind: 'artist';
  readonly source: CatalogProviderId;
  readonly name: string;
  readonly uri: string;
  readonly identifier: string;
  readonly thumbnail?: string;
  readonly genres: ReadonlyArray<string>;
  readonly followers?: number;
  readonly tracks: ReadonlyArray<CatalogTrack>; // top tracks
}

export type CatalogEntity = CatalogTrack | CatalogAlbum | CatalogPlaylist | CatalogArtist;

export interface PlaylistStreamOptions {
  batchSize?: number;
}

export interface ProviderTuning {
  enabled: boolean;
  playlistConcurrency: number;
}

export interface AppConfig {
  spotify: ProviderTuning & {
    clientId?: string;
    clientSecret?: string;
    market: string;
  };
  appleMusic: ProviderTuning;
  pagination: {
    pageLimit?: number; // max extra pages for offset pagination
    maxWaves: number; // iteration cap for cursor pagination
    batchSize: number; // streaming batch size
  };
  http: {
    timeoutMs: number;
  };
  logging: {
    level: string;
    toFile: boolean;
    maxSizeBytes?: number;
    maxFiles?: number;
  };
}
