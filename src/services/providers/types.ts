import type { AxiosInstance } from 'axios';
import type {
  CatalogEntity,
  CatalogProviderId,
  CatalogTrack,
  PlaylistStreamOptions,
  Route,
} from '../../types/catalog';

export interface CatalogProvider {
  readonly id: CatalogProviderId;
  supports(url: string): boolean;
  parse(url: string): Route;
  resolve(url: string): Promise<CatalogEntity>;
  iterPlaylistTracks(url: string, opts?: PlaylistStreamOptions): AsyncGenerator<CatalogTrack[]>;
}

export interface CatalogProviderOptions {
  http?: AxiosInstance; // shared or pre-configured axios instance
  timeoutMs?: number;
  playlistConcurrency?: number;
  playlistPageLimit?: number; // max extra pages, offset pagination only
  maxWaves?: number; // iteration cap, cursor pagination only
  batchSize?: number; // default streaming batch size
}
