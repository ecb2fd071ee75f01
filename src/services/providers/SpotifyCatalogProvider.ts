import { z } from 'zod';
import {
  CatalogEntity,
  CatalogPlaylist,
  CatalogTrack,
  PageDescriptor,
  ParentPlaylistRef,
  Route,
} from '../../types/catalog';
import { CatalogProviderOptions } from './types';
import { BaseCatalogProvider, DEFAULT_TIMEOUT_MS } from './BaseCatalogProvider';
import { FetchedPage, Paginator } from '../Paginator';
import { BearerToken } from '../TokenCache';
import {
  SpotifyPlaylistData,
  SpotifyPlaylistSchema,
  SpotifySearchSchema,
  mapSpotifyAlbum,
  mapSpotifyArtist,
  mapSpotifyPlaylist,
  mapSpotifyPlaylistItems,
  mapSpotifyTrack,
  mapSpotifyTrackList,
  spotifyPlaylistRef,
} from '../mappers/spotifyMapper';
import { parseSpotifyRoute } from '../../utils/providers';
import { AuthError, EmptyResultError, InvalidURLError } from '../../utils/errors';

export const GRANT_URL = 'https://accounts.spotify.com/api/token';
export const API_URL = 'https://api.spotify.com/v1';

// Reduced payload for pages after the first; the first page needs the full playlist metadata.
export const PLAYLIST_PAGE_FIELDS =
  'items(track(name,duration_ms,id,is_local,external_urls,external_ids,artists(name),album(images)))';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(), // 'Bearer'
  expires_in: z.coerce.number().positive(),
});

const noPlayableTracks = () =>
  new EmptyResultError('This playlist has no playable tracks and therefore cannot be queued.', 'spotify');

export interface SpotifyProviderOptions extends CatalogProviderOptions {
  clientId: string;
  clientSecret: string;
  market?: string;
}

export class SpotifyCatalogProvider extends BaseCatalogProvider {
  static readonly DEFAULT_CONCURRENCY = 10;

  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly market: string;
  private readonly timeoutMs: number;

  constructor(opts: SpotifyProviderOptions) {
    super('spotify', opts, SpotifyCatalogProvider.DEFAULT_CONCURRENCY);
    this.clientId = opts.clientId;
    this.clientSecret = opts.clientSecret;
    this.market = opts.market || 'US';
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  parse(url: string): Route {
    return parseSpotifyRoute(url);
  }

  async getRecommendations(url: string): Promise<CatalogTrack[]> {
    const route = this.parse(url);
    if (route.type !== 'track') {
      throw new InvalidURLError('The provided query is not a Spotify track.', 'spotify');
    }
    const data = z
      .object({ tracks: z.array(z.unknown()).default([]) })
      .parse(await this.getJson(`${API_URL}/recommendations`, { params: { seed_tracks: route.id } }));
    return mapSpotifyTrackList(data.tracks);
  }

  async searchTracks(query: string): Promise<CatalogTrack[]> {
    const data = SpotifySearchSchema.parse(
      await this.getJson(`${API_URL}/search`, { params: { q: query, type: 'track' } })
    );
    return mapSpotifyTrackList(data.tracks.items);
  }

  protected authHeaders(token: string): Record<string, string> {
    return { Authorization: `Bearer ${token}` };
  }

  protected async exchangeToken(): Promise<BearerToken> {
    if (!this.clientId || !this.clientSecret) {
      throw new AuthError('Missing Spotify credentials', 'spotify');
    }

    const auth = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString('base64');
    const resp = await this.http
      .post<unknown>(GRANT_URL, new URLSearchParams({ grant_type: 'client_credentials' }).toString(), {
        headers: {
          Authorization: `Basic ${auth}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      })
      .catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        throw new AuthError(`Error fetching bearer token: ${reason}`, 'spotify');
      });

    if (resp.status !== 200) {
      throw new AuthError(`Error fetching bearer token: ${resp.status} ${resp.statusText}`, 'spotify', resp.status);
    }

    const parsed = TokenResponseSchema.safeParse(resp.data);
    if (!parsed.success) {
      throw new AuthError('Malformed bearer token response', 'spotify', resp.status);
    }
    // 10s safety margin
    return {
      value: parsed.data.access_token,
      expiresAt: Date.now() + (parsed.data.expires_in - 10) * 1000,
    };
  }

  protected async resolveRoute(route: Route): Promise<CatalogEntity> {
    const requestUrl = `${API_URL}/${route.type}s/${route.id}`;
    const data = await this.getJson(requestUrl);

    switch (route.type) {
      case 'track': {
        const track = mapSpotifyTrack(data);
        if (!track) throw new EmptyResultError('This track is a local file and cannot be resolved.', 'spotify');
        return track;
      }
      case 'album': {
        const album = mapSpotifyAlbum(data);
        if (album.tracks.length === 0) {
          throw new EmptyResultError('This album is empty and therefore cannot be queued.', 'spotify');
        }
        return album;
      }
      case 'artist': {
        const topTracks = await this.getJson(`${requestUrl}/top-tracks`, { params: { market: this.market } });
        return mapSpotifyArtist(data, topTracks);
      }
      case 'playlist':
        return this.resolvePlaylist(SpotifyPlaylistSchema.parse(data));
    }
  }

  protected async *streamPlaylist(route: Route, batchSize: number): AsyncGenerator<CatalogTrack[]> {
    const data = SpotifyPlaylistSchema.parse(await this.getJson(`${API_URL}/playlists/${route.id}`));
    const ref = spotifyPlaylistRef(data);
    const first = this.firstPage(data, ref);
    let streamed = first.length;
    if (first.length > 0) yield first;

    const pages = this.describePages(data);
    if (pages.kind === 'offset' && pages.nextOffsets.length > 0) {
      const batches = this.paginator.streamOffsets(
        pages.nextOffsets,
        (offset, signal) => this.fetchPlaylistPage(data.id, offset, pages.limit, ref, signal),
        batchSize
      );
      for await (const batch of batches) {
        streamed += batch.length;
        yield batch;
      }
    }
    if (streamed === 0) throw noPlayableTracks();
  }

  private async resolvePlaylist(data: SpotifyPlaylistData): Promise<CatalogPlaylist> {
    const ref = spotifyPlaylistRef(data);
    const first = this.firstPage(data, ref);

    const pages = this.describePages(data);
    let playlist: CatalogPlaylist;
    if (pages.kind !== 'offset' || pages.nextOffsets.length === 0) {
      playlist = mapSpotifyPlaylist(data, first);
    } else {
      const outcome = await this.paginator.collectOffsets(pages.nextOffsets, (offset, signal) =>
        this.fetchPlaylistPage(data.id, offset, pages.limit, ref, signal)
      );
      playlist = mapSpotifyPlaylist(data, [...first, ...outcome.items], outcome.failedPages);
    }

    if (playlist.tracks.length === 0) throw noPlayableTracks();
    return playlist;
  }

  // A first page of local files only is not empty: later pages may still hold catalog tracks.
  private firstPage(data: SpotifyPlaylistData, ref: ParentPlaylistRef): CatalogTrack[] {
    const { tracks, listed } = mapSpotifyPlaylistItems(data.tracks, ref);
    if (listed === 0) {
      throw new EmptyResultError('This playlist is empty and therefore cannot be queued.', 'spotify');
    }
    this.log.info('playlist_first_page', {
      id: data.id,
      tracks: tracks.length,
      listed,
      total: data.tracks.total,
      limit: data.tracks.limit,
    });
    return tracks;
  }

  private describePages(data: SpotifyPlaylistData): PageDescriptor {
    const { total, limit } = data.tracks;
    return {
      kind: 'offset',
      limit,
      total,
      nextOffsets: Paginator.remainingOffsets(limit, total, this.pageLimit),
    };
  }

  private async fetchPlaylistPage(
    playlistId: string,
    offset: number,
    limit: number,
    ref: ParentPlaylistRef,
    signal: AbortSignal | undefined
  ): Promise<FetchedPage<CatalogTrack, number>> {
    const data = await this.getJson(`${API_URL}/playlists/${playlistId}/tracks`, {
      params: { offset, limit, fields: PLAYLIST_PAGE_FIELDS },
      signal,
    });
    return { items: mapSpotifyPlaylistItems(data, ref).tracks };
  }
}

export default SpotifyCatalogProvider;
