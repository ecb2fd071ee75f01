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
import { BaseCatalogProvider } from './BaseCatalogProvider';
import { FetchedPage } from '../Paginator';
import { BearerToken } from '../TokenCache';
import {
  AppleMusicCollection,
  AppleMusicCollectionSchema,
  AppleMusicResponseSchema,
  appleMusicPlaylistRef,
  mapAppleMusicAlbum,
  mapAppleMusicArtist,
  mapAppleMusicPlaylist,
  mapAppleMusicSong,
  mapAppleMusicSongs,
} from '../mappers/appleMusicMapper';
import { parseAppleMusicRoute } from '../../utils/providers';
import { AuthError, EmptyResultError } from '../../utils/errors';

export const WEB_URL = 'https://music.apple.com';
export const API_BASE_URL = 'https://api.music.apple.com';

const SCRIPT_REGEX = /<script.*?src="(\/assets\/index-.*?)"/;
const TOKEN_REGEX = /"(eyJ.+?)"/;

const TokenClaimsSchema = z.object({ exp: z.number() });

/**
 * Reads the `exp` claim (seconds) of a JWT without verifying it.
 * Returns null when the token is not a decodable JWT.
 */
export function decodeTokenExpiry(token: string): number | null {
  const payload = token.split('.')[1];
  if (!payload) return null;
  try {
    const claims = TokenClaimsSchema.safeParse(JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')));
    return claims.success ? claims.data.exp * 1000 : null;
  } catch {
    return null;
  }
}

export class AppleMusicCatalogProvider extends BaseCatalogProvider {
  static readonly DEFAULT_CONCURRENCY = 6;

  constructor(opts: CatalogProviderOptions = {}) {
    super('applemusic', opts, AppleMusicCatalogProvider.DEFAULT_CONCURRENCY);
  }

  parse(url: string): Route {
    return parseAppleMusicRoute(url);
  }

  protected authHeaders(token: string): Record<string, string> {
    return { Authorization: `Bearer ${token}`, Origin: 'https://apple.com' };
  }

  // The web player embeds an anonymous developer token in its main script bundle.
  protected async exchangeToken(): Promise<BearerToken> {
    const page = await this.fetchText(WEB_URL);
    const script = SCRIPT_REGEX.exec(page)?.[1];
    if (!script) {
      throw new AuthError('Could not find valid script URL in response.', 'applemusic');
    }

    const bundle = await this.fetchText(`${WEB_URL}${script}`);
    const token = TOKEN_REGEX.exec(bundle)?.[1];
    if (!token) {
      throw new AuthError('Could not find token in response.', 'applemusic');
    }

    const expiresAt = decodeTokenExpiry(token);
    if (expiresAt === null) {
      throw new AuthError('Could not read the token expiry claim.', 'applemusic');
    }
    return { value: token, expiresAt };
  }

  protected async resolveRoute(route: Route): Promise<CatalogEntity> {
    const requestUrl = this.catalogUrl(route);
    const resource = await this.getResource(requestUrl);

    switch (route.type) {
      case 'track':
        return mapAppleMusicSong(resource);
      case 'album': {
        const album = mapAppleMusicAlbum(AppleMusicCollectionSchema.parse(resource));
        if (album.tracks.length === 0) {
          throw new EmptyResultError('This album is empty and therefore cannot be queued.', 'applemusic');
        }
        return album;
      }
      case 'artist': {
        const top = AppleMusicResponseSchema.parse(await this.getJson(`${requestUrl}/view/top-songs`));
        return mapAppleMusicArtist(resource, top.data);
      }
      case 'playlist':
        return this.resolvePlaylist(AppleMusicCollectionSchema.parse(resource));
    }
  }

  protected async *streamPlaylist(route: Route, batchSize: number): AsyncGenerator<CatalogTrack[]> {
    const data = AppleMusicCollectionSchema.parse(await this.getResource(this.catalogUrl(route)));
    const ref = appleMusicPlaylistRef(data);
    yield this.firstPage(data, ref);

    const pages = this.describePages(data);
    if (pages.kind !== 'cursor' || !pages.next) return;
    yield* this.paginator.streamCursors(
      pages.next,
      (cursor, signal) => this.fetchPlaylistPage(cursor, ref, signal),
      batchSize
    );
  }

  private async resolvePlaylist(data: AppleMusicCollection): Promise<CatalogPlaylist> {
    const ref = appleMusicPlaylistRef(data);
    const tracks = this.firstPage(data, ref);

    const pages = this.describePages(data);
    if (pages.kind !== 'cursor' || !pages.next) {
      return mapAppleMusicPlaylist(data, tracks);
    }

    const outcome = await this.paginator.collectCursors(pages.next, (cursor, signal) =>
      this.fetchPlaylistPage(cursor, ref, signal)
    );
    return mapAppleMusicPlaylist(data, [...tracks, ...outcome.items], {
      skippedPages: outcome.failedPages,
      exhausted: outcome.exhausted,
    });
  }

  private catalogUrl(route: Route): string {
    const type = route.type === 'track' ? 'song' : route.type;
    return `${API_BASE_URL}/v1/catalog/${route.region ?? 'us'}/${type}s/${route.id}`;
  }

  private async getResource(url: string): Promise<unknown> {
    const body = AppleMusicResponseSchema.parse(await this.getJson(url));
    const resource = body.data[0];
    if (resource === undefined) {
      throw new EmptyResultError('The catalog returned no resource for this link.', 'applemusic');
    }
    return resource;
  }

  private firstPage(data: AppleMusicCollection, ref: ParentPlaylistRef): CatalogTrack[] {
    const tracks = mapAppleMusicSongs(data.relationships.tracks.data, ref);
    if (tracks.length === 0) {
      throw new EmptyResultError('This playlist is empty and therefore cannot be queued.', 'applemusic');
    }
    this.log.info('playlist_first_page', {
      id: data.id,
      tracks: tracks.length,
      hasNext: Boolean(data.relationships.tracks.next),
    });
    return tracks;
  }

  private describePages(data: AppleMusicCollection): PageDescriptor {
    const next = data.relationships.tracks.next;
    return next ? { kind: 'cursor', next } : { kind: 'cursor' };
  }

  private async fetchPlaylistPage(
    cursor: string,
    ref: ParentPlaylistRef,
    signal: AbortSignal | undefined
  ): Promise<FetchedPage<CatalogTrack, string>> {
    const body = AppleMusicResponseSchema.parse(await this.getJson(`${API_BASE_URL}${cursor}`, { signal }));
    return { items: mapAppleMusicSongs(body.data, ref), next: body.next ?? undefined };
  }

  private async fetchText(url: string): Promise<string> {
    const resp = await this.http
      .get<string>(url, { responseType: 'text', validateStatus: () => true })
      .catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        throw new AuthError(`Error while fetching ${url}: ${reason}`, 'applemusic');
      });
    if (resp.status !== 200) {
      throw new AuthError(`Error while fetching results: ${resp.status} ${resp.statusText}`, 'applemusic', resp.status);
    }
    return String(resp.data);
  }
}

export default AppleMusicCatalogProvider;
