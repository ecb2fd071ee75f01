import { z } from 'zod';
import {
  CatalogAlbum,
  CatalogArtist,
  CatalogPlaylist,
  CatalogTrack,
  ParentPlaylistRef,
} from '../../types/catalog';

const ImageSchema = z.object({ url: z.string() });

const ExternalUrlsSchema = z.object({ spotify: z.string().optional() }).partial();

export const SpotifyTrackSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  duration_ms: z.number(),
  is_local: z.boolean().optional(),
  external_urls: ExternalUrlsSchema.optional(),
  external_ids: z.object({ isrc: z.string().optional() }).partial().optional(),
  artists: z.array(z.object({ name: z.string() })).default([]),
  album: z.object({ images: z.array(ImageSchema).nullish() }).partial().optional(),
});

const PlaylistItemSchema = z.object({
  track: z.unknown().nullable().optional(),
});

export const SpotifyTracksPageSchema = z.object({
  items: z.array(PlaylistItemSchema).default([]),
});

export const SpotifyPlaylistSchema = z.object({
  id: z.string(),
  name: z.string(),
  owner: z.object({ display_name: z.string().nullish(), id: z.string().optional() }).partial().optional(),
  images: z.array(ImageSchema).nullish(),
  external_urls: ExternalUrlsSchema.optional(),
  tracks: SpotifyTracksPageSchema.extend({
    total: z.number().int().nonnegative(),
    limit: z.number().int().positive(),
  }),
});

export const SpotifyAlbumSchema = z.object({
  id: z.string(),
  name: z.string(),
  artists: z.array(z.object({ name: z.string() })).default([]),
  images: z.array(ImageSchema).nullish(),
  external_urls: ExternalUrlsSchema.optional(),
  total_tracks: z.number().int().nonnegative().optional(),
  tracks: z.object({ items: z.array(z.unknown()).default([]) }),
});

export const SpotifyArtistSchema = z.object({
  id: z.string(),
  name: z.string(),
  genres: z.array(z.string()).default([]),
  followers: z.object({ total: z.number().nullish() }).partial().optional(),
  images: z.array(ImageSchema).nullish(),
  external_urls: ExternalUrlsSchema.optional(),
});

export const SpotifyTopTracksSchema = z.object({
  tracks: z.array(z.unknown()).default([]),
});

export const SpotifySearchSchema = z.object({
  tracks: z.object({ items: z.array(z.unknown()).default([]) }),
});

export type SpotifyPlaylistData = z.infer<typeof SpotifyPlaylistSchema>;

function spotifyUri(type: string, id: string, urls?: { spotify?: string | undefined }): string {
  return urls?.spotify ?? `https://open.spotify.com/${type}/${id}`;
}

function joinArtists(artists: ReadonlyArray<{ name: string }>): string {
  return artists.map((a) => a.name).join(', ');
}

interface TrackContext {
  thumbnail?: string | undefined;
  parentPlaylist?: ParentPlaylistRef;
}

/** Maps one raw track object; local files (no catalog id) map to null. */
export function mapSpotifyTrack(raw: unknown, ctx: TrackContext = {}): CatalogTrack | null {
  const t = SpotifyTrackSchema.parse(raw);
  if (t.is_local || !t.id) return null;

  const thumbnail = t.album?.images?.[0]?.url ?? ctx.thumbnail;
  const isrc = t.external_ids?.isrc;
  return {
    kind: 'track',
    source: 'spotify',
    title: t.name,
    author: joinArtists(t.artists),
    uri: spotifyUri('track', t.id, t.external_urls),
    identifier: t.id,
    durationMs: t.duration_ms,
    isStream: false,
    ...(thumbnail ? { thumbnail } : {}),
    ...(isrc ? { isrc } : {}),
    ...(ctx.parentPlaylist ? { parentPlaylist: ctx.parentPlaylist } : {}),
  };
}

function mapTrackList(raws: ReadonlyArray<unknown>, ctx?: TrackContext): CatalogTrack[] {
  const tracks: CatalogTrack[] = [];
  for (const raw of raws) {
    const track = mapSpotifyTrack(raw, ctx);
    if (track) tracks.push(track);
  }
  return tracks;
}

/**
 * Tracks of a playlist page. Items whose track is null (removed, unavailable)
 * are not listed at all; local files are listed but yield no track.
 */
export function mapSpotifyPlaylistItems(raw: unknown, parentPlaylist?: ParentPlaylistRef): {
  tracks: CatalogTrack[];
  listed: number;
} {
  const page = SpotifyTracksPageSchema.parse(raw);
  const present = page.items.flatMap((item) => (item.track === null || item.track === undefined ? [] : [item.track]));
  return {
    tracks: mapTrackList(present, parentPlaylist ? { parentPlaylist } : {}),
    listed: present.length,
  };
}

export function spotifyPlaylistRef(data: SpotifyPlaylistData): ParentPlaylistRef {
  return { name: data.name, uri: spotifyUri('playlist', data.id, data.external_urls) };
}

export function mapSpotifyPlaylist(
  data: SpotifyPlaylistData,
  tracks: ReadonlyArray<CatalogTrack>,
  skippedPages = 0
): CatalogPlaylist {
  const thumbnail = data.images?.[0]?.url;
  return {
    kind: 'playlist',
    source: 'spotify',
    name: data.name,
    owner: data.owner?.display_name ?? data.owner?.id ?? '',
    uri: spotifyUri('playlist', data.id, data.external_urls),
    identifier: data.id,
    ...(thumbnail ? { thumbnail } : {}),
    totalTracks: data.tracks.total,
    tracks,
    skippedPages,
    degraded: skippedPages > 0,
  };
}

export function mapSpotifyAlbum(raw: unknown): CatalogAlbum {
  const data = SpotifyAlbumSchema.parse(raw);
  const thumbnail = data.images?.[0]?.url;
  const tracks = mapTrackList(data.tracks.items, { thumbnail });
  return {
    kind: 'album',
    source: 'spotify',
    name: data.name,
    author: joinArtists(data.artists),
    uri: spotifyUri('album', data.id, data.external_urls),
    identifier: data.id,
    ...(thumbnail ? { thumbnail } : {}),
    totalTracks: data.total_tracks ?? tracks.length,
    tracks,
  };
}

export function mapSpotifyArtist(raw: unknown, topTracks: unknown): CatalogArtist {
  const data = SpotifyArtistSchema.parse(raw);
  const top = SpotifyTopTracksSchema.parse(topTracks);
  const thumbnail = data.images?.[0]?.url;
  const followers = data.followers?.total;
  return {
    kind: 'artist',
    source: 'spotify',
    name: data.name,
    uri: spotifyUri('artist', data.id, data.external_urls),
    identifier: data.id,
    ...(thumbnail ? { thumbnail } : {}),
    genres: data.genres,
    ...(typeof followers === 'number' ? { followers } : {}),
    tracks: mapTrackList(top.tracks),
  };
}

export function mapSpotifyTrackList(raws: ReadonlyArray<unknown>): CatalogTrack[] {
  return mapTrackList(raws);
}
