import { z } from 'zod';
import {
  CatalogAlbum,
  CatalogArtist,
  CatalogPlaylist,
  CatalogTrack,
  ParentPlaylistRef,
} from '../../types/catalog';

const ArtworkSchema = z.object({
  url: z.string(),
  width: z.number().optional(),
  height: z.number().optional(),
});

export const AppleMusicSongSchema = z.object({
  id: z.string(),
  attributes: z.object({
    name: z.string(),
    artistName: z.string().default(''),
    url: z.string(),
    durationInMillis: z.number().default(0),
    isrc: z.string().optional(),
    artwork: ArtworkSchema.optional(),
  }),
});

const TracksRelationshipSchema = z.object({
  data: z.array(z.unknown()).default([]),
  next: z.string().nullish(),
});

export const AppleMusicCollectionSchema = z.object({
  id: z.string(),
  attributes: z.object({
    name: z.string(),
    artistName: z.string().optional(),
    curatorName: z.string().optional(),
    url: z.string(),
    trackCount: z.number().int().nonnegative().optional(),
    artwork: ArtworkSchema.optional(),
  }),
  relationships: z.object({ tracks: TracksRelationshipSchema }),
});

export const AppleMusicArtistSchema = z.object({
  id: z.string(),
  attributes: z.object({
    name: z.string(),
    url: z.string(),
    genreNames: z.array(z.string()).default([]),
    artwork: ArtworkSchema.optional(),
  }),
});

// Every catalog response wraps its resources in `data`
export const AppleMusicResponseSchema = z.object({
  data: z.array(z.unknown()),
  next: z.string().nullish(),
});

export type AppleMusicCollection = z.infer<typeof AppleMusicCollectionSchema>;

export function artworkUrl(artwork?: z.infer<typeof ArtworkSchema>): string | undefined {
  if (!artwork) return undefined;
  return artwork.url
    .replace('{w}', String(artwork.width ?? 300))
    .replace('{h}', String(artwork.height ?? 300));
}

export function mapAppleMusicSong(raw: unknown, parentPlaylist?: ParentPlaylistRef): CatalogTrack {
  const song = AppleMusicSongSchema.parse(raw);
  const thumbnail = artworkUrl(song.attributes.artwork);
  return {
    kind: 'track',
    source: 'applemusic',
    title: song.attributes.name,
    author: song.attributes.artistName,
    uri: song.attributes.url,
    identifier: song.id,
    durationMs: song.attributes.durationInMillis,
    isStream: false,
    ...(thumbnail ? { thumbnail } : {}),
    ...(song.attributes.isrc ? { isrc: song.attributes.isrc } : {}),
    ...(parentPlaylist ? { parentPlaylist } : {}),
  };
}

export function mapAppleMusicSongs(raws: ReadonlyArray<unknown>, parentPlaylist?: ParentPlaylistRef): CatalogTrack[] {
  return raws.map((raw) => mapAppleMusicSong(raw, parentPlaylist));
}

export function appleMusicPlaylistRef(data: AppleMusicCollection): ParentPlaylistRef {
  return { name: data.attributes.name, uri: data.attributes.url };
}

export function mapAppleMusicPlaylist(
  data: AppleMusicCollection,
  tracks: ReadonlyArray<CatalogTrack>,
  opts: { skippedPages?: number; exhausted?: boolean } = {}
): CatalogPlaylist {
  const thumbnail = artworkUrl(data.attributes.artwork);
  const skippedPages = opts.skippedPages ?? 0;
  return {
    kind: 'playlist',
    source: 'applemusic',
    name: data.attributes.name,
    owner: data.attributes.curatorName ?? '',
    uri: data.attributes.url,
    identifier: data.id,
    ...(thumbnail ? { thumbnail } : {}),
    totalTracks: data.attributes.trackCount ?? tracks.length,
    tracks,
    skippedPages,
    degraded: skippedPages > 0 || opts.exhausted === false,
  };
}

export function mapAppleMusicAlbum(data: AppleMusicCollection): CatalogAlbum {
  const thumbnail = artworkUrl(data.attributes.artwork);
  const tracks = mapAppleMusicSongs(data.relationships.tracks.data);
  return {
    kind: 'album',
    source: 'applemusic',
    name: data.attributes.name,
    author: data.attributes.artistName ?? '',
    uri: data.attributes.url,
    identifier: data.id,
    ...(thumbnail ? { thumbnail } : {}),
    totalTracks: data.attributes.trackCount ?? tracks.length,
    tracks,
  };
}

export function mapAppleMusicArtist(raw: unknown, topSongs: ReadonlyArray<unknown>): CatalogArtist {
  const artist = AppleMusicArtistSchema.parse(raw);
  const thumbnail = artworkUrl(artist.attributes.artwork);
  return {
    kind: 'artist',
    source: 'applemusic',
    name: artist.attributes.name,
    uri: artist.attributes.url,
    identifier: artist.id,
    ...(thumbnail ? { thumbnail } : {}),
    genres: artist.attributes.genreNames,
    tracks: mapAppleMusicSongs(topSongs),
  };
}
