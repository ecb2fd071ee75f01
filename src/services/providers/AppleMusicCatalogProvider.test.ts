import { describe, expect, it } from 'vitest';
import {
  API_BASE_URL,
  AppleMusicCatalogProvider,
  decodeTokenExpiry,
} from './AppleMusicCatalogProvider';
import { FakeHttp } from '../../testing/fakeHttp';
import { CatalogTrack } from '../../types/catalog';
import { AuthError, EmptyResultError, RequestError } from '../../utils/errors';

const PLAYLIST_URL = 'https://music.apple.com/us/playlist/road-trip/pl.test';
const PLAYLIST_API = `${API_BASE_URL}/v1/catalog/us/playlists/pl.test`;

const jwt = (expSeconds: number) =>
  ['eyJhbGciOiJFUzI1NiJ9', Buffer.from(JSON.stringify({ exp: expSeconds })).toString('base64url'), 'sig'].join('.');

const TOKEN = jwt(Math.floor(Date.now() / 1000) + 3600);

const rawSong = (n: number) => ({
  id: `s${n}`,
  type: 'songs',
  attributes: {
    name: `Tune ${n}`,
    artistName: 'Singer',
    url: `https://music.apple.com/us/song/tune/s${n}`,
    durationInMillis: 200000 + n,
    isrc: `AM${n}`,
    artwork: { url: 'https://img.test/{w}x{h}bb.jpg', width: 300, height: 300 },
  },
});

const songs = (from: number, count: number) => Array.from({ length: Math.max(0, count) }, (_, i) => rawSong(from + i));

function withToken(fake: FakeHttp, token = TOKEN): FakeHttp {
  return fake
    .on('GET', 'https://music.apple.com/', () => ({
      data: '<html><script type="module" crossorigin src="/assets/index-abc123.js"></script></html>',
    }))
    .on('GET', 'https://music.apple.com/assets/index-abc123.js', () => ({
      data: `const config={token:"${token}",other:"x"};`,
    }));
}

const cursorFor = (offset: number) => `/v1/catalog/us/playlists/pl.test/tracks?offset=${offset}`;

/** Playlist of `total` songs, 100 per page, chained by `next` cursors. */
function withPlaylist(fake: FakeHttp, total: number, failing: ReadonlyArray<number> = []): FakeHttp {
  return fake
    .on('GET', PLAYLIST_API, () => ({
      data: {
        data: [
          {
            id: 'pl.test',
            type: 'playlists',
            attributes: {
              name: 'Road Trip',
              curatorName: 'Curator',
              url: PLAYLIST_URL,
              trackCount: total,
              artwork: { url: 'https://img.test/{w}x{h}.jpg', width: 600, height: 600 },
            },
            relationships: {
              tracks: { data: songs(0, Math.min(100, total)), ...(total > 100 ? { next: cursorFor(100) } : {}) },
            },
          },
        ],
      },
    }))
    .on('GET', `${PLAYLIST_API}/tracks`, (req) => {
      const offset = Number(req.query.offset);
      if (failing.includes(offset)) return { status: 503, data: {} };
      return {
        data: {
          data: songs(offset, Math.min(100, total - offset)),
          ...(offset + 100 < total ? { next: cursorFor(offset + 100) } : {}),
        },
      };
    });
}

const provider = (fake: FakeHttp, opts: { concurrency?: number; maxWaves?: number } = {}) =>
  new AppleMusicCatalogProvider({
    http: fake.instance,
    ...(opts.concurrency !== undefined ? { playlistConcurrency: opts.concurrency } : {}),
    ...(opts.maxWaves !== undefined ? { maxWaves: opts.maxWaves } : {}),
  });

describe('decodeTokenExpiry', () => {
  it('reads the exp claim in milliseconds', () => {
    expect(decodeTokenExpiry(jwt(1700000000))).toBe(1700000000 * 1000);
  });

  it('returns null for tokens without a payload or exp claim', () => {
    expect(decodeTokenExpiry('eyJhbGciOiJFUzI1NiJ9')).toBeNull();
    expect(decodeTokenExpiry(`eyJx.${Buffer.from('{"sub":"x"}').toString('base64url')}.sig`)).toBeNull();
    expect(decodeTokenExpiry('eyJx.%%%.sig')).toBeNull();
  });
});

describe('AppleMusicCatalogProvider', () => {
  it('scrapes the web token and resolves a song', async () => {
    const fake = withToken(new FakeHttp()).on('GET', `${API_BASE_URL}/v1/catalog/us/songs/s4`, () => ({
      data: { data: [rawSong(4)] },
    }));

    const song = await provider(fake).resolve('https://music.apple.com/us/song/tune/s4');

    expect(song).toEqual({
      kind: 'track',
      source: 'applemusic',
      title: 'Tune 4',
      author: 'Singer',
      uri: 'https://music.apple.com/us/song/tune/s4',
      identifier: 's4',
      durationMs: 200004,
      isStream: false,
      thumbnail: 'https://img.test/300x300bb.jpg',
      isrc: 'AM4',
    });
    expect(fake.requests.at(-1)?.authorization).toBe(`Bearer ${TOKEN}`);
  });

  it('resolves a song linked from its album', async () => {
    const fake = withToken(new FakeHttp()).on('GET', `${API_BASE_URL}/v1/catalog/us/songs/s5`, () => ({
      data: { data: [rawSong(5)] },
    }));

    const song = await provider(fake).resolve('https://music.apple.com/us/album/record/alb9?i=s5');

    expect(song.kind).toBe('track');
    expect(fake.count('GET', `${API_BASE_URL}/v1/catalog/us/albums/alb9`)).toBe(0);
  });

  it('follows cursors to materialize a playlist', async () => {
    const fake = withPlaylist(withToken(new FakeHttp()), 250);

    const playlist = await provider(fake).resolve(PLAYLIST_URL);

    if (playlist.kind !== 'playlist') throw new Error('expected a playlist');
    expect(playlist.tracks).toHaveLength(250);
    expect(playlist.tracks.map((t) => t.identifier).slice(98, 102)).toEqual(['s98', 's99', 's100', 's101']);
    expect(playlist.owner).toBe('Curator');
    expect(playlist.thumbnail).toBe('https://img.test/600x600.jpg');
    expect(playlist.degraded).toBe(false);
    expect(fake.count('GET', `${PLAYLIST_API}/tracks`)).toBe(2);
  });

  it('ends the chain at a failed page and reports it', async () => {
    const fake = withPlaylist(withToken(new FakeHttp()), 450, [200]);

    const playlist = await provider(fake).resolve(PLAYLIST_URL);

    if (playlist.kind !== 'playlist') throw new Error('expected a playlist');
    // pages 0 and 100 succeed; 200 fails, so 300 and 400 are never reached
    expect(playlist.tracks).toHaveLength(200);
    expect(playlist.skippedPages).toBe(1);
    expect(playlist.degraded).toBe(true);
  });

  it('stops a cursor chain that never ends after maxWaves waves', async () => {
    const fake = withToken(new FakeHttp())
      .on('GET', PLAYLIST_API, () => ({
        data: {
          data: [
            {
              id: 'pl.test',
              attributes: { name: 'Loop', url: PLAYLIST_URL },
              relationships: { tracks: { data: [rawSong(0)], next: cursorFor(1) } },
            },
          ],
        },
      }))
      .on('GET', `${PLAYLIST_API}/tracks`, (req) => {
        const offset = Number(req.query.offset);
        return { data: { data: [rawSong(offset)], next: cursorFor(offset + 1) } };
      });

    const playlist = await provider(fake, { maxWaves: 3 }).resolve(PLAYLIST_URL);

    if (playlist.kind !== 'playlist') throw new Error('expected a playlist');
    expect(fake.count('GET', `${PLAYLIST_API}/tracks`)).toBe(3);
    expect(playlist.tracks.map((t) => t.identifier)).toEqual(['s0', 's1', 's2', 's3']);
    expect(playlist.skippedPages).toBe(0);
    expect(playlist.degraded).toBe(true);
    expect(playlist.totalTracks).toBe(4);
  });

  it('reuses the scraped token across resolves', async () => {
    const fake = withToken(new FakeHttp()).on('GET', `${API_BASE_URL}/v1/catalog/us/songs/s1`, () => ({
      data: { data: [rawSong(1)] },
    }));
    const apple = provider(fake);

    await apple.resolve('https://music.apple.com/us/song/tune/s1');
    await apple.resolve('https://music.apple.com/us/song/tune/s1');

    expect(fake.count('GET', 'https://music.apple.com/')).toBe(1);
  });

  it('refreshes a token whose exp claim has passed', async () => {
    const expired = jwt(Math.floor(Date.now() / 1000) - 60);
    const fake = withToken(new FakeHttp(), expired).on('GET', `${API_BASE_URL}/v1/catalog/us/songs/s1`, () => ({
      data: { data: [rawSong(1)] },
    }));
    const apple = provider(fake);

    await apple.resolve('https://music.apple.com/us/song/tune/s1');
    await apple.resolve('https://music.apple.com/us/song/tune/s1');

    expect(fake.count('GET', 'https://music.apple.com/')).toBe(2);
  });

  it('raises AuthError when the web page carries no script bundle', async () => {
    const fake = new FakeHttp().on('GET', 'https://music.apple.com/', () => ({ data: '<html></html>' }));

    await expect(provider(fake).resolve(PLAYLIST_URL)).rejects.toThrow('Could not find valid script URL in response.');
    await expect(provider(fake).resolve(PLAYLIST_URL)).rejects.toBeInstanceOf(AuthError);
  });

  it('raises AuthError when the web page is unavailable', async () => {
    const fake = new FakeHttp().on('GET', 'https://music.apple.com/', () => ({ status: 503, data: '' }));

    const error = await provider(fake).resolve(PLAYLIST_URL).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ status: 503 });
  });

  it('raises RequestError when the playlist lookup fails', async () => {
    const fake = withToken(new FakeHttp());

    await expect(provider(fake).resolve(PLAYLIST_URL)).rejects.toBeInstanceOf(RequestError);
  });

  it('raises EmptyResultError for a playlist without tracks', async () => {
    const fake = withPlaylist(withToken(new FakeHttp()), 0);

    await expect(provider(fake).resolve(PLAYLIST_URL)).rejects.toBeInstanceOf(EmptyResultError);
  });

  it('resolves an album and an artist with top songs', async () => {
    const fake = withToken(new FakeHttp())
      .on('GET', `${API_BASE_URL}/v1/catalog/gb/albums/alb1`, () => ({
        data: {
          data: [
            {
              id: 'alb1',
              attributes: { name: 'Record', artistName: 'Singer', url: 'https://music.apple.com/gb/album/record/alb1', trackCount: 2 },
              relationships: { tracks: { data: songs(1, 2) } },
            },
          ],
        },
      }))
      .on('GET', `${API_BASE_URL}/v1/catalog/gb/artists/art1`, () => ({
        data: {
          data: [
            {
              id: 'art1',
              attributes: { name: 'Singer', url: 'https://music.apple.com/gb/artist/singer/art1', genreNames: ['Pop'] },
            },
          ],
        },
      }))
      .on('GET', `${API_BASE_URL}/v1/catalog/gb/artists/art1/view/top-songs`, () => ({
        data: { data: songs(7, 3) },
      }));
    const apple = provider(fake);

    const album = await apple.resolve('https://music.apple.com/gb/album/record/alb1');
    if (album.kind !== 'album') throw new Error('expected an album');
    expect(album.author).toBe('Singer');
    expect(album.totalTracks).toBe(2);
    expect(album.tracks.map((t) => t.identifier)).toEqual(['s1', 's2']);

    const artist = await apple.resolve('https://music.apple.com/gb/artist/singer/art1');
    if (artist.kind !== 'artist') throw new Error('expected an artist');
    expect(artist.genres).toEqual(['Pop']);
    expect(artist.tracks.map((t) => t.identifier)).toEqual(['s7', 's8', 's9']);
  });

  it('streams the same tracks it materializes', async () => {
    const fake = withPlaylist(withToken(new FakeHttp()), 230);
    const apple = provider(fake, { concurrency: 2 });

    const sizes: number[] = [];
    const streamed: CatalogTrack[] = [];
    for await (const batch of apple.iterPlaylistTracks(PLAYLIST_URL, { batchSize: 64 })) {
      sizes.push(batch.length);
      streamed.push(...batch);
    }
    expect(sizes).toEqual([100, 64, 36, 30]);
    expect(streamed[0]?.parentPlaylist).toEqual({ name: 'Road Trip', uri: PLAYLIST_URL });

    const playlist = await apple.resolve(PLAYLIST_URL);
    if (playlist.kind !== 'playlist') throw new Error('expected a playlist');
    expect(streamed.map((t) => t.identifier).sort()).toEqual(playlist.tracks.map((t) => t.identifier).sort());
  });
});
