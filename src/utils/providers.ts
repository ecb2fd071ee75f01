import { CatalogProviderId, Route, RouteType } from '../types/catalog';
import { InvalidURLError } from './errors';

export type DetectedProvider = CatalogProviderId | 'unknown';

const SPOTIFY_HOSTS = new Set([
  'open.spotify.com',
]);

const APPLE_MUSIC_HOSTS = new Set([
  'music.apple.com',
]);

// Accepts an intl locale segment, an optional trailing slash and query parameters.
const SPOTIFY_URL_REGEX =
  /^https?:\/\/open\.spotify\.com\/(?:intl-[a-zA-Z-]+\/)?(?<type>album|playlist|track|artist)\/(?<id>[a-zA-Z0-9]+)\/?(?:\?.*)?$/;

const APPLE_MUSIC_URL_REGEX =
  /^https?:\/\/music\.apple\.com\/(?<country>[a-zA-Z]{2})\/(?<type>album|playlist|song|artist)\/(?<name>.+?)\/(?<id>[^/?]+?)\/?(?:\?.*)?$/;

// Apple Music links a single off its album by appending ?i=<song id>
const APPLE_MUSIC_SONG_IN_ALBUM_REGEX =
  /^https?:\/\/music\.apple\.com\/(?<country>[a-zA-Z]{2})\/album\/(?<name>.+)\/(?<id>[^/?]+)\?i=(?<songId>[^&]+)(?:&.*)?$/;

function safeParseUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

function getHost(url: URL): string {
  return url.hostname.toLowerCase();
}

function toRouteType(type: string | undefined): RouteType | null {
  switch (type) {
    case 'track':
    case 'song':
      return 'track';
    case 'album':
    case 'playlist':
    case 'artist':
      return type;
    default:
      return null;
  }
}

export function isSpotifyUrl(input: string): boolean {
  const u = safeParseUrl(input.trim());
  if (!u) return false;
  return SPOTIFY_HOSTS.has(getHost(u));
}

export function isAppleMusicUrl(input: string): boolean {
  const u = safeParseUrl(input.trim());
  if (!u) return false;
  return APPLE_MUSIC_HOSTS.has(getHost(u));
}

export function detectCatalogProvider(input: string): DetectedProvider {
  if (isSpotifyUrl(input)) return 'spotify';
  if (isAppleMusicUrl(input)) return 'applemusic';
  return 'unknown';
}

export function parseSpotifyRoute(input: string): Route {
  const m = SPOTIFY_URL_REGEX.exec(input.trim());
  const type = toRouteType(m?.groups?.type);
  const id = m?.groups?.id;
  if (!type || !id) {
    throw new InvalidURLError('The Spotify link provided is not valid.', 'spotify');
  }
  return { provider: 'spotify', type, id };
}

export function parseAppleMusicRoute(input: string): Route {
  const url = input.trim();
  const m = APPLE_MUSIC_URL_REGEX.exec(url);
  const type = toRouteType(m?.groups?.type);
  const id = m?.groups?.id;
  const country = m?.groups?.country;
  if (!type || !id || !country) {
    throw new InvalidURLError('The Apple Music link provided is not valid.', 'applemusic');
  }

  // Must be checked before the generic album route
  if (type === 'album') {
    const single = APPLE_MUSIC_SONG_IN_ALBUM_REGEX.exec(url);
    const songId = single?.groups?.songId;
    if (songId) {
      return { provider: 'applemusic', type: 'track', id: songId, region: country.toLowerCase() };
    }
  }

  return { provider: 'applemusic', type, id, region: country.toLowerCase() };
}

export function parseCatalogRoute(input: string): Route {
  switch (detectCatalogProvider(input)) {
    case 'spotify':
      return parseSpotifyRoute(input);
    case 'applemusic':
      return parseAppleMusicRoute(input);
    default:
      throw new InvalidURLError(`Unsupported catalog link: ${input}`);
  }
}
