import { AppConfig } from '../types/catalog';
import { z } from 'zod';

// Helpers to coerce and validate env values
const bool = () =>
  z.preprocess((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'string') {
      const s = v.trim().toLowerCase();
      if (['true', '1', 'yes', 'y'].includes(s)) return true;
      if (['false', '0', 'no', 'n'].includes(s)) return false;
    }
    return v;
  }, z.boolean());

const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return def;
  }, z.number().int().min(min).max(max));

const allowedLogLevels: ReadonlyArray<string> = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'];

const EnvSchema = z.object({
  ENABLE_SPOTIFY: bool().optional().default(true),
  ENABLE_APPLE_MUSIC: bool().optional().default(true),

  // Spotify Web API (Client Credentials)
  SPOTIFY_CLIENT_ID: z.string().optional(),
  SPOTIFY_CLIENT_SECRET: z.string().optional(),
  SPOTIFY_MARKET: z.string().optional().default('US'),

  // Playlist pagination tuning
  SPOTIFY_PLAYLIST_CONCURRENCY: intInRange(1, 50, 10).optional().default(10),
  APPLE_MUSIC_PLAYLIST_CONCURRENCY: intInRange(1, 50, 6).optional().default(6),
  PLAYLIST_PAGE_LIMIT: intInRange(0, 10000, 0).optional(),
  PLAYLIST_MAX_WAVES: intInRange(1, 500, 50).optional().default(50),
  PLAYLIST_BATCH_SIZE: intInRange(1, 1000, 100).optional().default(100),

  HTTP_TIMEOUT_SECONDS: intInRange(1, 120, 12).optional().default(12),

  LOG_LEVEL: z.string().optional(),
  LOG_TO_FILE: bool().optional().default(true),
  LOG_MAX_SIZE_MB: intInRange(1, 200, 10).optional().default(10),
  LOG_MAX_FILES: intInRange(1, 20, 3).optional().default(3),
});

export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;
  const nodeEnv = (source.NODE_ENV || '').toLowerCase();
  const defaultLogLevel = nodeEnv === 'production' ? 'INFO' : 'DEBUG';
  const inputLevel = env.LOG_LEVEL ? env.LOG_LEVEL.trim() : defaultLogLevel;
  const normalizedLevel = allowedLogLevels.includes(inputLevel.toLowerCase())
    ? inputLevel.toUpperCase()
    : defaultLogLevel;

  const cfg: AppConfig = {
    spotify: {
      enabled: env.ENABLE_SPOTIFY,
      ...(env.SPOTIFY_CLIENT_ID ? { clientId: env.SPOTIFY_CLIENT_ID } : {}),
      ...(env.SPOTIFY_CLIENT_SECRET ? { clientSecret: env.SPOTIFY_CLIENT_SECRET } : {}),
      market: env.SPOTIFY_MARKET,
      playlistConcurrency: env.SPOTIFY_PLAYLIST_CONCURRENCY,
    },
    appleMusic: {
      enabled: env.ENABLE_APPLE_MUSIC,
      playlistConcurrency: env.APPLE_MUSIC_PLAYLIST_CONCURRENCY,
    },
    pagination: {
      // 0 (or unset) means no cap
      ...(env.PLAYLIST_PAGE_LIMIT ? { pageLimit: env.PLAYLIST_PAGE_LIMIT } : {}),
      maxWaves: env.PLAYLIST_MAX_WAVES,
      batchSize: env.PLAYLIST_BATCH_SIZE,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_SECONDS * 1000,
    },
    logging: {
      level: normalizedLevel,
      toFile: env.LOG_TO_FILE,
      maxSizeBytes: env.LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: env.LOG_MAX_FILES,
    },
  };

  return cfg;
}
