import { describe, expect, it } from 'vitest';
import { loadAppConfig } from './schema';

describe('loadAppConfig', () => {
  it('applies defaults to an empty environment', () => {
    const cfg = loadAppConfig({});

    expect(cfg.spotify).toEqual({ enabled: true, market: 'US', playlistConcurrency: 10 });
    expect(cfg.appleMusic).toEqual({ enabled: true, playlistConcurrency: 6 });
    expect(cfg.pagination).toEqual({ maxWaves: 50, batchSize: 100 });
    expect(cfg.http.timeoutMs).toBe(12000);
    expect(cfg.logging).toEqual({ level: 'DEBUG', toFile: true, maxSizeBytes: 10 * 1024 * 1024, maxFiles: 3 });
  });

  it('reads credentials and tuning values', () => {
    const cfg = loadAppConfig({
      NODE_ENV: 'production',
      SPOTIFY_CLIENT_ID: 'test-id',
      SPOTIFY_CLIENT_SECRET: 'test-secret',
      SPOTIFY_MARKET: 'BR',
      ENABLE_APPLE_MUSIC: 'no',
      SPOTIFY_PLAYLIST_CONCURRENCY: '4',
      PLAYLIST_PAGE_LIMIT: '20',
      PLAYLIST_BATCH_SIZE: '25',
      LOG_TO_FILE: 'false',
      LOG_LEVEL: 'warn',
    });

    expect(cfg.spotify).toEqual({
      enabled: true,
      clientId: 'test-id',
      clientSecret: 'test-secret',
      market: 'BR',
      playlistConcurrency: 4,
    });
    expect(cfg.appleMusic.enabled).toBe(false);
    expect(cfg.pagination).toEqual({ pageLimit: 20, maxWaves: 50, batchSize: 25 });
    expect(cfg.logging.level).toBe('WARN');
    expect(cfg.logging.toFile).toBe(false);
  });

  it('falls back to the environment default for an unknown log level', () => {
    expect(loadAppConfig({ NODE_ENV: 'production', LOG_LEVEL: 'loud' }).logging.level).toBe('INFO');
  });

  it('uses the default for a non-numeric value', () => {
    expect(loadAppConfig({ PLAYLIST_MAX_WAVES: 'many' }).pagination.maxWaves).toBe(50);
  });

  it('rejects out-of-range values', () => {
    expect(() => loadAppConfig({ SPOTIFY_PLAYLIST_CONCURRENCY: '0' })).toThrow(
      /Invalid environment configuration: SPOTIFY_PLAYLIST_CONCURRENCY/
    );
  });
});
