import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import {
  CatalogEntity,
  CatalogProviderId,
  CatalogTrack,
  PlaylistStreamOptions,
  Route,
} from '../../types/catalog';
import { CatalogProvider, CatalogProviderOptions } from './types';
import { Paginator } from '../Paginator';
import { BearerToken, TokenCache } from '../TokenCache';
import { InvalidURLError, RequestError } from '../../utils/errors';
import { ScopedLog, scopedLog } from '../../utils/logger';

export const DEFAULT_TIMEOUT_MS = 12000;
export const DEFAULT_BATCH_SIZE = 100;

interface GetOptions {
  params?: Record<string, string | number>;
  signal?: AbortSignal | undefined;
}

export function describeEntity(entity: CatalogEntity): Record<string, unknown> {
  switch (entity.kind) {
    case 'track':
      return { kind: entity.kind, title: entity.title, identifier: entity.identifier };
    case 'playlist':
      return {
        kind: entity.kind,
        name: entity.name,
        tracks: entity.tracks.length,
        totalTracks: entity.totalTracks,
        skippedPages: entity.skippedPages,
      };
    default:
      return { kind: entity.kind, name: entity.name, tracks: entity.tracks.length };
  }
}

/**
 * Shared plumbing of the catalog providers: one axios instance, one token
 * cache and one paginator (with its semaphore) per provider instance.
 */
export abstract class BaseCatalogProvider implements CatalogProvider {
  readonly id: CatalogProviderId;
  protected readonly http: AxiosInstance;
  protected readonly tokens: TokenCache;
  protected readonly paginator: Paginator;
  protected readonly pageLimit: number | undefined;
  protected readonly batchSize: number;
  protected readonly log: ScopedLog;

  protected constructor(id: CatalogProviderId, opts: CatalogProviderOptions, defaultConcurrency: number) {
    this.id = id;
    this.log = scopedLog(id);
    this.http = opts.http ?? axios.create({ timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS });
    this.tokens = new TokenCache(id, () => this.exchangeToken());
    this.paginator = new Paginator({
      concurrency: opts.playlistConcurrency ?? defaultConcurrency,
      ...(opts.maxWaves !== undefined ? { maxWaves: opts.maxWaves } : {}),
      scope: id,
    });
    this.pageLimit = opts.playlistPageLimit;
    this.batchSize = Math.max(1, opts.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  abstract parse(url: string): Route;

  protected abstract exchangeToken(): Promise<BearerToken>;

  protected abstract authHeaders(token: string): Record<string, string>;

  protected abstract resolveRoute(route: Route): Promise<CatalogEntity>;

  protected abstract streamPlaylist(route: Route, batchSize: number): AsyncGenerator<CatalogTrack[]>;

  get playlistConcurrency(): number {
    return this.paginator.concurrency;
  }

  supports(url: string): boolean {
    try {
      this.parse(url);
      return true;
    } catch {
      return false;
    }
  }

  async resolve(url: string): Promise<CatalogEntity> {
    const route = this.parse(url);
    const entity = await this.resolveRoute(route);
    this.log.info('resolve_finished', { type: route.type, id: route.id, ...describeEntity(entity) });
    return entity;
  }

  async *iterPlaylistTracks(url: string, opts?: PlaylistStreamOptions): AsyncGenerator<CatalogTrack[]> {
    const route = this.parse(url);
    if (route.type !== 'playlist') {
      throw new InvalidURLError(`Provided query is not a valid ${this.id} playlist URL.`, this.id);
    }
    yield* this.streamPlaylist(route, Math.max(1, opts?.batchSize ?? this.batchSize));
  }

  /**
   * Authenticated GET that must succeed; anything but 2xx raises RequestError.
   * A 401 drops the token that was refused and the request is sent once more
   * with a fresh one.
   */
  protected async getJson(url: string, opts: GetOptions = {}): Promise<unknown> {
    let attempt = await this.authorizedGet(url, opts);
    if (attempt.resp.status === 401) {
      this.log.warn('token_rejected', { url });
      this.tokens.invalidate(attempt.token);
      attempt = await this.authorizedGet(url, opts);
    }

    const { resp } = attempt;
    if (resp.status < 200 || resp.status >= 300) {
      throw new RequestError(this.id, resp.status, resp.statusText || 'Request failed', url);
    }
    this.log.debug('request_ok', { url, status: resp.status });
    return resp.data;
  }

  private async authorizedGet(url: string, opts: GetOptions): Promise<{ token: string; resp: AxiosResponse<unknown> }> {
    const token = await this.tokens.ensureValid();
    const config: AxiosRequestConfig = {
      headers: this.authHeaders(token),
      validateStatus: () => true,
      ...(opts.params ? { params: opts.params } : {}),
      ...(opts.signal ? { signal: opts.signal } : {}),
    };

    const resp = await this.http.get<unknown>(url, config).catch((error: unknown) => {
      throw new RequestError(this.id, undefined, error instanceof Error ? error.message : String(error), url);
    });
    return { token, resp };
  }
}
