export * from './types/catalog';
export * from './utils/errors';
export {
  detectCatalogProvider,
  isAppleMusicUrl,
  isSpotifyUrl,
  parseAppleMusicRoute,
  parseCatalogRoute,
  parseSpotifyRoute,
} from './utils/providers';
export { Semaphore } from './utils/semaphore';
export { loadAppConfig } from './config/schema';
export { TokenCache } from './services/TokenCache';
export type { BearerToken, TokenExchange } from './services/TokenCache';
export { Paginator } from './services/Paginator';
export type { FetchedPage, PageFetcher, PaginationOutcome, PaginatorOptions } from './services/Paginator';
export type { CatalogProvider, CatalogProviderOptions } from './services/providers/types';
export { SpotifyCatalogProvider } from './services/providers/SpotifyCatalogProvider';
export type { SpotifyProviderOptions } from './services/providers/SpotifyCatalogProvider';
export { AppleMusicCatalogProvider } from './services/providers/AppleMusicCatalogProvider';
export { CatalogResolver, createProviders } from './services/CatalogResolver';
