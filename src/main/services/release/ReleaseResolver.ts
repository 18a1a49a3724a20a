import type { ResolverStrategy, UpdaterConfig } from '@shared/contracts';
import { ApiRedirectReleaseResolver } from '@main/services/release/ApiRedirectReleaseResolver';
import type { HttpOptions } from '@main/services/release/http';
import { PageScrapeReleaseResolver } from '@main/services/release/PageScrapeReleaseResolver';

export interface ReleaseResolver {
  readonly kind: ResolverStrategy;
  resolveLatestUrl(): Promise<string>;
}

export interface ReleaseResolverFactoryOptions {
  fetchImpl?: typeof fetch;
  onEndpointFound?: (endpoint: string) => void;
  onRedirect?: (from: string, location: string) => void;
}

export function createReleaseResolver(
  config: Pick<
    UpdaterConfig,
    'strategy' | 'downloadPageUrl' | 'artifactUrlPattern' | 'apiEndpointPattern' | 'networkTimeoutMs' | 'userAgent'
  >,
  options?: ReleaseResolverFactoryOptions
): ReleaseResolver {
  const http: HttpOptions = {
    fetchImpl: options?.fetchImpl,
    timeoutMs: config.networkTimeoutMs,
    userAgent: config.userAgent,
    onRedirect: options?.onRedirect
  };

  switch (config.strategy) {
    case 'page-scrape':
      return new PageScrapeReleaseResolver({
        downloadPageUrl: config.downloadPageUrl,
        artifactUrlPattern: new RegExp(config.artifactUrlPattern),
        http
      });
    case 'api-redirect':
      return new ApiRedirectReleaseResolver({
        downloadPageUrl: config.downloadPageUrl,
        apiEndpointPattern: new RegExp(config.apiEndpointPattern),
        http,
        onEndpointFound: options?.onEndpointFound
      });
  }
}
