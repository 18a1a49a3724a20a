import { UpdaterError, describeError } from '@main/services/errors/UpdaterError';
import { fetchPageText, probeRedirectLocation, type HttpOptions } from '@main/services/release/http';
import type { ReleaseResolver } from '@main/services/release/ReleaseResolver';

interface ApiRedirectReleaseResolverOptions {
  downloadPageUrl: string;
  apiEndpointPattern: RegExp;
  http: HttpOptions;
  onEndpointFound?: (endpoint: string) => void;
}

export class ApiRedirectReleaseResolver implements ReleaseResolver {
  readonly kind = 'api-redirect' as const;

  private readonly downloadPageUrl: string;
  private readonly apiEndpointPattern: RegExp;
  private readonly http: HttpOptions;
  private readonly onEndpointFound: (endpoint: string) => void;

  constructor(options: ApiRedirectReleaseResolverOptions) {
    this.downloadPageUrl = options.downloadPageUrl;
    this.apiEndpointPattern = new RegExp(options.apiEndpointPattern.source, options.apiEndpointPattern.flags.replace(/[gy]/g, ''));
    this.http = options.http;
    this.onEndpointFound = options.onEndpointFound ?? (() => undefined);
  }

  async resolveLatestUrl(): Promise<string> {
    let html: string;
    try {
      html = await fetchPageText(this.downloadPageUrl, this.http);
    } catch (error) {
      throw new UpdaterError('resolution_failed', `Falha ao baixar a pagina de download: ${describeError(error)}`, {
        cause: error
      });
    }

    const endpoint = this.apiEndpointPattern.exec(html)?.[0];
    if (!endpoint) {
      throw new UpdaterError(
        'resolution_failed',
        'URL da API de download nao encontrada na pagina. A estrutura do site pode ter mudado.'
      );
    }
    this.onEndpointFound(endpoint);

    let location: string | null;
    try {
      location = await probeRedirectLocation(endpoint, this.http);
    } catch (error) {
      throw new UpdaterError('resolution_failed', `Falha ao consultar ${endpoint}: ${describeError(error)}`, {
        cause: error
      });
    }

    if (!location) {
      throw new UpdaterError(
        'resolution_failed',
        'Nao foi possivel seguir o redirecionamento ate o AppImage. O endpoint da API pode ter mudado.'
      );
    }

    return location;
  }
}
