import { UpdaterError, describeError } from '@main/services/errors/UpdaterError';
import { fetchPageText, resolveUrl, type HttpOptions } from '@main/services/release/http';
import type { ReleaseResolver } from '@main/services/release/ReleaseResolver';

interface PageScrapeReleaseResolverOptions {
  downloadPageUrl: string;
  artifactUrlPattern: RegExp;
  http: HttpOptions;
}

const HREF_PATTERN = /<a\b[^>]*?\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/gi;

export class PageScrapeReleaseResolver implements ReleaseResolver {
  readonly kind = 'page-scrape' as const;

  private readonly downloadPageUrl: string;
  private readonly artifactUrlPattern: RegExp;
  private readonly http: HttpOptions;

  constructor(options: PageScrapeReleaseResolverOptions) {
    this.downloadPageUrl = options.downloadPageUrl;
    this.artifactUrlPattern = withoutGlobalFlag(options.artifactUrlPattern);
    this.http = options.http;
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

    const match = extractLinkTargets(html, this.downloadPageUrl).find((href) => this.artifactUrlPattern.test(href));
    if (!match) {
      throw new UpdaterError(
        'resolution_failed',
        'Nenhum link de AppImage encontrado na pagina de download. A estrutura do site pode ter mudado.'
      );
    }

    return match;
  }
}

export function extractLinkTargets(html: string, baseUrl: string): string[] {
  const targets: string[] = [];
  for (const match of html.matchAll(HREF_PATTERN)) {
    const raw = match[1] ?? match[2] ?? match[3] ?? '';
    const decoded = decodeHtmlEntities(raw.trim());
    if (!decoded) {
      continue;
    }
    targets.push(resolveUrl(decoded, baseUrl));
  }
  return targets;
}

function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

function withoutGlobalFlag(pattern: RegExp): RegExp {
  return pattern.global || pattern.sticky ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')) : pattern;
}
