export interface HttpOptions {
  fetchImpl?: typeof fetch;
  timeoutMs: number;
  userAgent: string;
  onRedirect?: (from: string, location: string) => void;
}

const MAX_REDIRECT_HOPS = 10;

export async function fetchPageText(url: string, options: HttpOptions): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const response = await fetchImpl(url, {
    headers: {
      Accept: 'text/html, */*',
      'User-Agent': options.userAgent
    },
    signal: AbortSignal.timeout(options.timeoutMs)
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} para ${url}`);
  }

  return response.text();
}

/**
 * Follows the redirect chain with HEAD requests and returns the last `Location`
 * seen, or null when the first response is not a redirect. A request that fails
 * after a `Location` was received ends the walk with that `Location`.
 */
export async function probeRedirectLocation(url: string, options: HttpOptions): Promise<string | null> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let current = url;
  let lastLocation: string | null = null;

  for (let hop = 0; hop < MAX_REDIRECT_HOPS; hop += 1) {
    let response: Response;
    try {
      response = await fetchImpl(current, {
        method: 'HEAD',
        redirect: 'manual',
        headers: {
          Accept: '*/*',
          'User-Agent': options.userAgent
        },
        signal: AbortSignal.timeout(options.timeoutMs)
      });
    } catch (error) {
      if (lastLocation !== null) {
        return lastLocation;
      }
      throw error;
    }

    const location = response.headers.get('location');
    if (!isRedirectStatus(response.status) || !location) {
      break;
    }

    lastLocation = resolveUrl(location.trim(), current);
    options.onRedirect?.(current, lastLocation);
    current = lastLocation;
  }

  return lastLocation;
}

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:/i;

/** Absolute targets are returned as written; only relative ones go through `URL`. */
export function resolveUrl(target: string, base: string): string {
  if (ABSOLUTE_URL.test(target)) {
    return target;
  }

  try {
    return new URL(target, base).toString();
  } catch {
    return target;
  }
}

function isRedirectStatus(status: number): boolean {
  return status >= 300 && status < 400;
}
