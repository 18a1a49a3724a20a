import type { ArtifactNamePattern } from '@shared/contracts';

export function extractVersionFromUrl(url: string, pattern: ArtifactNamePattern): string | null {
  const fileName = readFileName(url);
  if (!fileName) {
    return null;
  }

  const matcher = new RegExp(`^${escapeRegExp(pattern.name)}-(.+)-${escapeRegExp(pattern.arch)}\\.${escapeRegExp(pattern.extension)}$`);
  const version = matcher.exec(fileName)?.[1]?.trim();
  return version ? version : null;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function readFileName(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/, 1)[0] ?? '';
  }

  const segments = pathname.split('/').filter(Boolean);
  const last = segments[segments.length - 1] ?? '';
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
