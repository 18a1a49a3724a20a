import type { ManifestFields, ReleaseDescriptor } from '@shared/contracts';

const VERSION_READ_PATTERN = /version = "([^"]*)"/;
const HASH_READ_PATTERN = /sha256 = "([^"]*)"/;
const VERSION_ASSIGNMENT_PATTERN = /version = "[^"]*";/;
const HASH_ASSIGNMENT_PATTERN = /sha256 = "[^"]*";/;

export interface ManifestRewrite {
  text: string;
  versionReplaced: boolean;
  urlOccurrences: number;
  hashReplaced: boolean;
  warnings: string[];
}

export function readManifestFields(text: string, sourceUrlPrefix: string): ManifestFields {
  return {
    version: VERSION_READ_PATTERN.exec(text)?.[1] ?? null,
    sourceUrl: findSourceUrl(text, sourceUrlPrefix),
    sha256: HASH_READ_PATTERN.exec(text)?.[1] ?? null
  };
}

export function applyReleaseToManifest(
  text: string,
  current: Pick<ManifestFields, 'sourceUrl'>,
  release: ReleaseDescriptor
): ManifestRewrite {
  const warnings: string[] = [];

  const versionReplaced = VERSION_ASSIGNMENT_PATTERN.test(text);
  let next = versionReplaced ? text.replace(VERSION_ASSIGNMENT_PATTERN, () => `version = "${release.version}";`) : text;
  if (!versionReplaced) {
    warnings.push('Atribuicao `version = "...";` nao encontrada no manifesto; versao nao atualizada.');
  }

  let urlOccurrences = 0;
  const oldUrl = current.sourceUrl ?? '';
  if (oldUrl) {
    urlOccurrences = countOccurrences(next, oldUrl);
    next = next.split(oldUrl).join(release.url);
  }
  if (urlOccurrences === 0) {
    warnings.push('URL de origem anterior nao encontrada no manifesto; URL nao atualizada.');
  }

  const hashReplaced = HASH_ASSIGNMENT_PATTERN.test(next);
  if (hashReplaced) {
    next = next.replace(HASH_ASSIGNMENT_PATTERN, () => `sha256 = "${release.hash}";`);
  } else {
    warnings.push('Atribuicao `sha256 = "...";` nao encontrada no manifesto; hash nao atualizado.');
  }

  return {
    text: next,
    versionReplaced,
    urlOccurrences,
    hashReplaced,
    warnings
  };
}

function findSourceUrl(text: string, prefix: string): string | null {
  if (!prefix) {
    return null;
  }

  const start = text.indexOf(prefix);
  if (start < 0) {
    return null;
  }

  const end = text.indexOf('"', start);
  return end < 0 ? text.slice(start) : text.slice(start, end);
}

function countOccurrences(text: string, needle: string): number {
  let count = 0;
  let index = text.indexOf(needle);
  while (index >= 0) {
    count += 1;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}
