import path from 'node:path';
import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';

export interface CommandResolution {
  command: string;
  found: boolean;
  path: string | null;
}

export type CommandResolver = (commandName: string) => CommandResolution;

// nix instala binarios fora do PATH padrao em shells nao interativos (CI, cron)
const DEFAULT_PATH_SEGMENTS = [
  '/run/current-system/sw/bin',
  '/nix/var/nix/profiles/default/bin',
  '/usr/local/bin',
  '/usr/bin',
  '/bin'
] as const;

export function buildCommandEnvironment(
  baseEnv: NodeJS.ProcessEnv = process.env,
  homeDir: string | undefined = baseEnv.HOME
): NodeJS.ProcessEnv {
  const env = { ...baseEnv };
  const entries = splitPathEntries(baseEnv.PATH);
  const extras = homeDir ? [path.join(homeDir, '.nix-profile', 'bin'), ...DEFAULT_PATH_SEGMENTS] : [...DEFAULT_PATH_SEGMENTS];
  for (const fallback of extras) {
    if (!entries.includes(fallback)) {
      entries.push(fallback);
    }
  }

  if (entries.length > 0) {
    env.PATH = entries.join(path.delimiter);
  }
  return env;
}

export function resolveCommandBinary(commandName: string, baseEnv: NodeJS.ProcessEnv = process.env): CommandResolution {
  const normalized = commandName.trim();
  if (!normalized) {
    return { command: commandName, found: false, path: null };
  }

  if (path.isAbsolute(normalized)) {
    return existsSync(normalized)
      ? { command: normalized, found: true, path: normalized }
      : { command: normalized, found: false, path: null };
  }

  const env = buildCommandEnvironment(baseEnv);

  try {
    const result = spawnSync('which', [normalized], {
      encoding: 'utf-8',
      env
    });
    if (result.status === 0) {
      const firstLine = readFirstOutputLine(result.stdout);
      if (firstLine) {
        return { command: normalized, found: true, path: firstLine };
      }
    }
  } catch {
    // sem `which`: varre o PATH manualmente
  }

  for (const dir of splitPathEntries(env.PATH)) {
    const target = path.join(dir, normalized);
    if (existsSync(target)) {
      return { command: normalized, found: true, path: target };
    }
  }

  return { command: normalized, found: false, path: null };
}

export function findMissingCommands(
  commandNames: readonly string[],
  resolve: CommandResolver = (name) => resolveCommandBinary(name)
): string[] {
  const missing: string[] = [];
  for (const name of commandNames) {
    const resolution = resolve(name);
    if (!resolution.found && !missing.includes(resolution.command)) {
      missing.push(resolution.command);
    }
  }
  return missing;
}

function splitPathEntries(value: string | undefined): string[] {
  if (typeof value !== 'string' || !value.trim()) {
    return [];
  }

  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function readFirstOutputLine(output: string | Buffer | null | undefined): string | null {
  if (typeof output !== 'string') {
    return null;
  }

  const firstLine = output
    .split('\n')
    .map((line) => line.trim())
    .find(Boolean);

  return firstLine ?? null;
}
