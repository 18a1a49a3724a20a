import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { UpdaterConfig } from '@shared/contracts';

export const CONFIG_FILE_NAME = 'cursor-updater.config.json';

const DEFAULT_CONFIG: UpdaterConfig = {
  manifestFile: 'flake.nix',
  packageAttr: 'cursor',
  strategy: 'api-redirect',
  downloadPageUrl: 'https://cursor.com/download',
  apiEndpointPattern: 'https://api2\\.cursor\\.sh/updates/download/golden/linux-x64/cursor/[^"\'\\s<>]*',
  artifactUrlPattern: '^https://downloads\\.cursor\\.com/production/[^/]+/linux/x64/Cursor-[^/]+-x86_64\\.AppImage$',
  sourceUrlPrefix: 'https://downloads.cursor.com/',
  artifact: {
    name: 'Cursor',
    arch: 'x86_64',
    extension: 'AppImage'
  },
  build: {
    outLink: 'result',
    executable: 'bin/cursor',
    icon: 'share/pixmaps/cursor.png',
    desktopEntry: 'share/applications/cursor.desktop'
  },
  requiredCommands: ['nix-prefetch-url', 'nix'],
  networkTimeoutMs: 30_000,
  lockStaleMs: 30 * 60 * 1000,
  userAgent: 'cursor-flake-updater/0.1',
  logDir: null
};

const regexSource = z.string().min(1).refine(isValidRegex, { message: 'expressao regular invalida' });
const relativePath = z
  .string()
  .min(1)
  .refine((value) => !path.isAbsolute(value), { message: 'caminho deve ser relativo' });

const configSchema = z.object({
  manifestFile: relativePath.default(DEFAULT_CONFIG.manifestFile),
  packageAttr: z.string().min(1).default(DEFAULT_CONFIG.packageAttr),
  strategy: z.enum(['page-scrape', 'api-redirect']).default(DEFAULT_CONFIG.strategy),
  downloadPageUrl: z.string().url().default(DEFAULT_CONFIG.downloadPageUrl),
  apiEndpointPattern: regexSource.default(DEFAULT_CONFIG.apiEndpointPattern),
  artifactUrlPattern: regexSource.default(DEFAULT_CONFIG.artifactUrlPattern),
  sourceUrlPrefix: z.string().url().default(DEFAULT_CONFIG.sourceUrlPrefix),
  artifact: z
    .object({
      name: z.string().min(1),
      arch: z.string().min(1),
      extension: z.string().min(1)
    })
    .default(DEFAULT_CONFIG.artifact),
  build: z
    .object({
      outLink: relativePath,
      executable: relativePath,
      icon: relativePath,
      desktopEntry: relativePath
    })
    .default(DEFAULT_CONFIG.build),
  requiredCommands: z.array(z.string().min(1)).default(DEFAULT_CONFIG.requiredCommands),
  networkTimeoutMs: z.number().int().positive().default(DEFAULT_CONFIG.networkTimeoutMs),
  lockStaleMs: z.number().int().positive().default(DEFAULT_CONFIG.lockStaleMs),
  userAgent: z.string().min(1).default(DEFAULT_CONFIG.userAgent),
  logDir: z.string().min(1).nullable().default(DEFAULT_CONFIG.logDir)
});

interface ConfigStoreOptions {
  env?: NodeJS.ProcessEnv;
}

export class ConfigStore {
  private readonly filePath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly loadIssues: string[] = [];
  private readonly cache: UpdaterConfig;

  constructor(workDir: string, options?: ConfigStoreOptions) {
    this.filePath = path.join(workDir, CONFIG_FILE_NAME);
    this.env = options?.env ?? process.env;
    this.cache = this.applyEnvOverrides(this.load());
  }

  get(): UpdaterConfig {
    return cloneConfig(this.cache);
  }

  issues(): string[] {
    return this.loadIssues.slice();
  }

  private load(): UpdaterConfig {
    if (!fs.existsSync(this.filePath)) {
      return cloneConfig(DEFAULT_CONFIG);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      this.loadIssues.push(`${CONFIG_FILE_NAME}: JSON invalido (${error instanceof Error ? error.message : String(error)})`);
      return cloneConfig(DEFAULT_CONFIG);
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        this.loadIssues.push(`${CONFIG_FILE_NAME}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
      }
      return cloneConfig(DEFAULT_CONFIG);
    }

    return parsed.data;
  }

  private applyEnvOverrides(config: UpdaterConfig): UpdaterConfig {
    const next = cloneConfig(config);

    const strategy = readEnv(this.env, 'CURSOR_UPDATER_STRATEGY');
    if (strategy !== null) {
      if (strategy === 'page-scrape' || strategy === 'api-redirect') {
        next.strategy = strategy;
      } else {
        this.loadIssues.push(`CURSOR_UPDATER_STRATEGY ignorado: valor desconhecido "${strategy}"`);
      }
    }

    const timeout = readEnv(this.env, 'CURSOR_UPDATER_TIMEOUT_MS');
    if (timeout !== null) {
      const value = Number(timeout);
      if (Number.isInteger(value) && value > 0) {
        next.networkTimeoutMs = value;
      } else {
        this.loadIssues.push(`CURSOR_UPDATER_TIMEOUT_MS ignorado: "${timeout}" nao e um inteiro positivo`);
      }
    }

    const logDir = readEnv(this.env, 'CURSOR_UPDATER_LOG_DIR');
    if (logDir !== null) {
      next.logDir = logDir;
    }

    return next;
  }
}

export function defaultUpdaterConfig(): UpdaterConfig {
  return cloneConfig(DEFAULT_CONFIG);
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key];
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.trim();
  return normalized ? normalized : null;
}

function isValidRegex(value: string): boolean {
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
}

function cloneConfig(config: UpdaterConfig): UpdaterConfig {
  return {
    ...config,
    artifact: { ...config.artifact },
    build: { ...config.build },
    requiredCommands: config.requiredCommands.slice()
  };
}
