import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

interface LoggerOptions {
  fileName?: string;
  maxBytes?: number;
}

export class Logger {
  private readonly filePath: string;
  private readonly maxBytes: number;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, normalizeFileName(options?.fileName));
    this.maxBytes = normalizeMaxBytes(options?.maxBytes);
  }

  get path(): string {
    return this.filePath;
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  entries(limit?: number): LogEntry[] {
    const files = [`${this.filePath}.1`, this.filePath];
    const entries: LogEntry[] = [];

    for (const file of files) {
      if (!fs.existsSync(file)) {
        continue;
      }

      const lines = fs.readFileSync(file, 'utf-8').split('\n');
      for (const raw of lines) {
        const line = raw.trim();
        if (!line) {
          continue;
        }

        entries.push(parseLogLine(line));
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

export function resolveDefaultLogDir(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): string {
  const stateHome = typeof env.XDG_STATE_HOME === 'string' ? env.XDG_STATE_HOME.trim() : '';
  const base = stateHome && path.isAbsolute(stateHome) ? stateHome : path.join(homeDir, '.local', 'state');
  return path.join(base, 'cursor-flake-updater');
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed = JSON.parse(line) as Partial<LogEntry>;
    return {
      ts: typeof parsed.ts === 'string' ? parsed.ts : new Date().toISOString(),
      level: isLogLevel(parsed.level) ? parsed.level : 'info',
      message: typeof parsed.message === 'string' ? parsed.message : line,
      meta: parsed.meta
    };
  } catch {
    return {
      ts: new Date().toISOString(),
      level: 'info',
      message: line
    };
  }
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function normalizeFileName(value: string | undefined): string {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized ? path.basename(normalized) : 'updater.log';
}

function normalizeMaxBytes(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return 2 * 1024 * 1024;
  }

  return Math.trunc(value);
}
