import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { UpdaterError } from '@main/services/errors/UpdaterError';

const lockDataSchema = z.object({
  pid: z.number().int(),
  startedAt: z.string()
});

type LockData = z.infer<typeof lockDataSchema>;

interface ManifestLockOptions {
  staleMs: number;
  pid?: number;
  now?: () => number;
  isProcessRunning?: (pid: number) => boolean;
}

/**
 * Advisory lock next to the manifest. It only guards against two updater runs on
 * the same file; other tools editing the manifest are not blocked.
 */
export class ManifestLock {
  readonly lockPath: string;
  private readonly staleMs: number;
  private readonly pid: number;
  private readonly now: () => number;
  private readonly isProcessRunning: (pid: number) => boolean;
  private depth = 0;

  constructor(manifestPath: string, options: ManifestLockOptions) {
    this.lockPath = path.join(path.dirname(manifestPath), `.${path.basename(manifestPath)}.lock`);
    this.staleMs = options.staleMs;
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? Date.now;
    this.isProcessRunning = options.isProcessRunning ?? isProcessRunning;
  }

  isHeld(): boolean {
    return this.depth > 0;
  }

  /** Re-entrant: nested acquire/release pairs on the same instance share one lock file. */
  acquire(): void {
    if (this.depth > 0) {
      this.depth += 1;
      return;
    }

    if (this.tryCreate()) {
      return;
    }

    const holder = readLockFile(this.lockPath);
    if (holder && !this.isStale(holder)) {
      throw new UpdaterError(
        'lock_unavailable',
        `Outra atualizacao ja esta em andamento (pid ${holder.pid}, desde ${holder.startedAt}).`,
        { details: [`Remova ${this.lockPath} se o processo nao existir mais.`] }
      );
    }

    fs.rmSync(this.lockPath, { force: true });
    if (!this.tryCreate()) {
      throw new UpdaterError('lock_unavailable', `Nao foi possivel criar o lock ${this.lockPath}.`);
    }
  }

  release(): void {
    if (this.depth === 0) {
      return;
    }
    this.depth -= 1;
    if (this.depth > 0) {
      return;
    }

    const holder = readLockFile(this.lockPath);
    if (holder && holder.pid !== this.pid) {
      return;
    }
    fs.rmSync(this.lockPath, { force: true });
  }

  private tryCreate(): boolean {
    const data: LockData = {
      pid: this.pid,
      startedAt: new Date(this.now()).toISOString()
    };

    try {
      fs.writeFileSync(this.lockPath, JSON.stringify(data, null, 2), { flag: 'wx' });
      this.depth = 1;
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  private isStale(lock: LockData): boolean {
    if (!this.isProcessRunning(lock.pid)) {
      return true;
    }

    const startedAt = Date.parse(lock.startedAt);
    return !Number.isFinite(startedAt) || this.now() - startedAt > this.staleMs;
  }
}

function readLockFile(lockPath: string): LockData | null {
  try {
    const parsed = lockDataSchema.safeParse(JSON.parse(fs.readFileSync(lockPath, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: o processo existe, mas pertence a outro usuario
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && typeof value.code === 'string';
}
