import { UpdaterError } from '@main/services/errors/UpdaterError';
import { lastNonEmptyLine, type CommandRunner } from '@main/services/process/command-runner';

export interface HashFetcher {
  fetchHash(url: string): Promise<string>;
}

interface NixPrefetchHashFetcherOptions {
  runCommand: CommandRunner;
  workDir: string;
  command?: string;
  timeoutMs?: number;
}

// the prefetch downloads the whole AppImage
const DEFAULT_PREFETCH_TIMEOUT_MS = 30 * 60 * 1000;

/** Hash in the manifest's native encoding, as printed by `nix-prefetch-url`. */
export class NixPrefetchHashFetcher implements HashFetcher {
  private readonly runCommand: CommandRunner;
  private readonly workDir: string;
  private readonly command: string;
  private readonly timeoutMs: number;

  constructor(options: NixPrefetchHashFetcherOptions) {
    this.runCommand = options.runCommand;
    this.workDir = options.workDir;
    this.command = options.command?.trim() || 'nix-prefetch-url';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PREFETCH_TIMEOUT_MS;
  }

  async fetchHash(url: string): Promise<string> {
    const result = await this.runCommand(this.command, [url], { cwd: this.workDir, timeoutMs: this.timeoutMs });
    const hash = lastNonEmptyLine(result.stdout);

    if (result.exitCode !== 0 || !hash) {
      const reason = result.errorMessage ?? lastNonEmptyLine(result.stderr);
      throw new UpdaterError('hash_fetch_failed', `Falha ao obter o hash de ${url}`, {
        details: reason ? [reason] : []
      });
    }

    return hash;
  }
}
