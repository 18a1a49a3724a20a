import { describe, expect, it, vi } from 'vitest';
import { NixPrefetchHashFetcher } from '@main/services/hash/HashFetcher';
import type { CommandRunOptions, CommandRunResult } from '@main/services/process/command-runner';
import { URL_B } from './test-utils';

function runnerReturning(result: Partial<CommandRunResult>) {
  return vi.fn(async (_command: string, _args: string[], _options: CommandRunOptions): Promise<CommandRunResult> => ({
    exitCode: 0,
    stdout: '',
    stderr: '',
    errorMessage: null,
    ...result
  }));
}

describe('NixPrefetchHashFetcher', () => {
  it('retorna a ultima linha nao vazia do stdout do nix-prefetch-url', async () => {
    const runCommand = runnerReturning({
      stdout: '0abc123hash\n\n',
      stderr: "path is '/nix/store/xyz-Cursor-2.0.34-x86_64.AppImage'\n"
    });
    const fetcher = new NixPrefetchHashFetcher({ runCommand, workDir: '/tmp/flake' });

    await expect(fetcher.fetchHash(URL_B)).resolves.toBe('0abc123hash');
    expect(runCommand).toHaveBeenCalledWith('nix-prefetch-url', [URL_B], { cwd: '/tmp/flake', timeoutMs: 1_800_000 });
  });

  it('repassa o tempo limite configurado ao comando', async () => {
    const runCommand = runnerReturning({ stdout: '0abc123hash\n' });
    const fetcher = new NixPrefetchHashFetcher({ runCommand, workDir: '/tmp/flake', timeoutMs: 90_000 });

    await fetcher.fetchHash(URL_B);

    expect(runCommand.mock.calls[0]?.[2]).toEqual({ cwd: '/tmp/flake', timeoutMs: 90_000 });
  });

  it('falha com hash_fetch_failed quando o download excede o tempo limite', async () => {
    const fetcher = new NixPrefetchHashFetcher({
      runCommand: runnerReturning({ exitCode: null, errorMessage: 'tempo limite de 90000 ms excedido' }),
      workDir: '/tmp/flake',
      timeoutMs: 90_000
    });

    await expect(fetcher.fetchHash(URL_B)).rejects.toMatchObject({
      code: 'hash_fetch_failed',
      details: ['tempo limite de 90000 ms excedido']
    });
  });

  it('falha com hash_fetch_failed quando o comando sai com erro', async () => {
    const fetcher = new NixPrefetchHashFetcher({
      runCommand: runnerReturning({ exitCode: 1, stderr: 'error: unable to download\n' }),
      workDir: '/tmp/flake'
    });

    await expect(fetcher.fetchHash(URL_B)).rejects.toMatchObject({
      code: 'hash_fetch_failed',
      details: ['error: unable to download']
    });
  });

  it('falha com hash_fetch_failed quando o stdout vem vazio', async () => {
    const fetcher = new NixPrefetchHashFetcher({
      runCommand: runnerReturning({ stdout: '  \n' }),
      workDir: '/tmp/flake'
    });

    await expect(fetcher.fetchHash(URL_B)).rejects.toMatchObject({
      code: 'hash_fetch_failed',
      message: `Falha ao obter o hash de ${URL_B}`
    });
  });

  it('usa a mensagem de erro do spawn quando o binario nao existe', async () => {
    const fetcher = new NixPrefetchHashFetcher({
      runCommand: runnerReturning({ exitCode: null, errorMessage: 'spawn nix-prefetch-url ENOENT' }),
      workDir: '/tmp/flake'
    });

    await expect(fetcher.fetchHash(URL_B)).rejects.toMatchObject({
      details: ['spawn nix-prefetch-url ENOENT']
    });
  });
});
