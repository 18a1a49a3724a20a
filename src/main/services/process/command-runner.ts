import { spawn, type ChildProcess, type SpawnOptions, type StdioOptions } from 'node:child_process';
import { buildCommandEnvironment } from '@main/services/environment/command-resolution';

export interface CommandRunOptions {
  cwd: string;
  timeoutMs?: number;
  inheritOutput?: boolean;
}

export interface CommandRunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  errorMessage: string | null;
}

export type CommandRunner = (command: string, args: string[], options: CommandRunOptions) => Promise<CommandRunResult>;

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

interface SpawnCommandRunnerOptions {
  spawnFn?: SpawnFn;
  env?: NodeJS.ProcessEnv;
}

export function createSpawnCommandRunner(options?: SpawnCommandRunnerOptions): CommandRunner {
  const spawnFn: SpawnFn = options?.spawnFn ?? spawn;
  const env = buildCommandEnvironment(options?.env ?? process.env);

  return (command, args, runOptions) =>
    new Promise<CommandRunResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | null = null;

      const finish = (result: Omit<CommandRunResult, 'stdout' | 'stderr'>): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        resolve({ ...result, stdout, stderr });
      };

      const stdio: StdioOptions = runOptions.inheritOutput ? 'inherit' : ['ignore', 'pipe', 'pipe'];
      let child: ChildProcess;
      try {
        child = spawnFn(command, args, {
          cwd: runOptions.cwd,
          env,
          stdio
        });
      } catch (error) {
        finish({ exitCode: null, errorMessage: error instanceof Error ? error.message : String(error) });
        return;
      }

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.once('error', (error) => {
        finish({ exitCode: null, errorMessage: error.message });
      });
      child.once('close', (code, signal) => {
        finish({
          exitCode: code,
          errorMessage: code === null ? `processo encerrado por sinal ${signal ?? 'desconhecido'}` : null
        });
      });

      if (typeof runOptions.timeoutMs === 'number' && runOptions.timeoutMs > 0) {
        const timeoutMs = runOptions.timeoutMs;
        timer = setTimeout(() => {
          child.kill('SIGTERM');
          finish({ exitCode: null, errorMessage: `tempo limite de ${timeoutMs} ms excedido` });
        }, timeoutMs);
      }
    });
}

export function lastNonEmptyLine(output: string): string {
  const lines = output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  return lines[lines.length - 1] ?? '';
}

export function firstNonEmptyLine(output: string): string {
  return (
    output
      .split('\n')
      .map((line) => line.trim())
      .find(Boolean) ?? ''
  );
}
