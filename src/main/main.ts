#!/usr/bin/env node
import { runCli } from '@main/cli';

async function bootstrap(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2), { workDir: process.cwd() });
  process.exitCode = exitCode;
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
