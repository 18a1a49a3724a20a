import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { BuildVerifier } from '@main/services/build/BuildVerifier';
import { NixFlakeBuilder } from '@main/services/build/PackageBuilder';
import { defaultUpdaterConfig } from '@main/services/config/ConfigStore';
import type { CommandRunOptions, CommandRunResult } from '@main/services/process/command-runner';

const WORK_DIR = '/tmp/cursor-flake';
const LAYOUT = defaultUpdaterConfig().build;

function runner(result: Partial<CommandRunResult>) {
  return vi.fn(async (_command: string, _args: string[], _options: CommandRunOptions): Promise<CommandRunResult> => ({
    exitCode: 0,
    stdout: '',
    stderr: '',
    errorMessage: null,
    ...result
  }));
}

describe('NixFlakeBuilder', () => {
  it('executa nix build no atributo configurado com a saida no terminal', async () => {
    const runCommand = runner({ exitCode: 0 });
    const builder = new NixFlakeBuilder({ runCommand, workDir: WORK_DIR, packageAttr: 'cursor', outLink: 'result' });

    await expect(builder.build()).resolves.toEqual({ ok: true, exitCode: 0, errorMessage: null });
    expect(runCommand).toHaveBeenCalledWith('nix', ['build', '.#cursor', '--out-link', 'result'], {
      cwd: WORK_DIR,
      inheritOutput: true
    });
  });

  it('reporta falha com o codigo de saida', async () => {
    const builder = new NixFlakeBuilder({
      runCommand: runner({ exitCode: 1 }),
      workDir: WORK_DIR,
      packageAttr: 'cursor',
      outLink: 'result'
    });

    await expect(builder.build()).resolves.toEqual({
      ok: false,
      exitCode: 1,
      errorMessage: 'nix build saiu com codigo 1'
    });
  });
});

describe('BuildVerifier', () => {
  it('confirma versao, icone e entrada desktop do pacote gerado', async () => {
    const runCommand = runner({ stdout: '2.0.34\n1f2e3d4c\nx64\n' });
    const verifier = new BuildVerifier({
      runCommand,
      workDir: WORK_DIR,
      layout: LAYOUT,
      isExecutable: () => true,
      isFile: () => true
    });

    await expect(verifier.verify('2.0.34')).resolves.toEqual({
      executableFound: true,
      builtVersion: '2.0.34',
      versionMatches: true,
      iconPresent: true,
      desktopEntryPresent: true,
      warnings: []
    });
    expect(runCommand).toHaveBeenCalledWith(path.join(WORK_DIR, 'result', 'bin', 'cursor'), ['--version'], {
      cwd: WORK_DIR,
      timeoutMs: 60_000
    });
  });

  it('registra warnings nao fatais para versao divergente e recursos ausentes', async () => {
    const verifier = new BuildVerifier({
      runCommand: runner({ stdout: '2.0.33\n' }),
      workDir: WORK_DIR,
      layout: LAYOUT,
      isExecutable: () => true,
      isFile: () => false
    });

    const report = await verifier.verify('2.0.34');

    expect(report.versionMatches).toBe(false);
    expect(report.warnings).toEqual([
      'Versao divergente: esperado 2.0.34, obtido 2.0.33',
      'Icone nao encontrado; o app pode nao aparecer corretamente no desktop',
      'Entrada .desktop nao encontrada'
    ]);
  });

  it('usa unknown quando o executavel falha ao informar a versao', async () => {
    const verifier = new BuildVerifier({
      runCommand: runner({ exitCode: 1, stdout: 'crash' }),
      workDir: WORK_DIR,
      layout: LAYOUT,
      isExecutable: () => true,
      isFile: (filePath) => filePath.endsWith('cursor.png')
    });

    const report = await verifier.verify('2.0.34');

    expect(report.builtVersion).toBe('unknown');
    expect(report.iconPresent).toBe(true);
    expect(report.desktopEntryPresent).toBe(false);
  });

  it('pula as verificacoes quando o executavel nao existe', async () => {
    const runCommand = runner({});
    const verifier = new BuildVerifier({
      runCommand,
      workDir: WORK_DIR,
      layout: LAYOUT,
      isExecutable: () => false,
      isFile: () => true
    });

    const report = await verifier.verify('2.0.34');

    expect(report.executableFound).toBe(false);
    expect(report.warnings).toEqual([`Executavel gerado nao encontrado em ${path.join('result', 'bin/cursor')}`]);
    expect(runCommand).not.toHaveBeenCalled();
  });
});
