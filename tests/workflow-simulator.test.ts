import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { UpdateOutcome } from '@shared/contracts';
import { UpdaterError } from '@main/services/errors/UpdaterError';
import { ManifestLock } from '@main/services/lock/ManifestLock';
import { Logger } from '@main/services/logging/Logger';
import { ManifestFile } from '@main/services/manifest/ManifestFile';
import { WorkflowSimulator, diffChangedLines } from '@main/services/workflow/WorkflowSimulator';
import { NEW_HASH, OLD_HASH, RecordingReporter, URL_A, URL_B, cleanupTempDirs, createTempDir, readFlakeFixture, writeFlake } from './test-utils';

const UP_TO_DATE: UpdateOutcome = { status: 'up-to-date', version: '2.0.30', url: URL_A };

function createSimulator(run: (manifest: ManifestFile) => Promise<UpdateOutcome>) {
  const workDir = createTempDir();
  const flakePath = writeFlake(workDir);
  const manifest = new ManifestFile(workDir, 'flake.nix');
  const lock = new ManifestLock(flakePath, { staleMs: 30 * 60 * 1000 });
  const reporter = new RecordingReporter();
  const updater = {
    preflight: vi.fn(() => undefined),
    run: vi.fn(async (_options?: { skipPreflight?: boolean }) => run(manifest))
  };
  const simulator = new WorkflowSimulator({
    manifest,
    updater,
    productName: 'Cursor',
    sourceUrlPrefix: 'https://downloads.cursor.com/',
    logger: new Logger(createTempDir('cursor-updater-logs-')),
    reporter,
    lock
  });
  return { flakePath, simulator, updater, reporter, lock };
}

function bumpManifest(manifest: ManifestFile): void {
  manifest.writeText(
    manifest
      .readText()
      .replace('version = "2.0.30";', 'version = "2.0.34";')
      .split(URL_A)
      .join(URL_B)
      .replace(OLD_HASH, NEW_HASH)
  );
}

describe('WorkflowSimulator', () => {
  afterEach(() => {
    cleanupTempDirs();
  });

  it('relata as acoes do workflow e restaura o manifesto apos uma atualizacao', async () => {
    const { flakePath, simulator, updater } = createSimulator(async (manifest) => {
      bumpManifest(manifest);
      return UP_TO_DATE;
    });

    const report = await simulator.run();

    expect(updater.preflight).toHaveBeenCalledTimes(1);
    expect(updater.run).toHaveBeenCalledWith({ skipPreflight: true });
    expect(report).toMatchObject({
      updateSucceeded: true,
      updateError: null,
      changed: true,
      originalVersion: '2.0.30',
      newVersion: '2.0.34',
      restored: true
    });
    expect(report.plannedActions).toEqual([
      'Atualizar flake.nix',
      "Commit com a mensagem: 'chore: update Cursor to version 2.0.34'",
      'Push para o GitHub',
      'Criar release: v2.0.34'
    ]);
    expect(report.diff).toContain('-        version = "2.0.30";');
    expect(report.diff).toContain('+        version = "2.0.34";');
    expect(fs.readFileSync(flakePath, 'utf-8')).toBe(readFlakeFixture());
  });

  it('informa que nada seria feito quando nao ha alteracoes', async () => {
    const { simulator, reporter } = createSimulator(async () => UP_TO_DATE);

    const report = await simulator.run();

    expect(report).toMatchObject({ changed: false, newVersion: '2.0.30', diff: [] });
    expect(report.plannedActions).toEqual(['Nada a fazer (nenhuma alteracao necessaria)']);
    expect(reporter.lines).toContain('success: Sem alteracoes (ja esta na versao mais recente)');
  });

  it('registra a falha da atualizacao e ainda restaura o manifesto', async () => {
    const { flakePath, simulator } = createSimulator(async (manifest) => {
      manifest.writeText('parcial');
      throw new UpdaterError('hash_fetch_failed', `Falha ao obter o hash de ${URL_B}`);
    });

    const report = await simulator.run();

    expect(report.updateSucceeded).toBe(false);
    expect(report.updateError).toBe(`Falha ao obter o hash de ${URL_B}`);
    expect(report.changed).toBe(true);
    expect(report.newVersion).toBeNull();
    expect(report.plannedActions).toEqual(['Nada a fazer (nenhuma alteracao necessaria)']);
    expect(fs.readFileSync(flakePath, 'utf-8')).toBe(readFlakeFixture());
  });

  it('restaura o manifesto e propaga erros inesperados', async () => {
    const { flakePath, simulator } = createSimulator(async (manifest) => {
      manifest.writeText('quebrado');
      throw new TypeError('falha interna');
    });

    await expect(simulator.run()).rejects.toThrowError('falha interna');
    expect(fs.readFileSync(flakePath, 'utf-8')).toBe(readFlakeFixture());
  });

  it('nao toca no manifesto quando o preflight falha', async () => {
    const { simulator, updater } = createSimulator(async () => UP_TO_DATE);
    updater.preflight.mockImplementation(() => {
      throw new UpdaterError('dependency_missing', 'Ferramentas necessarias nao instaladas.');
    });

    await expect(simulator.run()).rejects.toMatchObject({ code: 'dependency_missing' });
    expect(updater.run).not.toHaveBeenCalled();
  });

  it('segura o lock do manifesto durante a atualizacao e libera ao fim', async () => {
    const observed = { held: false, onDisk: false };
    const { flakePath, simulator, lock } = createSimulator(async (manifest) => {
      observed.held = lock.isHeld();
      observed.onDisk = fs.existsSync(path.join(path.dirname(flakePath), '.flake.nix.lock'));
      bumpManifest(manifest);
      return UP_TO_DATE;
    });

    await simulator.run();

    expect(observed).toEqual({ held: true, onDisk: true });
    expect(lock.isHeld()).toBe(false);
    expect(fs.existsSync(lock.lockPath)).toBe(false);
  });

  it('nao sobrescreve a escrita de outra execucao que detem o lock', async () => {
    const { flakePath, simulator, updater, lock } = createSimulator(async () => UP_TO_DATE);
    fs.writeFileSync(lock.lockPath, JSON.stringify({ pid: process.pid, startedAt: new Date().toISOString() }));
    const otherRunText = readFlakeFixture().replace('version = "2.0.30";', 'version = "9.9.9";');
    fs.writeFileSync(flakePath, otherRunText);

    await expect(simulator.run()).rejects.toMatchObject({ code: 'lock_unavailable' });
    expect(updater.run).not.toHaveBeenCalled();
    expect(fs.readFileSync(flakePath, 'utf-8')).toBe(otherRunText);
    expect(fs.existsSync(lock.lockPath)).toBe(true);
  });
});

describe('diffChangedLines', () => {
  it('pareia linhas alteradas por posicao', () => {
    expect(diffChangedLines('a\nb\nc', 'a\nB\nc\nd')).toEqual(['-b', '+B', '+d']);
  });

  it('limita a quantidade de linhas', () => {
    expect(diffChangedLines('1\n2\n3', 'x\ny\nz', 3)).toEqual(['-1', '+x', '-2']);
  });
});
