import type { WorkflowSimulationReport } from '@shared/contracts';
import { isUpdaterError } from '@main/services/errors/UpdaterError';
import type { ManifestLock } from '@main/services/lock/ManifestLock';
import type { Logger } from '@main/services/logging/Logger';
import type { ManifestFile } from '@main/services/manifest/ManifestFile';
import { readManifestFields } from '@main/services/manifest/manifest-text';
import type { ManifestUpdateService } from '@main/services/updater/ManifestUpdateService';
import type { UpdateReporter } from '@main/ui/TerminalReporter';

const MAX_DIFF_LINES = 50;

interface WorkflowSimulatorDeps {
  manifest: ManifestFile;
  updater: Pick<ManifestUpdateService, 'preflight' | 'run'>;
  productName: string;
  sourceUrlPrefix: string;
  logger: Logger;
  reporter: UpdateReporter;
  lock?: ManifestLock;
}

/**
 * Runs the update the way the scheduled CI job does, reports what would be
 * committed and released, then puts the manifest back as it was.
 */
export class WorkflowSimulator {
  constructor(private readonly deps: WorkflowSimulatorDeps) {}

  async run(): Promise<WorkflowSimulationReport> {
    const { updater, lock, reporter } = this.deps;

    reporter.step('Verificando repositorio e dependencias...');
    updater.preflight();

    // held from snapshot through restore; the update reuses it
    lock?.acquire();
    try {
      return await this.simulateLocked();
    } finally {
      lock?.release();
    }
  }

  private async simulateLocked(): Promise<WorkflowSimulationReport> {
    const { manifest, updater, logger, reporter } = this.deps;

    reporter.step(`Salvando estado atual de ${manifest.fileName}...`);
    const snapshot = manifest.snapshot();
    const originalText = snapshot.bytes.toString('utf-8');
    const originalVersion = readManifestFields(originalText, this.deps.sourceUrlPrefix).version;
    reporter.success(`Backup feito (versao atual: ${originalVersion ?? 'unknown'})`);
    logger.info('workflow.simulation.start', { manifestPath: manifest.filePath, originalVersion });

    let updateSucceeded = true;
    let updateError: string | null = null;
    let changed = false;
    let newVersion: string | null = originalVersion;
    let diff: string[] = [];

    try {
      reporter.step('Executando atualizacao...');
      try {
        await updater.run({ skipPreflight: true });
      } catch (error) {
        if (!isUpdaterError(error)) {
          throw error;
        }
        updateSucceeded = false;
        updateError = error.message;
        reporter.error(error.message);
        logger.warn('workflow.simulation.update_failed', { code: error.code, reason: error.message });
      }

      reporter.step('Verificando alteracoes...');
      changed = !manifest.matches(snapshot);
      if (changed) {
        const currentText = manifest.readText();
        newVersion = readManifestFields(currentText, this.deps.sourceUrlPrefix).version;
        diff = diffChangedLines(originalText, currentText);
        reporter.success(`Alteracoes detectadas! Versao: ${originalVersion ?? 'unknown'} -> ${newVersion ?? 'unknown'}`);
        reporter.step('Alteracoes que seriam commitadas:');
        for (const line of diff) {
          reporter.detail(line);
        }
      } else {
        reporter.success('Sem alteracoes (ja esta na versao mais recente)');
      }
    } finally {
      reporter.step(`Restaurando ${manifest.fileName} original...`);
      manifest.restore(snapshot);
      reporter.success('Estado original restaurado');
    }

    const report: WorkflowSimulationReport = {
      updateSucceeded,
      updateError,
      changed,
      originalVersion,
      newVersion,
      diff,
      plannedActions: this.planActions(changed, newVersion),
      restored: true
    };
    logger.info('workflow.simulation.finish', {
      updateSucceeded,
      changed,
      originalVersion,
      newVersion
    });
    return report;
  }

  private planActions(changed: boolean, version: string | null): string[] {
    if (!changed || !version) {
      return ['Nada a fazer (nenhuma alteracao necessaria)'];
    }

    return [
      `Atualizar ${this.deps.manifest.fileName}`,
      `Commit com a mensagem: 'chore: update ${this.deps.productName} to version ${version}'`,
      'Push para o GitHub',
      `Criar release: v${version}`
    ];
  }
}

export function diffChangedLines(before: string, after: string, maxLines = MAX_DIFF_LINES): string[] {
  const left = before.split('\n');
  const right = after.split('\n');
  const lines: string[] = [];
  const total = Math.max(left.length, right.length);

  for (let i = 0; i < total && lines.length < maxLines; i += 1) {
    const a = left[i];
    const b = right[i];
    if (a === b) {
      continue;
    }
    if (a !== undefined) {
      lines.push(`-${a}`);
    }
    if (b !== undefined && lines.length < maxLines) {
      lines.push(`+${b}`);
    }
  }

  return lines;
}
