import type { UpdateOutcome, UpdaterConfig, WorkflowSimulationReport } from '@shared/contracts';
import { BuildVerifier } from '@main/services/build/BuildVerifier';
import { NixFlakeBuilder, type PackageBuilder } from '@main/services/build/PackageBuilder';
import { ConfigStore } from '@main/services/config/ConfigStore';
import type { CommandResolver } from '@main/services/environment/command-resolution';
import { describeError, isUpdaterError } from '@main/services/errors/UpdaterError';
import { NixPrefetchHashFetcher, type HashFetcher } from '@main/services/hash/HashFetcher';
import { ManifestLock } from '@main/services/lock/ManifestLock';
import { Logger, resolveDefaultLogDir } from '@main/services/logging/Logger';
import { ManifestFile } from '@main/services/manifest/ManifestFile';
import { createSpawnCommandRunner, type CommandRunner } from '@main/services/process/command-runner';
import { createReleaseResolver } from '@main/services/release/ReleaseResolver';
import { ManifestUpdateService } from '@main/services/updater/ManifestUpdateService';
import { PromptVersionProvider, type VersionProvider } from '@main/services/version/VersionProvider';
import { WorkflowSimulator } from '@main/services/workflow/WorkflowSimulator';
import { TerminalReporter, type UpdateReporter } from '@main/ui/TerminalReporter';

export type CliCommand = 'update' | 'simulate';

export interface CliOptions {
  workDir: string;
  env?: NodeJS.ProcessEnv;
  reporter?: UpdateReporter;
  fetchImpl?: typeof fetch;
  runCommand?: CommandRunner;
  resolveCommand?: CommandResolver;
  versionProvider?: VersionProvider;
  hashFetcher?: HashFetcher;
  builder?: PackageBuilder;
}

const USAGE = 'Uso: cursor-flake-updater [update|simulate]';

export function parseCliCommand(argv: readonly string[]): CliCommand | null {
  const [first, ...rest] = argv;
  if (rest.length > 0) {
    return null;
  }
  if (first === undefined || first === 'update') {
    return 'update';
  }
  return first === 'simulate' ? 'simulate' : null;
}

export async function runCli(argv: readonly string[], options: CliOptions): Promise<number> {
  const reporter = options.reporter ?? new TerminalReporter();
  const command = parseCliCommand(argv);
  if (!command) {
    reporter.error(USAGE);
    return 1;
  }

  const configStore = new ConfigStore(options.workDir, { env: options.env });
  const config = configStore.get();
  for (const issue of configStore.issues()) {
    reporter.warning(`Configuracao ignorada: ${issue}`);
  }

  const logger = new Logger(config.logDir ?? resolveDefaultLogDir(options.env));
  logger.info('cli.start', { command, workDir: options.workDir, strategy: config.strategy });

  const updater = createUpdateService(config, options, logger, reporter);

  try {
    if (command === 'simulate') {
      const simulator = new WorkflowSimulator({
        manifest: updater.manifest,
        updater: updater.service,
        productName: config.artifact.name,
        sourceUrlPrefix: config.sourceUrlPrefix,
        logger,
        reporter,
        lock: updater.lock
      });
      printSimulationSummary(await simulator.run(), reporter);
      return 0;
    }

    reporter.info('Atualizador do pacote Cursor (flake)');
    printUpdateSummary(await updater.service.run(), reporter);
    return 0;
  } catch (error) {
    if (!isUpdaterError(error)) {
      logger.error('cli.unexpected_error', { reason: describeError(error) });
      reporter.error(`Erro inesperado: ${describeError(error)}`);
      return 1;
    }

    logger.error('cli.failed', { code: error.code, reason: error.message, details: error.details });
    reporter.error(error.message);
    for (const detail of error.details) {
      reporter.detail(detail);
    }
    return 1;
  }
}

function createUpdateService(
  config: UpdaterConfig,
  options: CliOptions,
  logger: Logger,
  reporter: UpdateReporter
): { service: ManifestUpdateService; manifest: ManifestFile; lock: ManifestLock } {
  const runCommand = options.runCommand ?? createSpawnCommandRunner({ env: options.env });
  const manifest = new ManifestFile(options.workDir, config.manifestFile);
  const lock = new ManifestLock(manifest.filePath, { staleMs: config.lockStaleMs });

  const service = new ManifestUpdateService({
    config,
    manifest,
    resolver: createReleaseResolver(config, {
      fetchImpl: options.fetchImpl,
      onEndpointFound: (endpoint) => {
        reporter.info(`URL da API encontrada: ${endpoint}`);
        logger.info('updater.resolve.api_endpoint', { endpoint });
      },
      onRedirect: (from, location) => {
        logger.debug('updater.resolve.redirect', { from, location });
      }
    }),
    versionProvider: options.versionProvider ?? new PromptVersionProvider(),
    hashFetcher: options.hashFetcher ?? new NixPrefetchHashFetcher({ runCommand, workDir: options.workDir }),
    builder:
      options.builder ??
      new NixFlakeBuilder({
        runCommand,
        workDir: options.workDir,
        packageAttr: config.packageAttr,
        outLink: config.build.outLink
      }),
    verifier: new BuildVerifier({ runCommand, workDir: options.workDir, layout: config.build }),
    logger,
    reporter,
    lock,
    resolveCommand: options.resolveCommand
  });

  return { service, manifest, lock };
}

function printUpdateSummary(outcome: UpdateOutcome, reporter: UpdateReporter): void {
  if (outcome.status === 'up-to-date') {
    reporter.info('Nenhuma atualizacao necessaria.');
    return;
  }

  reporter.info('Pacote atualizado com sucesso!');
  reporter.info('Para usar no sistema: reconstrua a configuracao principal do NixOS');
  reporter.success(`Atualizacao concluida: ${outcome.previous.version ?? 'unknown'} -> ${outcome.release.version}`);
}

function printSimulationSummary(report: WorkflowSimulationReport, reporter: UpdateReporter): void {
  reporter.step('Resumo do teste');
  reporter.detail(`Script de atualizacao: ${report.updateSucceeded ? 'sucesso' : 'falhou'}`);
  reporter.detail(`Alteracoes detectadas: ${report.changed ? 'sim' : 'nao'}`);
  reporter.detail('Simulacao do workflow: completa');
  reporter.info('O workflow iria:');
  report.plannedActions.forEach((action, index) => {
    reporter.detail(report.changed ? `${index + 1}. ${action}` : `- ${action}`);
  });
  reporter.success('Teste local concluido! Estado original restaurado.');
}
