import type { ManifestFields, ReleaseDescriptor, UpdateOutcome, UpdaterConfig } from '@shared/contracts';
import type { BuildVerifier } from '@main/services/build/BuildVerifier';
import type { PackageBuildResult, PackageBuilder } from '@main/services/build/PackageBuilder';
import { findMissingCommands, type CommandResolver } from '@main/services/environment/command-resolution';
import { UpdaterError, describeError, isUpdaterError } from '@main/services/errors/UpdaterError';
import type { HashFetcher } from '@main/services/hash/HashFetcher';
import type { ManifestLock } from '@main/services/lock/ManifestLock';
import type { Logger } from '@main/services/logging/Logger';
import type { ManifestFile } from '@main/services/manifest/ManifestFile';
import { applyReleaseToManifest, readManifestFields } from '@main/services/manifest/manifest-text';
import { extractVersionFromUrl } from '@main/services/release/artifact-version';
import type { ReleaseResolver } from '@main/services/release/ReleaseResolver';
import type { VersionProvider } from '@main/services/version/VersionProvider';
import type { UpdateReporter } from '@main/ui/TerminalReporter';

export interface ManifestUpdateServiceDeps {
  config: Pick<UpdaterConfig, 'sourceUrlPrefix' | 'artifact' | 'requiredCommands' | 'downloadPageUrl'>;
  manifest: ManifestFile;
  resolver: ReleaseResolver;
  versionProvider: VersionProvider;
  hashFetcher: HashFetcher;
  builder: PackageBuilder;
  verifier: BuildVerifier;
  logger: Logger;
  reporter: UpdateReporter;
  lock?: ManifestLock;
  resolveCommand?: CommandResolver;
}

export class ManifestUpdateService {
  constructor(private readonly deps: ManifestUpdateServiceDeps) {}

  preflight(): void {
    const { manifest, config, logger, reporter } = this.deps;

    if (!manifest.exists()) {
      logger.error('updater.preflight.wrong_directory', { manifestPath: manifest.filePath });
      throw new UpdaterError(
        'wrong_directory',
        `Manifesto ${manifest.fileName} nao encontrado. Execute a partir do diretorio do flake.`
      );
    }

    reporter.info('Verificando ferramentas necessarias...');
    const missing = findMissingCommands(config.requiredCommands, this.deps.resolveCommand);
    if (missing.length > 0) {
      logger.error('updater.preflight.dependency_missing', { missing });
      throw new UpdaterError('dependency_missing', 'Ferramentas necessarias nao instaladas.', {
        details: missing.map((tool) => `Ausente: ${tool}`)
      });
    }
    reporter.success('Todas as ferramentas necessarias encontradas.');
  }

  async run(options?: { skipPreflight?: boolean }): Promise<UpdateOutcome> {
    if (!options?.skipPreflight) {
      this.preflight();
    }

    const { lock } = this.deps;
    lock?.acquire();
    try {
      return await this.runLocked();
    } finally {
      lock?.release();
    }
  }

  private async runLocked(): Promise<UpdateOutcome> {
    const { manifest, config, resolver, logger, reporter } = this.deps;

    const current = readManifestFields(manifest.readText(), config.sourceUrlPrefix);
    reporter.info(`Versao atual: ${current.version ?? 'unknown'}`);
    reporter.info(`URL atual: ${current.sourceUrl ?? ''}`);
    logger.info('updater.manifest.read', { manifestPath: manifest.filePath, ...current });

    reporter.info(`Buscando URL mais recente do AppImage em ${config.downloadPageUrl}...`);
    logger.info('updater.resolve.start', { strategy: resolver.kind });
    const latestUrl = await this.resolveLatestUrl();
    reporter.success(`URL mais recente: ${latestUrl}`);
    logger.info('updater.resolve.finish', { strategy: resolver.kind, url: latestUrl });

    if (latestUrl === current.sourceUrl) {
      reporter.success(`Voce ja esta na versao mais recente (${current.version ?? 'unknown'}).`);
      logger.info('updater.finish', { outcome: 'up-to-date', version: current.version });
      return {
        status: 'up-to-date',
        version: current.version,
        url: latestUrl
      };
    }

    const version = await this.resolveVersion(latestUrl);
    reporter.info(`Nova versao: ${version}`);

    reporter.info('Obtendo hash SHA256...');
    const hash = await this.fetchHash(latestUrl);
    reporter.success(`Hash SHA256: ${hash}`);

    const release: ReleaseDescriptor = { version, url: latestUrl, hash };
    return this.writeAndVerify(current, release);
  }

  private async resolveLatestUrl(): Promise<string> {
    const { resolver, logger } = this.deps;
    try {
      const url = (await resolver.resolveLatestUrl()).trim();
      if (!url) {
        throw new UpdaterError('resolution_failed', 'URL mais recente nao encontrada.');
      }
      return url;
    } catch (error) {
      const failure = isUpdaterError(error)
        ? error
        : new UpdaterError('resolution_failed', `URL mais recente nao encontrada: ${describeError(error)}`, { cause: error });
      logger.error('updater.resolve.error', { strategy: resolver.kind, reason: failure.message });
      throw failure;
    }
  }

  private async resolveVersion(url: string): Promise<string> {
    const { config, versionProvider, logger, reporter } = this.deps;

    const extracted = extractVersionFromUrl(url, config.artifact);
    if (extracted) {
      return extracted;
    }

    reporter.warning('Nao foi possivel determinar a nova versao a partir da URL.');
    reporter.warning('O formato do nome do arquivo pode ter mudado.');
    logger.warn('updater.version.extract_failed', { url });

    const provided = (await versionProvider.requestVersion({ url })).trim();
    if (!provided) {
      logger.error('updater.version.unresolved', { url });
      throw new UpdaterError('version_unresolved', 'O numero da versao e obrigatorio.');
    }

    logger.info('updater.version.provided', { url, version: provided });
    return provided;
  }

  private async fetchHash(url: string): Promise<string> {
    const { hashFetcher, logger } = this.deps;
    try {
      const hash = (await hashFetcher.fetchHash(url)).trim();
      if (!hash) {
        throw new UpdaterError('hash_fetch_failed', `Falha ao obter o hash de ${url}`);
      }
      logger.info('updater.hash.finish', { url, hash });
      return hash;
    } catch (error) {
      const failure = isUpdaterError(error)
        ? error
        : new UpdaterError('hash_fetch_failed', `Falha ao obter o hash de ${url}: ${describeError(error)}`, { cause: error });
      logger.error('updater.hash.error', { url, reason: failure.message, details: failure.details });
      throw failure;
    }
  }

  private async writeAndVerify(current: ManifestFields, release: ReleaseDescriptor): Promise<UpdateOutcome> {
    const { manifest, builder, verifier, logger, reporter } = this.deps;

    reporter.info(`Atualizando ${manifest.fileName}...`);
    const snapshot = manifest.snapshot();
    const rewrite = applyReleaseToManifest(snapshot.bytes.toString('utf-8'), current, release);
    for (const warning of rewrite.warnings) {
      reporter.warning(warning);
    }
    manifest.writeText(rewrite.text);
    logger.info('updater.manifest.written', {
      manifestPath: manifest.filePath,
      version: release.version,
      versionReplaced: rewrite.versionReplaced,
      urlOccurrences: rewrite.urlOccurrences,
      hashReplaced: rewrite.hashReplaced
    });
    reporter.success(`${manifest.fileName} atualizado (versao, URL e hash).`);

    reporter.info('Testando build...');
    logger.info('updater.build.start', { version: release.version });
    let build: PackageBuildResult;
    try {
      build = await builder.build();
    } catch (error) {
      build = { ok: false, exitCode: null, errorMessage: describeError(error) };
    }
    if (!build.ok) {
      manifest.restore(snapshot);
      logger.error('updater.build.error', {
        version: release.version,
        exitCode: build.exitCode,
        reason: build.errorMessage
      });
      reporter.error('Build falhou!');
      reporter.info(`Alteracoes em ${manifest.fileName} revertidas.`);
      throw new UpdaterError('build_failed', `Build falhou; ${manifest.fileName} foi revertido.`, {
        details: build.errorMessage ? [build.errorMessage] : []
      });
    }
    reporter.success('Build concluido!');

    const verification = await verifier.verify(release.version);
    if (verification.builtVersion !== null) {
      reporter.info(`Versao gerada: ${verification.builtVersion}`);
    }
    if (verification.versionMatches) {
      reporter.success('Verificacao de versao aprovada!');
    }
    for (const warning of verification.warnings) {
      reporter.warning(warning);
    }

    const warnings = [...rewrite.warnings, ...verification.warnings];
    logger.info('updater.finish', {
      outcome: 'updated',
      version: release.version,
      previousVersion: current.version,
      warnings
    });

    return {
      status: 'updated',
      previous: current,
      release,
      verification,
      warnings
    };
  }
}
