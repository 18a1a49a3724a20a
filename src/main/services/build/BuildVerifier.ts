import fs from 'node:fs';
import path from 'node:path';
import type { BuildOutputLayout, BuildVerificationReport } from '@shared/contracts';
import { firstNonEmptyLine, type CommandRunner } from '@main/services/process/command-runner';

interface BuildVerifierOptions {
  runCommand: CommandRunner;
  workDir: string;
  layout: BuildOutputLayout;
  timeoutMs?: number;
  isExecutable?: (filePath: string) => boolean;
  isFile?: (filePath: string) => boolean;
}

export class BuildVerifier {
  private readonly runCommand: CommandRunner;
  private readonly workDir: string;
  private readonly layout: BuildOutputLayout;
  private readonly timeoutMs: number;
  private readonly isExecutable: (filePath: string) => boolean;
  private readonly isFile: (filePath: string) => boolean;

  constructor(options: BuildVerifierOptions) {
    this.runCommand = options.runCommand;
    this.workDir = options.workDir;
    this.layout = options.layout;
    this.timeoutMs = Number.isFinite(options.timeoutMs) ? Math.max(1, Math.trunc(options.timeoutMs ?? 60_000)) : 60_000;
    this.isExecutable = options.isExecutable ?? isExecutableFile;
    this.isFile = options.isFile ?? isRegularFile;
  }

  async verify(expectedVersion: string): Promise<BuildVerificationReport> {
    const executablePath = this.outputPath(this.layout.executable);
    if (!this.isExecutable(executablePath)) {
      return {
        executableFound: false,
        builtVersion: null,
        versionMatches: false,
        iconPresent: false,
        desktopEntryPresent: false,
        warnings: [`Executavel gerado nao encontrado em ${path.join(this.layout.outLink, this.layout.executable)}`]
      };
    }

    const warnings: string[] = [];
    const builtVersion = await this.readBuiltVersion(executablePath);
    const versionMatches = builtVersion === expectedVersion;
    if (!versionMatches) {
      warnings.push(`Versao divergente: esperado ${expectedVersion}, obtido ${builtVersion}`);
    }

    const iconPresent = this.isFile(this.outputPath(this.layout.icon));
    if (!iconPresent) {
      warnings.push('Icone nao encontrado; o app pode nao aparecer corretamente no desktop');
    }

    const desktopEntryPresent = this.isFile(this.outputPath(this.layout.desktopEntry));
    if (!desktopEntryPresent) {
      warnings.push('Entrada .desktop nao encontrada');
    }

    return {
      executableFound: true,
      builtVersion,
      versionMatches,
      iconPresent,
      desktopEntryPresent,
      warnings
    };
  }

  private async readBuiltVersion(executablePath: string): Promise<string> {
    const result = await this.runCommand(executablePath, ['--version'], {
      cwd: this.workDir,
      timeoutMs: this.timeoutMs
    });
    if (result.exitCode !== 0) {
      return 'unknown';
    }

    return firstNonEmptyLine(result.stdout) || 'unknown';
  }

  private outputPath(relative: string): string {
    return path.join(this.workDir, this.layout.outLink, relative);
  }
}

function isExecutableFile(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
