import type { CommandRunner } from '@main/services/process/command-runner';

export interface PackageBuildResult {
  ok: boolean;
  exitCode: number | null;
  errorMessage: string | null;
}

export interface PackageBuilder {
  build(): Promise<PackageBuildResult>;
}

interface NixFlakeBuilderOptions {
  runCommand: CommandRunner;
  workDir: string;
  packageAttr: string;
  outLink: string;
}

export class NixFlakeBuilder implements PackageBuilder {
  private readonly runCommand: CommandRunner;
  private readonly workDir: string;
  private readonly packageAttr: string;
  private readonly outLink: string;

  constructor(options: NixFlakeBuilderOptions) {
    this.runCommand = options.runCommand;
    this.workDir = options.workDir;
    this.packageAttr = options.packageAttr;
    this.outLink = options.outLink;
  }

  async build(): Promise<PackageBuildResult> {
    const result = await this.runCommand('nix', ['build', `.#${this.packageAttr}`, '--out-link', this.outLink], {
      cwd: this.workDir,
      inheritOutput: true
    });

    return {
      ok: result.exitCode === 0,
      exitCode: result.exitCode,
      errorMessage: result.exitCode === 0 ? null : result.errorMessage ?? `nix build saiu com codigo ${result.exitCode ?? 'desconhecido'}`
    };
  }
}
