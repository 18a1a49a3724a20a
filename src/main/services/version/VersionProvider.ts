import { isCancel, text } from '@clack/prompts';

export interface VersionRequest {
  url: string;
}

export interface VersionProvider {
  requestVersion(request: VersionRequest): Promise<string>;
}

export class StaticVersionProvider implements VersionProvider {
  constructor(private readonly value: string) {}

  async requestVersion(_request: VersionRequest): Promise<string> {
    return this.value.trim();
  }
}

type PromptFn = (message: string) => Promise<string | symbol>;

interface PromptVersionProviderOptions {
  isInteractive?: () => boolean;
  prompt?: PromptFn;
}

export class PromptVersionProvider implements VersionProvider {
  private readonly isInteractive: () => boolean;
  private readonly prompt: PromptFn;

  constructor(options?: PromptVersionProviderOptions) {
    this.isInteractive = options?.isInteractive ?? (() => process.stdin.isTTY === true);
    this.prompt = options?.prompt ?? ((message) => text({ message, placeholder: '2.0.34' }));
  }

  async requestVersion(request: VersionRequest): Promise<string> {
    if (!this.isInteractive()) {
      return '';
    }

    const answer = await this.prompt(`Informe a nova versao para ${request.url}`);
    if (isCancel(answer) || typeof answer !== 'string') {
      return '';
    }

    return answer.trim();
  }
}
