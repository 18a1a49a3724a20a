import { describe, expect, it, vi } from 'vitest';
import { PromptVersionProvider, StaticVersionProvider } from '@main/services/version/VersionProvider';

const URL = 'https://downloads.cursor.com/production/cccc3333/linux/x64/cursor-latest.AppImage';

describe('StaticVersionProvider', () => {
  it('devolve o valor sem espacos', async () => {
    await expect(new StaticVersionProvider(' 2.1.0\n').requestVersion({ url: URL })).resolves.toBe('2.1.0');
  });
});

describe('PromptVersionProvider', () => {
  it('pergunta ao usuario em terminal interativo', async () => {
    const prompt = vi.fn(async (_message: string): Promise<string | symbol> => ' 2.1.0 ');
    const provider = new PromptVersionProvider({ isInteractive: () => true, prompt });

    await expect(provider.requestVersion({ url: URL })).resolves.toBe('2.1.0');
    expect(prompt).toHaveBeenCalledWith(`Informe a nova versao para ${URL}`);
  });

  it('nao pergunta fora de um terminal', async () => {
    const prompt = vi.fn(async (_message: string): Promise<string | symbol> => '2.1.0');
    const provider = new PromptVersionProvider({ isInteractive: () => false, prompt });

    await expect(provider.requestVersion({ url: URL })).resolves.toBe('');
    expect(prompt).not.toHaveBeenCalled();
  });

  it('trata cancelamento como resposta vazia', async () => {
    const provider = new PromptVersionProvider({
      isInteractive: () => true,
      prompt: async () => Symbol('clack:cancel')
    });

    await expect(provider.requestVersion({ url: URL })).resolves.toBe('');
  });
});
