import type { UpdaterErrorCode } from '@shared/contracts';

interface UpdaterErrorOptions {
  cause?: unknown;
  details?: string[];
}

export class UpdaterError extends Error {
  readonly code: UpdaterErrorCode;
  readonly details: string[];

  constructor(code: UpdaterErrorCode, message: string, options?: UpdaterErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UpdaterError';
    this.code = code;
    this.details = options?.details ? options.details.slice() : [];
  }
}

export function isUpdaterError(value: unknown): value is UpdaterError {
  return value instanceof UpdaterError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
