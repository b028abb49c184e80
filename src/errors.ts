import type { StorageKind } from './types.js';

export class UnsupportedLanguageError extends Error {
  constructor(public readonly language: string) {
    super(`Unsupported language: ${language}`);
    this.name = 'UnsupportedLanguageError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class PersistenceError extends Error {
  constructor(
    public readonly adapterKind: StorageKind,
    public readonly cause: unknown,
  ) {
    super(`${adapterKind} persistence failed: ${describeError(cause)}`);
    this.name = 'PersistenceError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
