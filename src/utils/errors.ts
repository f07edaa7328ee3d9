export type WalletErrorCode =
  | 'wallet-not-connected'
  | 'no-credential'
  | 'invalid-key'
  | 'sign-rejected';

export class WalletError extends Error {
  readonly code: WalletErrorCode;

  constructor(code: WalletErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'WalletError';
    this.code = code;
  }
}

// Rejected at the interface boundary; never reaches the swap pipeline
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
