export type SddRouterErrorCode =
  | 'input_missing'
  | 'input_invalid'
  | 'file_not_found'
  | 'configuration_invalid';

export class SddRouterError extends Error {
  constructor(
    message: string,
    readonly code: SddRouterErrorCode,
  ) {
    super(message);
    this.name = 'SddRouterError';
  }
}

export class InputError extends SddRouterError {
  constructor(message: string, code: 'input_missing' | 'input_invalid' = 'input_missing') {
    super(message, code);
    this.name = 'InputError';
  }
}

export class FileNotFoundError extends SddRouterError {
  constructor(readonly path: string, label = 'File') {
    super(`${label} not found: ${path}`, 'file_not_found');
    this.name = 'FileNotFoundError';
  }
}

/**
 * Raised while loading catalogs or settings. These are defects in shipped or
 * operator-supplied data and surface at startup, never during scoring.
 */
export class ConfigurationError extends SddRouterError {
  constructor(message: string) {
    super(message, 'configuration_invalid');
    this.name = 'ConfigurationError';
  }
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: SddRouterError };

export function isSddRouterError(error: unknown): error is SddRouterError {
  return error instanceof SddRouterError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
