/**
 * Error Types for agentwire
 *
 * Root of every error the library throws. Codec errors live in
 * protocol/errors.ts and extend AgentwireError as well.
 */

export class AgentwireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentwireError';
  }
}

export class ContextStoreError extends AgentwireError {
  constructor(message: string) {
    super(`Context store error: ${message}`);
    this.name = 'ContextStoreError';
  }
}

export class ContextNotFoundError extends AgentwireError {
  readonly key: string;

  constructor(key: string, expired = false) {
    super(expired ? `Context reference expired: ${key}` : `Context reference not found: ${key}`);
    this.name = 'ContextNotFoundError';
    this.key = key;
  }
}

export class ConfigError extends AgentwireError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid configuration at ${path}: ${reason}`);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * Short label used by the CLI when reporting a failure.
 */
export function errorKind(err: unknown): string {
  if (err instanceof AgentwireError) {
    return 'kind' in err && typeof err.kind === 'string' ? err.kind : err.name;
  }
  return err instanceof Error ? err.name : 'Error';
}
