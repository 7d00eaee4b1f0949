/**
 * Error taxonomy for the migration engine
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Network or HTTP failure from a tracker call. The record is marked failed
 * and the run continues; nothing retries it within the same run.
 */
export class TransientAPIError extends Error {
  constructor(
    message: string,
    public readonly service: 'megaplan' | 'openproject',
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'TransientAPIError';
  }
}

export type TranslatedField = 'status' | 'type' | 'user';

export class UnmappableFieldError extends Error {
  constructor(
    public readonly field: TranslatedField,
    public readonly value: string,
    public readonly sourceTaskId: string,
  ) {
    super(`Task ${sourceTaskId}: no ${field} mapping for "${value}" and no default configured`);
    this.name = 'UnmappableFieldError';
  }
}

export class HierarchyCycleError extends Error {
  constructor(public readonly chain: string[]) {
    super(`Parent cycle detected: ${[...chain, chain[0]].join(' -> ')}`);
    this.name = 'HierarchyCycleError';
  }
}

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
