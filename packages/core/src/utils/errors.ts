// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ScanError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'ScanError';
  }
}

export class BackupError extends Error {
  constructor(
    message: string,
    public readonly backupPath?: string,
  ) {
    super(message);
    this.name = 'BackupError';
  }
}

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly planId?: string,
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
