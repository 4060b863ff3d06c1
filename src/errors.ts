export class RecoverableParseError extends Error {
  constructor(
    message: string,
    readonly rawValue: string
  ) {
    super(message);
    this.name = 'RecoverableParseError';
  }
}

export class ConflictingGeotagError extends Error {
  constructor(
    readonly filePath: string,
    readonly position: string,
    readonly discrete: string
  ) {
    super(`GPS position ${position} disagrees with discrete GPS fields ${discrete} in ${filePath}`);
    this.name = 'ConflictingGeotagError';
  }
}

export class LedgerWriteFailure extends Error {
  constructor(
    readonly filePath: string,
    readonly failure: unknown
  ) {
    super(`Failed to write ${filePath}: ${describeError(failure)}`);
    this.name = 'LedgerWriteFailure';
  }
}

export class LedgerCorruptError extends Error {
  constructor(
    readonly filePath: string,
    readonly failure: unknown
  ) {
    super(`Ledger ${filePath} is unreadable: ${describeError(failure)}`);
    this.name = 'LedgerCorruptError';
  }
}

export class MissingToolError extends Error {
  constructor(
    readonly tool: string,
    readonly executable: string
  ) {
    super(`${tool} is required but "${executable}" could not be run. Install it or set tools.${tool} in config.json.`);
    this.name = 'MissingToolError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
