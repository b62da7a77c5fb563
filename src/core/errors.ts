/** Base class for failures that end a command with a message and an exit code. */
export class FleetError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export type ConfigErrorKind =
  | 'not-found'
  | 'invalid-format'
  | 'invalid-id'
  | 'invalid-url'
  | 'invalid-ref'
  | 'duplicate-id'
  | 'invalid-option';

/** Manifest or option problem, raised before any git work starts. */
export class ConfigError extends FleetError {
  readonly kind: ConfigErrorKind;

  constructor(kind: ConfigErrorKind, message: string) {
    super(message);
    this.kind = kind;
  }
}

/** A checkout on disk does not match its manifest entry. */
export class IntegrityError extends FleetError {
  readonly dir: string;

  constructor(dir: string, message: string) {
    super(message);
    this.dir = dir;
  }
}

export class GitUnavailableError extends FleetError {
  constructor(gitPath: string, detail: string) {
    super(`Git is not callable at '${gitPath}'. (${detail})`);
  }
}

/** The user declined a prompt. */
export class AbortedError extends FleetError {
  constructor(message = 'Aborted.', exitCode = 1) {
    super(message, exitCode);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
