export type FatalErrorKind = 'structure' | 'build' | 'fixture' | 'config';

export const EXIT_OK = 0;
export const EXIT_TESTS_FAILED = 1;
export const EXIT_FATAL = 2;

export abstract class GraderError extends Error {
  abstract readonly kind: FatalErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or unreadable submission archive. */
export class StructureError extends GraderError {
  readonly kind = 'structure';
}

/** Build tool failed, or the executable is missing afterwards. */
export class BuildError extends GraderError {
  readonly kind = 'build';

  constructor(
    message: string,
    readonly output: string = '',
  ) {
    super(message);
  }
}

/** Fixture corpus is unusable, e.g. an input without its expected output. */
export class FixtureError extends GraderError {
  readonly kind = 'fixture';
}

export class ConfigError extends GraderError {
  readonly kind = 'config';
}

export function isGraderError(error: unknown): error is GraderError {
  return error instanceof GraderError;
}

export function exitCodeFor(error: unknown): number {
  return isGraderError(error) ? EXIT_FATAL : EXIT_TESTS_FAILED;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
