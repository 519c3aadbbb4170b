export type SbatchKitErrorCode =
  | "VALIDATION"
  | "MUTUALLY_EXCLUSIVE"
  | "DEPENDENT_OPTION"
  | "UNKNOWN_OPTION"
  | "INVALID_DEPENDENCY_KIND"
  | "SUBMISSION"
  | "EXECUTABLE_NOT_FOUND";

export abstract class SbatchKitError extends Error {
  abstract readonly code: SbatchKitErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends SbatchKitError {
  readonly code = "VALIDATION" as const;

  constructor(
    readonly setter: string,
    readonly detail: string,
    readonly option: string | null = null
  ) {
    super(`${setter}(): ${detail}`);
  }
}

export class MutuallyExclusiveError extends SbatchKitError {
  readonly code = "MUTUALLY_EXCLUSIVE" as const;

  constructor(
    readonly setter: string,
    readonly a: string,
    readonly b: string
  ) {
    super(`${setter}(): options '${a}' and '${b}' are mutually exclusive`);
  }
}

export class DependentOptionError extends SbatchKitError {
  readonly code = "DEPENDENT_OPTION" as const;

  constructor(
    readonly setter: string,
    readonly detail: string
  ) {
    super(`${setter}(): ${detail}`);
  }
}

export class UnknownOptionError extends SbatchKitError {
  readonly code = "UNKNOWN_OPTION" as const;

  constructor(
    readonly setter: string,
    readonly keys: string[]
  ) {
    super(`${setter}(): unknown option${keys.length > 1 ? "s" : ""}: ${keys.join(", ")}`);
  }
}

export class InvalidDependencyKindError extends SbatchKitError {
  readonly code = "INVALID_DEPENDENCY_KIND" as const;

  constructor(readonly kind: string) {
    super(`invalid dependency kind: ${kind}`);
  }
}

export class SubmissionError extends SbatchKitError {
  readonly code = "SUBMISSION" as const;

  constructor(
    readonly reason: string,
    readonly exitCode: number | null = null
  ) {
    super(reason);
  }
}

export class ExecutableNotFoundError extends SbatchKitError {
  readonly code = "EXECUTABLE_NOT_FOUND" as const;

  constructor(readonly executable: string) {
    super(`could not locate '${executable}' executable (set sbatch.path in the config or add it to PATH)`);
  }
}

export function isOptionError(
  e: unknown
): e is ValidationError | MutuallyExclusiveError | DependentOptionError | UnknownOptionError | InvalidDependencyKindError {
  return (
    e instanceof ValidationError ||
    e instanceof MutuallyExclusiveError ||
    e instanceof DependentOptionError ||
    e instanceof UnknownOptionError ||
    e instanceof InvalidDependencyKindError
  );
}
