// Error taxonomy shared by the stores, the Jira client and the git integration

export type StoreErrorKind = 'NotFound' | 'PersistError';

export type FetchErrorKind = 'AuthError' | 'NotFoundError' | 'NetworkError' | 'UnexpectedResponseError';

export class StoreError extends Error {
  readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.kind = kind;
  }
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(kind: FetchErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export class GitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GitError';
  }
}

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  PersistFailed: 2,
  MissingCredentials: 3,
  VerificationFailed: 4,
  ProjectNotRegistered: 6,
  FetchFailed: 8,
  NotGitRepository: 10,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
