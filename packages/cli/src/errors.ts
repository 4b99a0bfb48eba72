export type CliErrorCode =
  | 'VALIDATION_ERROR'
  | 'OUTPUT_REQUIRED'
  | 'VERSION_REQUIRED'
  | 'SRC_DIR_NOT_FOUND'
  | 'COMMIT_TIME_UNREADABLE'
  | 'ARCHIVE_FAILED'
  | 'XZ_FAILED'
  | 'STEP_FAILED'
  | 'CONFIG_INVALID'
  | 'GITHUB_TOKEN_REQUIRED'
  | 'REPOSITORY_REQUIRED'
  | 'RELEASE_EXISTS'
  | 'ARTIFACT_NOT_FOUND'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE'
  | 'GITHUB_AUTH_FAILED'
  | 'GITHUB_UNAVAILABLE'
  | 'GITHUB_API_ERROR';

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: CliErrorCode,
    message: string,
    exitCode = 1,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function errorEnvelope(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false as const,
    error: {
      code,
      message,
      details,
    },
  };
}

export function errorMessage(error: unknown, fallback = 'Unknown error') {
  return error instanceof Error ? error.message : fallback;
}
