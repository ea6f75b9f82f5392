/**
 * Error Types Module
 *
 * Every failure the pipeline can raise is a LocalHelpError tagged with a code.
 * Callers branch on the code rather than on message text.
 */

export enum LocalHelpErrorCode {
  NO_COMMAND = 'NO_COMMAND',
  MAN_PAGE_NOT_FOUND = 'MAN_PAGE_NOT_FOUND',
  HELP_COMMAND_FAILED = 'HELP_COMMAND_FAILED',
  SPAWN_FAILED = 'SPAWN_FAILED',
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',
  ACCESS_DENIED = 'ACCESS_DENIED',
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  API_REQUEST_FAILED = 'API_REQUEST_FAILED',
  INVALID_JSON_RESPONSE = 'INVALID_JSON_RESPONSE',
  NO_COMMAND_TO_EXECUTE = 'NO_COMMAND_TO_EXECUTE',
}

export class LocalHelpError extends Error {
  readonly code: LocalHelpErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LocalHelpErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'LocalHelpError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Narrows an unknown thrown value to a LocalHelpError, optionally of one code.
 */
export function isLocalHelpError(error: unknown, code?: LocalHelpErrorCode): error is LocalHelpError {
  if (!(error instanceof LocalHelpError)) return false;
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
