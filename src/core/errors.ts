/**
 * Structured error codes for the chain auditor
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - VALIDATION: Command-line and option errors, fatal before probing starts
 * - INPUT: Hostname source errors, fatal before probing starts
 * - CHANNEL: Misuse of the pipeline channels
 *
 * Network and certificate problems are deliberately absent: they never abort a run.
 */

export const ErrorCode = {
  // Validation
  VALIDATION_NO_HOSTNAMES: 'VALIDATION_NO_HOSTNAMES',
  VALIDATION_INVALID_OPTION: 'VALIDATION_INVALID_OPTION',

  // Input
  INPUT_FILE_UNREADABLE: 'INPUT_FILE_UNREADABLE',
  INPUT_FILE_MALFORMED: 'INPUT_FILE_MALFORMED',

  // Channel
  CHANNEL_CLOSED: 'CHANNEL_CLOSED',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export class AuditorError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCodeType, message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AuditorError';
    this.code = code;
    this.details = options?.details;
  }
}

export function isAuditorError(error: unknown): error is AuditorError {
  return error instanceof AuditorError;
}

/**
 * Common errors
 */
export const Errors = {
  noHostnames: () =>
    new AuditorError(
      ErrorCode.VALIDATION_NO_HOSTNAMES,
      'You must supply at least one hostname as an argument or via --tsv-file',
    ),

  invalidOption: (option: string, expected: string, value?: string) =>
    new AuditorError(ErrorCode.VALIDATION_INVALID_OPTION, `Invalid --${option}. ${expected}`, {
      details: { option, expected, value },
    }),

  fileUnreadable: (path: string, cause: unknown) =>
    new AuditorError(ErrorCode.INPUT_FILE_UNREADABLE, `Couldn't open the tsv file ${path}`, {
      details: { path },
      cause,
    }),

  fileMalformed: (cause: unknown) =>
    new AuditorError(ErrorCode.INPUT_FILE_MALFORMED, 'Issue parsing entry in tsv file', { cause }),

  channelClosed: () =>
    new AuditorError(ErrorCode.CHANNEL_CLOSED, 'Channel is closed'),
} as const;
