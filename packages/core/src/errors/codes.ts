/**
 * Error Code Infrastructure
 * Stable error codes and exit codes for argspec errors.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by phase
export enum ErrorCode {
  // Definition Errors (E001–E099)
  DUPLICATE_PARAMETER = 'E001',
  DEFAULT_ON_REQUIRED = 'E002',
  INVALID_DEFAULT = 'E003',
  INVALID_PARAMETER_DEFINITION = 'E010',
  RECURSIVE_COMPILATION = 'E012',

  // Validation Errors (E200–E299)
  VALIDATION_FAILED = 'E200',
  MISSING_REQUIRED_PARAMETER = 'E201',
  UNKNOWN_PARAMETER = 'E202',
  TYPE_MISMATCH = 'E203',
  ARGUMENT_SHAPE = 'E204',
  EXTRA_ARGUMENTS = 'E205',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.DUPLICATE_PARAMETER]: 10,
  [ErrorCode.DEFAULT_ON_REQUIRED]: 11,
  [ErrorCode.INVALID_DEFAULT]: 12,
  [ErrorCode.INVALID_PARAMETER_DEFINITION]: 20,
  [ErrorCode.RECURSIVE_COMPILATION]: 22,
  [ErrorCode.VALIDATION_FAILED]: 40,
  [ErrorCode.MISSING_REQUIRED_PARAMETER]: 41,
  [ErrorCode.UNKNOWN_PARAMETER]: 42,
  [ErrorCode.TYPE_MISMATCH]: 43,
  [ErrorCode.ARGUMENT_SHAPE]: 44,
  [ErrorCode.EXTRA_ARGUMENTS]: 45,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
