import {
  GradingConfigurationError,
  RunnerConfigurationError,
  SuiteConstructionError,
  isEvalError,
} from '@tracegrade/core';

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  VALIDATION_ERROR: 4,
  EVALUATION_FAILED: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}

export function usageError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'INVALID_ARGUMENT',
    message,
    exitCode: EXIT_CODES.INVALID_ARGUMENT,
    suggestion,
  });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'CONFIG_ERROR',
    message,
    exitCode: EXIT_CODES.CONFIG_ERROR,
    suggestion,
  });
}

export function validateError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'VALIDATION_ERROR',
    message,
    exitCode: EXIT_CODES.VALIDATION_ERROR,
    suggestion,
  });
}

export function evaluationFailedError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: 'EVALUATION_FAILED',
    message,
    exitCode: EXIT_CODES.EVALUATION_FAILED,
    suggestion,
  });
}

/**
 * Map engine errors onto the exit code that matches their kind
 */
export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (error instanceof SuiteConstructionError) {
    return validateError(error.message, error.suggestion);
  }

  if (error instanceof GradingConfigurationError || error instanceof RunnerConfigurationError) {
    return configError(error.message, error.suggestion);
  }

  if (isEvalError(error)) {
    return new CliError({
      code: error.code,
      message: error.message,
      exitCode: EXIT_CODES.GENERAL_ERROR,
      suggestion: error.suggestion,
    });
  }

  if (error instanceof Error) {
    return new CliError({
      code: 'INTERNAL_ERROR',
      message: error.message,
      exitCode: EXIT_CODES.GENERAL_ERROR,
      suggestion: 'Run again with --verbose for more detail.',
    });
  }

  return new CliError({
    code: 'UNKNOWN_ERROR',
    message: 'An unknown error occurred.',
    exitCode: EXIT_CODES.GENERAL_ERROR,
    suggestion: 'Check the command and its options, then try again.',
  });
}
