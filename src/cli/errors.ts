/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isWorldModelError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'IMPORT_INVALID'
  | 'STORAGE_ERROR'
  | 'CONFIG_INVALID';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `world-model help <command>` for usage information.',
  FILE_NOT_FOUND: 'Check the path; relative paths resolve against --workspace.',
  IMPORT_INVALID: 'Fix the listed field in the graph file and import again.',
  STORAGE_ERROR: 'Another process may hold the database lock. Retry, or point WORLD_MODEL_DB_PATH elsewhere.',
  CONFIG_INVALID: 'Check the WORLD_MODEL_* environment variables.',
};

/** Exit code for bad usage, as opposed to a failed operation. */
export const USAGE_EXIT_CODE = 2;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/** Map library errors onto CLI codes; CliErrors pass through. */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isWorldModelError(error)) {
    switch (error.code) {
      case 'STORAGE_ERROR':
      case 'GRAPH_LOAD_ERROR':
      case 'SCHEMA_ERROR':
        return createError('STORAGE_ERROR', error.message);
      case 'CONFIGURATION_ERROR':
        return createError('CONFIG_INVALID', error.message);
      default:
        return createError('IMPORT_INVALID', error.message);
    }
  }
  if (error instanceof Error && error.message.includes('ENOENT')) {
    return createError('FILE_NOT_FOUND', error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CliError(message, 'STORAGE_ERROR');
}

export function formatError(error: unknown): string {
  const cliError = classifyError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export function getExitCode(error: CliError): number {
  return error.code === 'INVALID_ARGUMENT' ? USAGE_EXIT_CODE : 1;
}
