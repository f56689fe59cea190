/**
 * Shared error handling for MCP tools: consistent logging and user-facing messages.
 */

import { isUserFacingError } from '../errors.js';
import { getLogLevel, error as logError, warn as logWarn } from '../logger.js';

/** User-facing error message: detailed for input/config errors and at DEBUG, generic otherwise. */
export function getToolErrorMessage(error: unknown, fallbackMessage: string): string {
  if (isUserFacingError(error)) {
    return error.message;
  }
  const msg = error instanceof Error ? error.message : String(error);
  return getLogLevel() === 'DEBUG' ? msg : fallbackMessage;
}

export function logToolError(toolName: string, error: unknown): void {
  if (isUserFacingError(error)) {
    logWarn(`${toolName} tool rejected the request: ${error.message}`);
    return;
  }
  logError(`Error in ${toolName} tool`, error);
}
