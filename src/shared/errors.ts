/**
 * Error helpers shared across modules
 */

/** Read the errno-style `code` of a thrown value, if it has one */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Human-readable message for any thrown value */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
