/**
 * Extracts a readable message from an unknown error value.
 * Use in catch blocks: `errors.push(toErrorMessage(err))`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

/** Node system error code such as ENOENT or EACCES, when present. */
export function toErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
