/**
 * Normalize anything that was thrown into an Error
 */
export function toError(thrown: unknown): Error {
    if (thrown instanceof Error) return thrown;
    return new Error(typeof thrown === 'string' ? thrown : `non-error value thrown: ${String(thrown)}`, {
        cause: thrown,
    });
}

/**
 * Whether an error is a filesystem "does not exist" error
 */
export function isNotFound(err: unknown): boolean {
    if (!(err instanceof Error) || !('code' in err)) return false;
    return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}
