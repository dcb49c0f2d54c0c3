/**
 * Returns a string message from an unknown caught value.
 * Use in catch (error: unknown) blocks instead of error?.message.
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

/**
 * Reads an HTTP-ish status off SDK errors (`status` or `response.status`).
 */
export function getErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('response' in error && typeof error.response === 'object' && error.response !== null) {
        const response = error.response;
        if ('status' in response && typeof response.status === 'number') return response.status;
    }
    return undefined;
}
