/**
 * Extract a printable message from whatever was thrown.
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	if (typeof error === 'string') {
		return error;
	}
	try {
		return JSON.stringify(error) ?? String(error);
	} catch {
		return String(error);
	}
}

export function getErrorStack(error: unknown): string | undefined {
	return error instanceof Error ? error.stack : undefined;
}
