/**
 * Sanitizes a string to be safe for use in filenames
 */
export function sanitizeForFilename(str: string): string {
	return str
		.replace(/[^a-zA-Z0-9-_.]/g, "-")
		.replace(/-+/g, "-")
		.substring(0, 100);
}

/**
 * Splits a list into consecutive slices of `size`; the last one may be shorter.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
	if (!Number.isInteger(size) || size < 1) {
		throw new Error(`Invalid chunk size: ${size}`);
	}
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}

export function formatTimespan(seconds: number): string {
	const hours = Math.floor(seconds / 3600);
	const minutes = Math.floor((seconds - hours * 3600) / 60);
	const remaining = seconds - hours * 3600 - minutes * 60;
	return `${hours} hours ${minutes} minutes ${remaining.toFixed(4)} seconds.`;
}

export const sleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));
