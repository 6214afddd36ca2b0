import path from 'node:path';

const TRAILING_SEPARATORS = /[\\/]+$/;

/**
 * Absolute form of a directory without trailing separators. The root
 * directory keeps its separator.
 */
export function normalizeDirectory(directory: string): string {
	const trimmed = directory.trim();
	if (trimmed === '') {
		return '';
	}
	const resolved = path.resolve(trimmed);
	const stripped = resolved.replace(TRAILING_SEPARATORS, '');
	return stripped === '' || stripped.endsWith(':') ? resolved : stripped;
}

export function sameDirectory(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase();
}

/**
 * Normalised, non-empty directories with case-insensitive duplicates removed.
 * The first spelling of a directory wins.
 */
export function uniqueDirectories(directories: readonly string[]): string[] {
	const result: string[] = [];
	for (const directory of directories) {
		const normalized = normalizeDirectory(directory);
		if (normalized !== '' && !result.some((existing) => sameDirectory(existing, normalized))) {
			result.push(normalized);
		}
	}
	return result;
}
