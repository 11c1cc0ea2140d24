/**
 * Minimal argv helpers shared by scripts
 */

/**
 * Get command line argument value
 *
 * @param args - Command line arguments array
 * @param name - Argument name (e.g., '--output')
 * @returns The argument value or undefined if not found
 */
export function getArg(args: string[], name: string): string | undefined {
	const index = args.indexOf(name);
	if (index !== -1 && args[index + 1] && !args[index + 1].startsWith('--')) {
		return args[index + 1];
	}
	return undefined;
}

export function hasFlag(args: string[], ...names: string[]): boolean {
	return names.some((name) => args.includes(name));
}

/**
 * Parse an integer argument, failing with a usage error on junk
 */
export function getIntArg(args: string[], name: string, fallback: number): number {
	const raw = getArg(args, name);
	if (raw === undefined) return fallback;
	const value = Number(raw);
	if (!Number.isInteger(value)) {
		throw new Error(`${name} expects an integer, got "${raw}"`);
	}
	return value;
}
