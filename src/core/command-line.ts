// CHANGE: Render a spawned command as a copy-pasteable shell line
// WHY: Logged and reported command lines must re-run verbatim in a POSIX shell
// PURITY: CORE
// INVARIANT: every argument is wrapped in single quotes; inner quotes become '\''
// COMPLEXITY: O(n) where n = total argument length

/**
 * Quote one argument for a POSIX shell.
 *
 * @pure true
 */
export function escapeArgument(argument: string): string {
	return `'${argument.replaceAll("'", "'\\''")}'`;
}

/**
 * Join executable and arguments into one shell-quoted line.
 *
 * @example
 * ```ts
 * formatCommandLine("/usr/bin/composer", ["config", "vendor-dir"]);
 * // "'/usr/bin/composer' 'config' 'vendor-dir'"
 * ```
 *
 * @pure true
 */
export function formatCommandLine(
	executable: string,
	args: ReadonlyArray<string>,
): string {
	return [executable, ...args].map(escapeArgument).join(" ");
}
