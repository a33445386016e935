// CHANGE: Parse the version token printed by `composer --version`
// PURITY: CORE
// INVARIANT: parseComposerVersion(o) ≠ null ⇔ o starts with "Composer version <token>"
// COMPLEXITY: O(n) where n = |output|

const COMPOSER_VERSION_PATTERN = /^Composer version (\S+)/u;

/**
 * Extract the version token from `composer --version` output.
 *
 * @example
 * ```ts
 * parseComposerVersion("Composer version 2.6.5 2023-10-06 10:11:52\n"); // "2.6.5"
 * parseComposerVersion("garbage output"); // null
 * ```
 *
 * @pure true
 */
export function parseComposerVersion(output: string): string | null {
	const found = COMPOSER_VERSION_PATTERN.exec(output);
	return found?.[1] ?? null;
}
