// CHANGE: Environment overlay handed to every Composer sub-process
// PURITY: CORE
// INVARIANT: overlay = { COMPOSER_ALLOW_XDEBUG: "1" } if allowXdebug else {}
// COMPLEXITY: O(1)

export const COMPOSER_ALLOW_XDEBUG = "COMPOSER_ALLOW_XDEBUG";

/**
 * Build the environment overlay for Composer.
 *
 * @pure true
 */
export function composerEnvOverlay(
	allowXdebug: boolean,
): Readonly<Record<string, string>> {
	return allowXdebug ? { [COMPOSER_ALLOW_XDEBUG]: "1" } : {};
}
