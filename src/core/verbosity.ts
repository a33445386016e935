// CHANGE: Verbosity ordering and the Composer sub-process flag table
// PURITY: CORE
// INVARIANT: rank is strictly increasing along quiet < normal < verbose < very-verbose < debug
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { Verbosity } from "./models.js";

/**
 * Numeric rank of a verbosity level.
 *
 * @pure true
 */
export function verbosityRank(level: Verbosity): number {
	return match(level)
		.with("quiet", () => 0)
		.with("normal", () => 1)
		.with("verbose", () => 2)
		.with("very-verbose", () => 3)
		.with("debug", () => 4)
		.exhaustive();
}

/**
 * True when `current` is at least as chatty as `threshold`.
 *
 * @pure true
 */
export function isAtLeast(current: Verbosity, threshold: Verbosity): boolean {
	return verbosityRank(current) >= verbosityRank(threshold);
}

/**
 * Extra verbosity flag forwarded to Composer.
 *
 * Composer's own `-v` is already chatty, so the mapping is shifted by one
 * level: `debug → -vvv`, `very-verbose → -v`, anything else → none.
 *
 * @pure true
 */
export function subProcessVerbosityFlag(level: Verbosity): string | null {
	return match(level)
		.with("debug", () => "-vvv")
		.with("very-verbose", () => "-v")
		.with("quiet", "normal", "verbose", () => null)
		.exhaustive();
}
