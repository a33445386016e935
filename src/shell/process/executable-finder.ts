// CHANGE: Locate an executable on the search path, honouring extra suffixes
// PURITY: SHELL (file system probes)
// EFFECT: Effect<string, ExecutableNotFound>
// INVARIANT: result ∈ { join(dir, name + s) | dir ∈ searchPath, s ∈ ["", ...suffixes] }, first in that order
// COMPLEXITY: O(d × s) stat calls where d = |searchPath|, s = |suffixes| + 1

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { ExecutableNotFound } from "../../core/errors.js";

export interface ExecutableLookup {
	readonly searchPath: ReadonlyArray<string>;
	readonly suffixes: ReadonlyArray<string>;
}

/**
 * True when `file` is a regular file the current user may execute.
 */
export function isExecutableFile(file: string): boolean {
	try {
		if (!fs.statSync(file).isFile()) {
			return false;
		}
		fs.accessSync(file, fs.constants.X_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * Candidate paths for `name`, in lookup order.
 *
 * @pure true
 */
export function executableCandidates(
	name: string,
	lookup: ExecutableLookup,
): string[] {
	const suffixes = ["", ...lookup.suffixes];
	return lookup.searchPath
		.filter((dir) => dir !== "")
		.flatMap((dir) => suffixes.map((suffix) => path.join(dir, `${name}${suffix}`)));
}

/**
 * Find the first executable named `name` (or `name` plus a suffix).
 *
 * @pure false (reads the file system)
 * @effect Effect<string, ExecutableNotFound>
 */
export function findExecutable(
	name: string,
	lookup: ExecutableLookup,
	isExecutable: (file: string) => boolean = isExecutableFile,
): Effect.Effect<string, ExecutableNotFound> {
	return Effect.suspend((): Effect.Effect<string, ExecutableNotFound> => {
		const found = executableCandidates(name, lookup).find(isExecutable);
		return found === undefined
			? Effect.fail(
					new ExecutableNotFound({
						executable: name,
						searchedPaths: [...lookup.searchPath],
					}),
				)
			: Effect.succeed(found);
	});
}
