// CHANGE: Read environment-derived settings once, at the shell boundary
// WHY: The invoker receives settings at construction and never reads process.env itself
// PURITY: SHELL (reads the environment passed in)
// INVARIANT: allowXdebug ⇔ env.BOX_ALLOW_XDEBUG === "1"
// COMPLEXITY: O(|PATH|)

import * as path from "node:path";

export const BOX_ALLOW_XDEBUG = "BOX_ALLOW_XDEBUG";

export const COMPOSER_EXECUTABLE = "composer";

export interface RuntimeConfig {
	readonly allowXdebug: boolean;
	readonly searchPath: ReadonlyArray<string>;
	readonly executableSuffixes: ReadonlyArray<string>;
}

function windowsSuffixes(env: Readonly<NodeJS.ProcessEnv>): string[] {
	const pathExt = env["PATHEXT"] ?? ".COM;.EXE;.BAT;.CMD";
	return pathExt
		.split(";")
		.filter((ext) => ext !== "")
		.map((ext) => ext.toLowerCase());
}

/**
 * Build the runtime configuration from an environment snapshot.
 *
 * @param env Environment variables, usually `process.env`
 * @param platform Host platform, usually `process.platform`
 */
export function loadRuntimeConfig(
	env: Readonly<NodeJS.ProcessEnv>,
	platform: NodeJS.Platform,
): RuntimeConfig {
	const isWindows = platform === "win32";
	const delimiter = isWindows ? path.win32.delimiter : path.posix.delimiter;
	const searchPath = (env["PATH"] ?? env["Path"] ?? "")
		.split(delimiter)
		.filter((dir) => dir !== "");
	const executableSuffixes = isWindows
		? [".phar", ...windowsSuffixes(env)]
		: [".phar"];

	return Object.freeze({
		allowXdebug: env[BOX_ALLOW_XDEBUG] === "1",
		searchPath,
		executableSuffixes,
	});
}
