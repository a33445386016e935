// CHANGE: Effect wrappers for the two file operations the orchestration needs
// PURITY: SHELL (file system I/O)
// EFFECT: Effect<string | void, FileSystemError>
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import { Effect } from "effect";

import { FileSystemError } from "../../core/errors.js";

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function readTextFile(
	file: string,
): Effect.Effect<string, FileSystemError> {
	return Effect.try({
		try: () => fs.readFileSync(file, "utf8"),
		catch: (error) => new FileSystemError({ path: file, detail: describe(error) }),
	});
}

export function writeTextFile(
	file: string,
	contents: string,
): Effect.Effect<void, FileSystemError> {
	return Effect.try({
		try: () => {
			fs.writeFileSync(file, contents, "utf8");
		},
		catch: (error) => new FileSystemError({ path: file, detail: describe(error) }),
	});
}
