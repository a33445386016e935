// CHANGE: Load a symbols registry from a JSON file
// PURITY: SHELL (file system I/O)
// EFFECT: Effect<SymbolsRegistry, FileSystemError | SymbolsFileInvalid>
// INVARIANT: accepted files match { functions?: [string, string][], classes?: [string, string][] }
// COMPLEXITY: O(n) where n = file size

import { Effect, Schema } from "effect";

import { type FileSystemError, SymbolsFileInvalid } from "../../core/errors.js";
import { SymbolsRegistry } from "../../core/symbols/registry.js";
import { readTextFile } from "../fs/files.js";

const SymbolPairSchema = Schema.Tuple(Schema.String, Schema.String);

export const SymbolsFileSchema = Schema.Struct({
	functions: Schema.optional(Schema.Array(SymbolPairSchema)),
	classes: Schema.optional(Schema.Array(SymbolPairSchema)),
});

/**
 * Decode already-read file contents into a registry.
 *
 * @effect Effect<SymbolsRegistry, SymbolsFileInvalid>
 */
export function parseSymbolsFile(
	file: string,
	contents: string,
): Effect.Effect<SymbolsRegistry, SymbolsFileInvalid> {
	return Effect.try({
		try: (): unknown => JSON.parse(contents),
		catch: (error) =>
			new SymbolsFileInvalid({
				path: file,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(
		Effect.flatMap((json) =>
			Schema.decodeUnknown(SymbolsFileSchema)(json).pipe(
				Effect.mapError(
					(error) => new SymbolsFileInvalid({ path: file, detail: error.message }),
				),
			),
		),
		Effect.map((data) => SymbolsRegistry.create(data)),
	);
}

/**
 * Read and decode a symbols file.
 *
 * @pure false (reads the file system)
 */
export function loadSymbolsRegistry(
	file: string,
): Effect.Effect<SymbolsRegistry, FileSystemError | SymbolsFileInvalid> {
	return readTextFile(file).pipe(
		Effect.flatMap((contents) => parseSymbolsFile(file, contents)),
	);
}
