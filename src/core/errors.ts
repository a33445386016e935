// CHANGE: Typed domain error ADT for the Composer orchestration using Effect.Data
// WHY: Failures travel in the Effect error channel, discriminated by `_tag`
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { ProcessFailure } from "./models.js";

/**
 * No Composer executable on the search path.
 *
 * @invariant searchedPaths lists every directory that was inspected
 */
export class ExecutableNotFound extends Data.TaggedError("ExecutableNotFound")<{
	readonly executable: string;
	readonly searchedPaths: readonly string[];
}> {}

/**
 * `composer --version` failed or printed something unrecognisable.
 *
 * `failure` is absent when the process succeeded but its output did not match.
 */
export class VersionCheckFailed extends Data.TaggedError("VersionCheckFailed")<{
	readonly failure?: ProcessFailure;
	readonly output?: string;
}> {}

/**
 * `composer dump-autoload` exited with a non-zero status.
 */
export class DumpFailed extends Data.TaggedError("DumpFailed")<{
	readonly failure: ProcessFailure;
}> {}

/**
 * `composer config vendor-dir` exited with a non-zero status.
 */
export class VendorDirLookupFailed extends Data.TaggedError(
	"VendorDirLookupFailed",
)<{
	readonly failure: ProcessFailure;
}> {}

/**
 * Reading or writing a file failed.
 *
 * @invariant detail.length > 0
 */
export class FileSystemError extends Data.TaggedError("FileSystemError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * A symbols registry file could not be decoded.
 */
export class SymbolsFileInvalid extends Data.TaggedError("SymbolsFileInvalid")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command line arguments could not be turned into options.
 */
export class CliUsageError extends Data.TaggedError("CliUsageError")<{
	readonly detail: string;
}> {}

/**
 * Errors raised while talking to Composer.
 */
export type ComposerError =
	| ExecutableNotFound
	| VersionCheckFailed
	| DumpFailed
	| VendorDirLookupFailed;

/**
 * Union type of all application errors for Effect signatures
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ComposerError
	| FileSystemError
	| SymbolsFileInvalid
	| CliUsageError;
