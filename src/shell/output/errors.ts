// CHANGE: Render application errors as user-facing diagnostics
// PURITY: SHELL (pure string building for the error sink)
// INVARIANT: every AppError variant has a headline; process failures add command, exit code and output
// COMPLEXITY: O(|stdout| + |stderr|)

import { match } from "ts-pattern";

import type { AppError } from "../../core/errors.js";
import type { ProcessFailure } from "../../core/models.js";

const RULE = "================";

/**
 * Describe a failed process the way a user can act on it.
 *
 * @pure true
 */
export function formatProcessFailure(failure: ProcessFailure): string[] {
	const lines = [
		`The command "${failure.commandLine}" failed.`,
		"",
		failure.signal === undefined
			? `Exit Code: ${failure.exitCode}`
			: `Exit Code: ${failure.exitCode} (terminated by signal ${failure.signal})`,
	];
	if (failure.stdout.trim() !== "") {
		lines.push("", "Output:", RULE, failure.stdout.trimEnd());
	}
	if (failure.stderr.trim() !== "") {
		lines.push("", "Error Output:", RULE, failure.stderr.trimEnd());
	}
	return lines;
}

function withFailure(
	headline: string,
	failure: ProcessFailure | undefined,
): string[] {
	return failure === undefined
		? [headline]
		: [headline, "", ...formatProcessFailure(failure)];
}

/**
 * Lines describing an application error.
 *
 * @pure true
 */
export function formatAppError(error: AppError): string[] {
	return match(error)
		.with({ _tag: "ExecutableNotFound" }, (e) => [
			"Could not find a Composer executable.",
			`Looked for "${e.executable}" in: ${e.searchedPaths.join(", ") || "(empty search path)"}`,
		])
		.with({ _tag: "VersionCheckFailed" }, (e) =>
			e.failure === undefined && e.output !== undefined
				? [
						"Could not determine the Composer version.",
						`Unexpected output: ${e.output.trim()}`,
					]
				: withFailure("Could not determine the Composer version.", e.failure),
		)
		.with({ _tag: "DumpFailed" }, (e) =>
			withFailure("Could not dump the autoloader.", e.failure),
		)
		.with({ _tag: "VendorDirLookupFailed" }, (e) =>
			withFailure("Could not retrieve the vendor dir.", e.failure),
		)
		.with({ _tag: "FileSystemError" }, (e) => [
			`Could not access "${e.path}": ${e.detail}`,
		])
		.with({ _tag: "SymbolsFileInvalid" }, (e) => [
			`Invalid symbols file "${e.path}":`,
			e.detail,
		])
		.with({ _tag: "CliUsageError" }, (e) => [e.detail])
		.exhaustive();
}
