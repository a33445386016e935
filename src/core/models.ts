// CHANGE: Functional Core domain models for the Composer orchestration
// WHY: CORE holds only immutable data; SHELL produces and consumes it
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Output verbosity, ordered from least to most chatty.
 */
export type Verbosity = "quiet" | "normal" | "verbose" | "very-verbose" | "debug";

/**
 * A command to spawn: executable plus arguments and the environment overlay
 * applied on top of the host environment.
 */
export interface ProcessCommand {
	readonly executable: string;
	readonly args: ReadonlyArray<string>;
	readonly env: Readonly<Record<string, string>>;
	readonly cwd?: string;
}

/**
 * Outcome of one finished subprocess.
 *
 * @invariant exitCode === 0 ⇔ the run is successful
 */
export interface ProcessResult {
	readonly commandLine: string;
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
	/** Name of the signal that terminated the child, when one did. */
	readonly signal?: string;
}

/**
 * Diagnostic context attached to every subprocess error.
 */
export type ProcessFailure = ProcessResult;

/**
 * Checks whether a process finished successfully.
 *
 * @pure true
 */
export function isSuccessful(result: ProcessResult): boolean {
	return result.exitCode === 0;
}
