// CHANGE: Thin synchronous process-spawn abstraction
// WHY: The orchestration only needs (command, args, env) → (exit code, stdout, stderr)
// PURITY: SHELL (spawns OS processes)
// EFFECT: Effect<ProcessResult, never>
// INVARIANT: the child environment is hostEnv overlaid with command.env
// COMPLEXITY: O(1) plus the child's own run time; blocks until exit

import { spawnSync } from "node:child_process";
import { Effect } from "effect";

import { formatCommandLine } from "../../core/command-line.js";
import type { ProcessCommand, ProcessResult } from "../../core/models.js";

/**
 * Runs one command to completion.
 */
export interface ProcessRunner {
	readonly run: (command: ProcessCommand) => ProcessResult;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Exit status reported when the child could not be spawned or was killed
 * by a signal.
 */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Process runner backed by `child_process.spawnSync`.
 *
 * @param hostEnv Environment every child inherits
 */
export function createNodeProcessRunner(
	hostEnv: Readonly<NodeJS.ProcessEnv>,
): ProcessRunner {
	return {
		run: (command) => {
			const completed = spawnSync(command.executable, [...command.args], {
				env: { ...hostEnv, ...command.env },
				cwd: command.cwd,
				encoding: "utf8",
				maxBuffer: MAX_BUFFER,
				windowsHide: true,
			});
			const stderr =
				completed.error === undefined
					? completed.stderr
					: `${completed.stderr ?? ""}${completed.error.message}`;
			return {
				commandLine: formatCommandLine(command.executable, command.args),
				exitCode: completed.status ?? SPAWN_FAILURE_EXIT_CODE,
				stdout: completed.stdout ?? "",
				stderr: stderr ?? "",
				...(completed.signal === null ? {} : { signal: completed.signal }),
			};
		},
	};
}

/**
 * Run a command through a runner inside Effect.
 *
 * @pure false (spawns a process)
 * @effect Effect<ProcessResult, never>
 */
export function runProcess(
	runner: ProcessRunner,
	command: ProcessCommand,
): Effect.Effect<ProcessResult> {
	return Effect.sync(() => runner.run(command));
}
