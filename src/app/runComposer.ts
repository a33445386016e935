// CHANGE: Application layer composing CLI options, config and the Composer orchestrator
// PURITY: APP (no process.exit; returns ExitCode)
// EFFECT: Effect<void, AppError> run synchronously
// INVARIANT: Returns ExitCode as value; every AppError is rendered once to the error sink
// COMPLEXITY: O(1) orchestration plus Composer's run time

import * as path from "node:path";
import { Effect, Either } from "effect";

import type { AppError } from "../core/errors.js";
import type { IO } from "../core/io.js";
import type { ExitCode } from "../core/models.js";
import { SymbolsRegistry } from "../core/symbols/registry.js";
import type { CLIOptions } from "../core/types/index.js";
import { createComposerOrchestrator } from "../shell/composer/orchestrator.js";
import { USAGE } from "../shell/config/cli.js";
import { loadRuntimeConfig } from "../shell/config/runtime.js";
import { CompilerLogger, LOG_PREFIX } from "../shell/io/compiler-logger.js";
import { createIO, type IOSinks } from "../shell/io/console-io.js";
import { formatAppError } from "../shell/output/errors.js";
import { createNodeProcessRunner, type ProcessRunner } from "../shell/process/runner.js";
import { loadSymbolsRegistry } from "../shell/symbols/load.js";

/**
 * Host facts the application needs; the BIN layer fills them from `process`.
 */
export interface HostEnvironment {
	readonly env: Readonly<NodeJS.ProcessEnv>;
	readonly platform: NodeJS.Platform;
	readonly cwd: string;
	readonly isTTY: boolean;
	readonly runner?: ProcessRunner;
	readonly isExecutable?: (file: string) => boolean;
	readonly sinks?: IOSinks;
}

function createAppIO(options: CLIOptions, host: HostEnvironment): IO {
	return createIO(
		{
			verbosity: options.verbosity,
			decorated: options.decorated ?? host.isTTY,
		},
		host.sinks,
	);
}

function buildProgram(
	options: CLIOptions,
	host: HostEnvironment,
	io: IO,
): Effect.Effect<void, AppError> {
	const workingDirectory = path.resolve(host.cwd, options.workingDir ?? ".");
	const orchestrator = createComposerOrchestrator({
		config: loadRuntimeConfig(host.env, host.platform),
		runner: host.runner ?? createNodeProcessRunner(host.env),
		workingDirectory,
		isExecutable: host.isExecutable,
	});
	const logger = new CompilerLogger(io);

	switch (options.command) {
		case "help": {
			return Effect.sync(() => {
				io.writeln(USAGE);
			});
		}
		case "version": {
			return orchestrator.getVersion().pipe(
				Effect.map((version) => {
					io.writeln(version);
				}),
			);
		}
		case "dump-autoload": {
			return Effect.gen(function* () {
				const registry =
					options.symbolsFile === undefined
						? SymbolsRegistry.empty()
						: yield* loadSymbolsRegistry(
								path.resolve(workingDirectory, options.symbolsFile),
							);
				logger.log(LOG_PREFIX.question, "Dumping the Composer autoloader", "verbose");
				yield* orchestrator.dumpAutoload({
					registry,
					prefix: options.prefix,
					excludeDevFiles: options.noDev,
					io,
				});
				logger.log(LOG_PREFIX.star, "Composer autoloader dumped");
			});
		}
	}
}

/**
 * Run one CLI command.
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (spawns Composer, writes files and output), but never exits the process
 */
export function runComposer(options: CLIOptions, host: HostEnvironment): ExitCode {
	const io = createAppIO(options, host);
	const outcome = Effect.runSync(Effect.either(buildProgram(options, host, io)));
	return Either.match(outcome, {
		onLeft: (error): ExitCode => {
			for (const line of formatAppError(error)) {
				io.writeError(line);
			}
			return 1;
		},
		onRight: (): ExitCode => 0,
	});
}
