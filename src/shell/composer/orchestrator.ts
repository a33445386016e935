// CHANGE: Drive the Composer executable and rewrite vendor/autoload.php
// PURITY: SHELL (spawns Composer, reads and writes the bootstrap file)
// EFFECT: Effect<void, ExecutableNotFound | DumpFailed | VendorDirLookupFailed | FileSystemError>
// INVARIANT: autoload.php is written only after every Composer call succeeded
// INVARIANT: prefix = "" ⇒ only `dump-autoload` runs and no file is touched
// COMPLEXITY: O(n) in the size of autoload.php, plus Composer's run time

import * as path from "node:path";
import { Effect } from "effect";

import {
	findLoaderStatement,
	rewriteAutoload,
} from "../../core/autoload/rewrite.js";
import { formatCommandLine } from "../../core/command-line.js";
import { composerEnvOverlay } from "../../core/env.js";
import {
	DumpFailed,
	type ExecutableNotFound,
	type FileSystemError,
	VendorDirLookupFailed,
	VersionCheckFailed,
} from "../../core/errors.js";
import type { IO } from "../../core/io.js";
import { isSuccessful, type ProcessResult } from "../../core/models.js";
import type { SymbolsRegistry } from "../../core/symbols/registry.js";
import { subProcessVerbosityFlag } from "../../core/verbosity.js";
import { parseComposerVersion } from "../../core/version.js";
import { COMPOSER_EXECUTABLE, type RuntimeConfig } from "../config/runtime.js";
import { readTextFile, writeTextFile } from "../fs/files.js";
import { CompilerLogger, LOG_PREFIX } from "../io/compiler-logger.js";
import { createNullIO } from "../io/console-io.js";
import { findExecutable, isExecutableFile } from "../process/executable-finder.js";
import { type ProcessRunner, runProcess } from "../process/runner.js";

export interface ComposerOrchestratorDeps {
	readonly config: RuntimeConfig;
	readonly runner: ProcessRunner;
	/** Directory Composer runs in; defaults to the runner's own. */
	readonly workingDirectory?: string;
	readonly isExecutable?: (file: string) => boolean;
}

export interface DumpAutoloadOptions {
	readonly registry: SymbolsRegistry;
	readonly prefix: string;
	readonly excludeDevFiles: boolean;
	readonly io?: IO;
}

export type DumpAutoloadError =
	| ExecutableNotFound
	| DumpFailed
	| VendorDirLookupFailed
	| FileSystemError;

export interface ComposerOrchestrator {
	readonly getVersion: () => Effect.Effect<
		string,
		ExecutableNotFound | VersionCheckFailed
	>;
	readonly dumpAutoload: (
		options: DumpAutoloadOptions,
	) => Effect.Effect<void, DumpAutoloadError>;
}

/**
 * Arguments for `composer dump-autoload`.
 *
 * @pure true
 */
export function dumpAutoloadArgs(excludeDevFiles: boolean, io: IO): string[] {
	const args = ["dump-autoload", "--classmap-authoritative"];
	if (excludeDevFiles) {
		args.push("--no-dev");
	}
	const verbosity = subProcessVerbosityFlag(io.verbosity);
	if (verbosity !== null) {
		args.push(verbosity);
	}
	if (io.isDecorated()) {
		args.push("--ansi");
	}
	return args;
}

/**
 * Arguments for `composer config vendor-dir`.
 *
 * @pure true
 */
export function vendorDirArgs(io: IO): string[] {
	return io.isDecorated() ? ["config", "vendor-dir", "--ansi"] : ["config", "vendor-dir"];
}

/**
 * Path of the bootstrap file inside the vendor directory Composer printed.
 *
 * @pure true
 */
export function autoloadFilePath(vendorDirOutput: string): string {
	return `${vendorDirOutput.trim()}/autoload.php`;
}

export function createComposerOrchestrator(
	deps: ComposerOrchestratorDeps,
): ComposerOrchestrator {
	const env = composerEnvOverlay(deps.config.allowXdebug);

	const locateComposer = (): Effect.Effect<string, ExecutableNotFound> =>
		findExecutable(
			COMPOSER_EXECUTABLE,
			{
				searchPath: deps.config.searchPath,
				suffixes: deps.config.executableSuffixes,
			},
			deps.isExecutable ?? isExecutableFile,
		);

	const run = (
		executable: string,
		args: ReadonlyArray<string>,
	): Effect.Effect<ProcessResult> =>
		runProcess(deps.runner, {
			executable,
			args,
			env,
			cwd: deps.workingDirectory,
		});

	const getVersion = (): Effect.Effect<
		string,
		ExecutableNotFound | VersionCheckFailed
	> =>
		Effect.gen(function* () {
			const composer = yield* locateComposer();
			const result = yield* run(composer, ["--version"]);
			if (!isSuccessful(result)) {
				return yield* Effect.fail(new VersionCheckFailed({ failure: result }));
			}
			const version = parseComposerVersion(result.stdout);
			if (version === null) {
				return yield* Effect.fail(
					new VersionCheckFailed({ output: result.stdout }),
				);
			}
			return version;
		});

	const dumpAutoloader = (
		composer: string,
		excludeDevFiles: boolean,
		logger: CompilerLogger,
	): Effect.Effect<void, DumpFailed> =>
		Effect.gen(function* () {
			const args = dumpAutoloadArgs(excludeDevFiles, logger.io);
			logger.log(LOG_PREFIX.chevron, formatCommandLine(composer, args), "verbose");
			const result = yield* run(composer, args);
			if (!isSuccessful(result)) {
				return yield* Effect.fail(new DumpFailed({ failure: result }));
			}
			if (result.stdout !== "") {
				logger.io.writeln(result.stdout, "verbose");
			}
			if (result.stderr !== "") {
				logger.io.writeln(result.stderr, "verbose");
			}
		});

	const retrieveAutoloadFile = (
		composer: string,
		logger: CompilerLogger,
	): Effect.Effect<string, VendorDirLookupFailed> =>
		Effect.gen(function* () {
			const args = vendorDirArgs(logger.io);
			logger.log(LOG_PREFIX.chevron, formatCommandLine(composer, args), "verbose");
			const result = yield* run(composer, args);
			if (!isSuccessful(result)) {
				return yield* Effect.fail(new VendorDirLookupFailed({ failure: result }));
			}
			const file = autoloadFilePath(result.stdout);
			return deps.workingDirectory === undefined
				? file
				: path.resolve(deps.workingDirectory, file);
		});

	const dumpAutoload = (
		options: DumpAutoloadOptions,
	): Effect.Effect<void, DumpAutoloadError> =>
		Effect.gen(function* () {
			const logger = new CompilerLogger(options.io ?? createNullIO());
			const composer = yield* locateComposer();

			yield* dumpAutoloader(composer, options.excludeDevFiles, logger);

			if (options.prefix === "") {
				return;
			}

			const autoloadFile = yield* retrieveAutoloadFile(composer, logger);
			const contents = yield* readTextFile(autoloadFile);

			if (
				options.registry.count() > 0 &&
				findLoaderStatement(contents) === null
			) {
				logger.log(
					LOG_PREFIX.error,
					`No "return ComposerAutoloaderInit…::getLoader();" statement found in ${autoloadFile}; the relocation loader may not receive Composer's class loader.`,
				);
			}

			yield* writeTextFile(
				autoloadFile,
				rewriteAutoload(contents, options.registry),
			);
		});

	return { getVersion, dumpAutoload };
}
