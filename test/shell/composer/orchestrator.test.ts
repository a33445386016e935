// CHANGE: Tests for the Composer orchestration against a scripted process runner

import { Effect, Either } from "effect";
import * as path from "node:path";
import { describe, expect, it } from "vitest";

import { rewriteAutoload } from "../../../src/core/autoload/rewrite.js";
import { SymbolsRegistry } from "../../../src/core/symbols/registry.js";
import {
	autoloadFilePath,
	createComposerOrchestrator,
	type DumpAutoloadOptions,
} from "../../../src/shell/composer/orchestrator.js";
import type { RuntimeConfig } from "../../../src/shell/config/runtime.js";
import {
	composerAutoload,
	recordingIO,
	type ScriptedResponse,
	scriptedRunner,
} from "../../utils/builders.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

const COMPOSER = path.join("/opt/bin", "composer");

const config = (over: Partial<RuntimeConfig> = {}): RuntimeConfig => ({
	allowXdebug: false,
	searchPath: ["/opt/bin"],
	executableSuffixes: [".phar"],
	...over,
});

const registry = SymbolsRegistry.empty().recordClass("Foo", "_HumbugBox\\Foo");

interface Fixture {
	readonly project: TempProject;
	readonly calls: ReturnType<typeof scriptedRunner>["calls"];
	readonly dump: (options: Partial<DumpAutoloadOptions>) => Either.Either<void, { readonly _tag: string }>;
}

const withFixture = (
	responses: Readonly<Record<string, ScriptedResponse>>,
	body: (fixture: Fixture) => void,
	configOver: Partial<RuntimeConfig> = {},
): void => {
	const project = createTempProject([{ path: "vendor/autoload.php", contents: composerAutoload() }]);
	const { runner, calls } = scriptedRunner({
		config: { stdout: `${project.resolve("vendor")}\n` },
		...responses,
	});
	const orchestrator = createComposerOrchestrator({
		config: config(configOver),
		runner,
		isExecutable: (file) => file === COMPOSER,
	});
	try {
		body({
			project,
			calls,
			dump: (options) =>
				Effect.runSync(
					Effect.either(
						orchestrator.dumpAutoload({
							registry,
							prefix: "_HumbugBox",
							excludeDevFiles: false,
							...options,
						}),
					),
				),
		});
	} finally {
		project.cleanup();
	}
};

describe("dumpAutoload: happy paths", () => {
	it("dumps without dev files, queries vendor-dir and rewrites autoload.php", (): void => {
		withFixture({}, ({ project, calls, dump }) => {
			const outcome = dump({ excludeDevFiles: true });

			expect(Either.isRight(outcome)).toBeTruthy();
			expect(calls.map((call) => [call.executable, ...call.args])).toEqual([
				[COMPOSER, "dump-autoload", "--classmap-authoritative", "--no-dev"],
				[COMPOSER, "config", "vendor-dir"],
			]);
			expect(project.read("vendor/autoload.php")).toBe(
				rewriteAutoload(composerAutoload(), registry),
			);
		});
	});

	it("does not touch autoload.php without a prefix", (): void => {
		withFixture({}, ({ project, calls, dump }) => {
			expect(Either.isRight(dump({ prefix: "" }))).toBeTruthy();
			expect(calls).toHaveLength(1);
			expect(calls[0]?.args).toEqual(["dump-autoload", "--classmap-authoritative"]);
			expect(project.read("vendor/autoload.php")).toBe(composerAutoload());
		});
	});

	it("writes the bootstrap back unchanged for an empty registry", (): void => {
		withFixture({}, ({ project, dump }) => {
			expect(Either.isRight(dump({ registry: SymbolsRegistry.empty() }))).toBeTruthy();
			expect(project.read("vendor/autoload.php")).toBe(composerAutoload());
		});
	});
});

describe("dumpAutoload: sub-process flags and environment", () => {
	it("forwards debug verbosity and decoration", (): void => {
		withFixture({}, ({ calls, dump }) => {
			const { io } = recordingIO("debug", true);
			dump({ io });
			expect(calls.map((call) => call.args)).toEqual([
				["dump-autoload", "--classmap-authoritative", "-vvv", "--ansi"],
				["config", "vendor-dir", "--ansi"],
			]);
		});
	});

	it("passes COMPOSER_ALLOW_XDEBUG only when allowed", (): void => {
		withFixture(
			{},
			({ calls, dump }) => {
				dump({});
				expect(calls.map((call) => call.env)).toEqual([
					{ COMPOSER_ALLOW_XDEBUG: "1" },
					{ COMPOSER_ALLOW_XDEBUG: "1" },
				]);
			},
			{ allowXdebug: true },
		);
		withFixture({}, ({ calls, dump }) => {
			dump({});
			expect(calls.map((call) => call.env)).toEqual([{}, {}]);
		});
	});

	it("logs command lines and Composer output when verbose", (): void => {
		withFixture(
			{ "dump-autoload": { stdout: "Generated optimized autoload files\n", stderr: "" } },
			({ dump }) => {
				const { io, out } = recordingIO("verbose");
				dump({ io });
				expect(out).toEqual([
					`    > '${COMPOSER}' 'dump-autoload' '--classmap-authoritative'`,
					"Generated optimized autoload files\n",
					`    > '${COMPOSER}' 'config' 'vendor-dir'`,
				]);
			},
		);
	});

	it("writes Composer's error output after its standard output when verbose", (): void => {
		withFixture(
			{ "dump-autoload": { stdout: "Generated\n", stderr: "Warning: Ambiguous class resolution\n" } },
			({ dump }) => {
				const { io, out } = recordingIO("verbose");
				dump({ io });
				expect(out).toEqual([
					`    > '${COMPOSER}' 'dump-autoload' '--classmap-authoritative'`,
					"Generated\n",
					"Warning: Ambiguous class resolution\n",
					`    > '${COMPOSER}' 'config' 'vendor-dir'`,
				]);
			},
		);
	});

	it("stays silent at normal verbosity", (): void => {
		withFixture({ "dump-autoload": { stdout: "Generated\n" } }, ({ dump }) => {
			const { io, out } = recordingIO("normal");
			dump({ io });
			expect(out).toEqual([]);
		});
	});

	it("keeps Composer's error output hidden at normal verbosity", (): void => {
		withFixture(
			{ "dump-autoload": { stdout: "", stderr: "Warning: Ambiguous class resolution\n" } },
			({ dump }) => {
				const { io, out } = recordingIO("normal");
				dump({ io });
				expect(out).toEqual([]);
			},
		);
	});
});

describe("dumpAutoload: failures", () => {
	it("fails with ExecutableNotFound before spawning anything", (): void => {
		withFixture(
			{},
			({ project, calls, dump }) => {
				const outcome = dump({});
				expect(Either.isLeft(outcome) && outcome.left._tag).toBe("ExecutableNotFound");
				expect(calls).toHaveLength(0);
				expect(project.read("vendor/autoload.php")).toBe(composerAutoload());
			},
			{ searchPath: ["/elsewhere"] },
		);
	});

	it("fails with DumpFailed and stops", (): void => {
		withFixture({ "dump-autoload": { exitCode: 1, stderr: "boom" } }, ({ project, calls, dump }) => {
			const outcome = dump({});
			expect(Either.isLeft(outcome) && outcome.left._tag).toBe("DumpFailed");
			expect(calls).toHaveLength(1);
			expect(project.read("vendor/autoload.php")).toBe(composerAutoload());
		});
	});

	it("fails with VendorDirLookupFailed and leaves autoload.php alone", (): void => {
		withFixture({ config: { exitCode: 2, stderr: "no composer.json" } }, ({ project, dump }) => {
			const outcome = dump({});
			expect(Either.isLeft(outcome) && outcome.left._tag).toBe("VendorDirLookupFailed");
			expect(project.read("vendor/autoload.php")).toBe(composerAutoload());
		});
	});

	it("fails with FileSystemError when the bootstrap is missing", (): void => {
		withFixture({ config: { stdout: "/nonexistent/vendor\n" } }, ({ dump }) => {
			const outcome = dump({});
			expect(Either.isLeft(outcome) && outcome.left._tag).toBe("FileSystemError");
		});
	});

	it("warns when the bootstrap has no getLoader return statement", (): void => {
		const project = createTempProject([
			{ path: "vendor/autoload.php", contents: "<?php\nrequire 'custom.php';\n" },
		]);
		try {
			const { runner } = scriptedRunner({ config: { stdout: project.resolve("vendor") } });
			const orchestrator = createComposerOrchestrator({
				config: config(),
				runner,
				isExecutable: (file) => file === COMPOSER,
			});
			const { io, out } = recordingIO("normal");
			Effect.runSync(
				orchestrator.dumpAutoload({ registry, prefix: "_HumbugBox", excludeDevFiles: false, io }),
			);
			expect(out).toEqual([
				`! No "return ComposerAutoloaderInit…::getLoader();" statement found in ${project.resolve("vendor")}/autoload.php; the relocation loader may not receive Composer's class loader.`,
			]);
		} finally {
			project.cleanup();
		}
	});
});

describe("getVersion", () => {
	const version = (response: ScriptedResponse): Either.Either<string, { readonly _tag: string }> => {
		const { runner } = scriptedRunner({ "--version": response });
		const orchestrator = createComposerOrchestrator({
			config: config(),
			runner,
			isExecutable: (file) => file === COMPOSER,
		});
		return Effect.runSync(Effect.either(orchestrator.getVersion()));
	};

	it("returns the parsed version", (): void => {
		const outcome = version({ stdout: "Composer version 2.6.5 2023-10-06 10:11:52\n" });
		expect(Either.isRight(outcome) && outcome.right).toBe("2.6.5");
	});

	it("fails with VersionCheckFailed on unrecognised output", (): void => {
		const outcome = version({ stdout: "garbage output" });
		expect(Either.isLeft(outcome) && outcome.left._tag).toBe("VersionCheckFailed");
	});

	it("fails with VersionCheckFailed on a non-zero exit", (): void => {
		const outcome = version({ exitCode: 255, stderr: "PHP Fatal error" });
		expect(Either.isLeft(outcome) && outcome.left._tag).toBe("VersionCheckFailed");
	});
});

describe("autoloadFilePath", () => {
	it("trims Composer's output and appends autoload.php", (): void => {
		expect(autoloadFilePath("  /project/vendor\n")).toBe("/project/vendor/autoload.php");
	});
});
