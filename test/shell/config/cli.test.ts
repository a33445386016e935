// CHANGE: Tests for command line parsing

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { Verbosity } from "../../../src/core/models.js";
import type { CLIOptions } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/cli.js";

const parsed = (args: readonly string[]): CLIOptions => {
	const result = parseCLIArgs(args);
	if (Either.isLeft(result)) {
		throw new Error(result.left.detail);
	}
	return result.right;
};

const usageError = (args: readonly string[]): string => {
	const result = parseCLIArgs(args);
	return Either.isLeft(result) ? result.left.detail : "";
};

describe("parseCLIArgs: defaults and commands", () => {
	it("returns defaults when no args provided", (): void => {
		expect(parsed([])).toEqual({
			command: "dump-autoload",
			prefix: "",
			noDev: false,
			verbosity: "normal",
		});
	});

	it("recognises the version command", (): void => {
		expect(parsed(["version"]).command).toBe("version");
	});

	it("lets --help win over a command", (): void => {
		expect(parsed(["--help", "version"]).command).toBe("help");
		expect(parsed(["version", "-h"]).command).toBe("help");
	});
});

describe("parseCLIArgs: options", () => {
	it("reads values from the next token or after '='", (): void => {
		const opts = parsed([
			"dump-autoload",
			"--prefix",
			"_HumbugBox",
			"--symbols=build/symbols.json",
			"-d",
			"app",
			"--no-dev",
		]);
		expect(opts).toEqual({
			command: "dump-autoload",
			prefix: "_HumbugBox",
			symbolsFile: "build/symbols.json",
			workingDir: "app",
			noDev: true,
			verbosity: "normal",
		});
	});

	it.each<[string, Verbosity]>([
		["-q", "quiet"],
		["-v", "verbose"],
		["-vv", "very-verbose"],
		["-vvv", "debug"],
	])("%s sets verbosity %s", (flag, verbosity): void => {
		expect(parsed([flag]).verbosity).toBe(verbosity);
	});

	it("forces decoration on and off", (): void => {
		expect(parsed(["--ansi"]).decorated).toBe(true);
		expect(parsed(["--no-ansi"]).decorated).toBe(false);
	});

	it("ignores empty string arguments", (): void => {
		expect(parsed(["", "version"]).command).toBe("version");
	});
});

describe("parseCLIArgs: usage errors", () => {
	it("rejects an option missing its value", (): void => {
		expect(usageError(["--prefix"])).toBe("Option --prefix expects a value.");
	});

	it("rejects unknown arguments and a second command", (): void => {
		expect(usageError(["--frobnicate"])).toBe('Unexpected argument "--frobnicate".');
		expect(usageError(["version", "version"])).toBe('Unexpected argument "version".');
	});
});
