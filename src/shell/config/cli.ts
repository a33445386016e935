// CHANGE: Command line parsing for the box-composer binary
// PURITY: SHELL (input only; no process.argv access here)
// INVARIANT: parseCLIArgs is total: every argv yields options or a CliUsageError
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { CliUsageError } from "../../core/errors.js";
import type { CLICommand, CLIOptions } from "../../core/types/index.js";

type ParseState = CLIOptions & { readonly commandSeen: boolean };

type FlagHandler = (current: ParseState) => ParseState;

type ValueHandler = (current: ParseState, value: string) => ParseState;

const flagHandlers: Partial<Record<string, FlagHandler>> = {
	"--no-dev": (current) => ({ ...current, noDev: true }),
	"-q": (current) => ({ ...current, verbosity: "quiet" }),
	"--quiet": (current) => ({ ...current, verbosity: "quiet" }),
	"-v": (current) => ({ ...current, verbosity: "verbose" }),
	"-vv": (current) => ({ ...current, verbosity: "very-verbose" }),
	"-vvv": (current) => ({ ...current, verbosity: "debug" }),
	"--ansi": (current) => ({ ...current, decorated: true }),
	"--no-ansi": (current) => ({ ...current, decorated: false }),
	"-h": (current) => ({ ...current, command: "help" }),
	"--help": (current) => ({ ...current, command: "help" }),
};

const valueHandlers: Partial<Record<string, ValueHandler>> = {
	"--prefix": (current, value) => ({ ...current, prefix: value }),
	"--symbols": (current, value) => ({ ...current, symbolsFile: value }),
	"--working-dir": (current, value) => ({ ...current, workingDir: value }),
	"-d": (current, value) => ({ ...current, workingDir: value }),
};

const commands: ReadonlySet<string> = new Set<CLICommand>([
	"dump-autoload",
	"version",
	"help",
]);

function isCommand(arg: string): arg is CLICommand {
	return commands.has(arg);
}

const defaults: ParseState = {
	command: "dump-autoload",
	prefix: "",
	noDev: false,
	verbosity: "normal",
	commandSeen: false,
};

// `--name=value` is split so that both spellings share one handler.
function splitInlineValue(arg: string): readonly [string, string | undefined] {
	const separator = arg.indexOf("=");
	if (!arg.startsWith("--") || separator === -1) {
		return [arg, undefined];
	}
	return [arg.slice(0, separator), arg.slice(separator + 1)];
}

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @example
 * ```ts
 * parseCLIArgs(["dump-autoload", "--prefix", "_HumbugBox", "--no-dev"]);
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string>,
): Either.Either<CLIOptions, CliUsageError> {
	let state = defaults;

	for (let index = 0; index < args.length; index += 1) {
		const raw = args[index] ?? "";
		if (raw === "") continue;

		const [name, inline] = splitInlineValue(raw);
		const flag = flagHandlers[name];
		const valued = valueHandlers[name];

		if (flag !== undefined && inline === undefined) {
			state = flag(state);
		} else if (valued !== undefined) {
			const value = inline ?? args[index + 1];
			if (value === undefined) {
				return Either.left(
					new CliUsageError({ detail: `Option ${name} expects a value.` }),
				);
			}
			if (inline === undefined) index += 1;
			state = valued(state, value);
		} else if (!raw.startsWith("-") && !state.commandSeen && isCommand(raw)) {
			state = {
				...state,
				command: state.command === "help" ? "help" : raw,
				commandSeen: true,
			};
		} else {
			return Either.left(
				new CliUsageError({ detail: `Unexpected argument "${raw}".` }),
			);
		}
	}

	const { commandSeen: _commandSeen, ...options } = state;
	return Either.right(options);
}

export const USAGE = [
	"Usage: box-composer [dump-autoload|version] [options]",
	"",
	"Commands:",
	"  dump-autoload   Regenerate the class map and wire the relocation loader (default)",
	"  version         Print the Composer version",
	"",
	"Options:",
	"  --prefix <prefix>       Namespace prefix in effect; empty skips the rewrite",
	"  --symbols <file>        JSON file with exposed functions and classes",
	"  --no-dev                Exclude dev dependencies from the class map",
	"  -d, --working-dir <dir> Directory Composer runs in",
	"  -q, -v, -vv, -vvv       Verbosity",
	"  --ansi, --no-ansi       Force or disable ANSI output",
	"  -h, --help              Show this help",
].join("\n");
