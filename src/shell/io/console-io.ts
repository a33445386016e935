// CHANGE: Console-backed implementation of the IO sink
// PURITY: SHELL (console output)
// INVARIANT: writeln never writes when verbosity = "quiet"; writeError always writes
// COMPLEXITY: O(1) per line

import { Chalk, type ChalkInstance } from "chalk";

import type { IO } from "../../core/io.js";
import type { Verbosity } from "../../core/models.js";
import { isAtLeast } from "../../core/verbosity.js";

export interface IOOptions {
	readonly verbosity: Verbosity;
	readonly decorated: boolean;
}

/**
 * Where lines end up. Defaults to the console.
 */
export interface IOSinks {
	readonly out: (line: string) => void;
	readonly err: (line: string) => void;
}

const consoleSinks: IOSinks = {
	out: (line) => {
		console.log(line);
	},
	err: (line) => {
		console.error(line);
	},
};

/**
 * Create an IO sink writing through `sinks`.
 */
export function createIO(options: IOOptions, sinks: IOSinks = consoleSinks): IO {
	const { verbosity, decorated } = options;
	return {
		verbosity,
		isQuiet: () => verbosity === "quiet",
		isVerbose: () => isAtLeast(verbosity, "verbose"),
		isVeryVerbose: () => isAtLeast(verbosity, "very-verbose"),
		isDebug: () => verbosity === "debug",
		isDecorated: () => decorated,
		writeln: (message, level = "normal") => {
			if (verbosity !== "quiet" && isAtLeast(verbosity, level)) {
				sinks.out(message);
			}
		},
		writeError: (message) => {
			sinks.err(message);
		},
	};
}

/**
 * IO that swallows all output; used when the caller passes none.
 */
export function createNullIO(): IO {
	return createIO(
		{ verbosity: "quiet", decorated: false },
		{ out: () => undefined, err: () => undefined },
	);
}

/**
 * Chalk instance honouring the IO decoration flag.
 */
export function stylerFor(io: IO): ChalkInstance {
	return new Chalk({ level: io.isDecorated() ? 1 : 0 });
}
