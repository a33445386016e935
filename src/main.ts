// CHANGE: Thin APP delegator for programmatic use
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(|args|)

import { Either } from "effect";

import { type HostEnvironment, runComposer } from "./app/runComposer.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/cli.js";

/**
 * Parse arguments and run the requested command.
 *
 * @param args Arguments without the node and script entries
 * @returns ExitCode (0 | 1)
 */
export function main(args: ReadonlyArray<string>, host: HostEnvironment): ExitCode {
	return Either.match(parseCLIArgs(args), {
		onLeft: (error): ExitCode => {
			const report = host.sinks?.err ?? ((line: string): void => console.error(line));
			report(error.detail);
			report("");
			report(USAGE);
			return 1;
		},
		onRight: (options) => runComposer(options, host),
	});
}

export { runComposer } from "./app/runComposer.js";
export type { HostEnvironment } from "./app/runComposer.js";
export { rewriteAutoload, AUTOLOAD_PATTERNS, BOX_BANNER } from "./core/autoload/rewrite.js";
export { dumpScoperAutoload } from "./core/autoload/scoper-autoload.js";
export { SymbolsRegistry } from "./core/symbols/registry.js";
export { createComposerOrchestrator } from "./shell/composer/orchestrator.js";
