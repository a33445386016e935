// CHANGE: Output sink contract shared by the orchestration and the CLI
// PURITY: CORE (interface only)

import type { Verbosity } from "./models.js";

/**
 * Verbosity-aware line writer.
 *
 * @invariant writeln(m, v) emits m iff verbosity ≥ v and verbosity ≠ "quiet"
 */
export interface IO {
	readonly verbosity: Verbosity;
	readonly isQuiet: () => boolean;
	readonly isVerbose: () => boolean;
	readonly isVeryVerbose: () => boolean;
	readonly isDebug: () => boolean;
	/** Whether ANSI styling is enabled. */
	readonly isDecorated: () => boolean;
	readonly writeln: (message: string, verbosity?: Verbosity) => void;
	readonly writeError: (message: string) => void;
}
