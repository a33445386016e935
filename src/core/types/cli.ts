// CHANGE: CLI option types
// PURITY: CORE (types only)

import type { Verbosity } from "../models.js";

export type CLICommand = "dump-autoload" | "version" | "help";

/**
 * Options parsed from the command line.
 *
 * @property prefix Namespace prefix in effect; "" disables the autoload rewrite
 * @property symbolsFile JSON file holding the exposed symbols
 * @property noDev Pass `--no-dev` to Composer
 * @property decorated Forced ANSI on/off; undefined follows the terminal
 * @property workingDir Directory Composer runs in
 */
export interface CLIOptions {
	readonly command: CLICommand;
	readonly prefix: string;
	readonly symbolsFile?: string;
	readonly noDev: boolean;
	readonly verbosity: Verbosity;
	readonly decorated?: boolean;
	readonly workingDir?: string;
}
