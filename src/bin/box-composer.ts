#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

try {
	const code = main(process.argv.slice(2), {
		env: process.env,
		platform: process.platform,
		cwd: process.cwd(),
		isTTY: process.stdout.isTTY === true,
	});
	process.exit(code);
} catch (error) {
	console.error("Fatal error:", error);
	process.exit(1);
}
