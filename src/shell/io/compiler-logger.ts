// CHANGE: Prefixed progress logger on top of the IO sink
// PURITY: SHELL (delegates to IO)
// INVARIANT: log(p, m, v) writes exactly one line "<indent><p> <m>" at verbosity v
// COMPLEXITY: O(|m|)

import { match } from "ts-pattern";

import type { IO } from "../../core/io.js";
import type { Verbosity } from "../../core/models.js";
import { stylerFor } from "./console-io.js";

export const LOG_PREFIX = {
	error: "!",
	question: "?",
	star: "*",
	plus: "+",
	minus: "-",
	chevron: ">",
} as const;

export type LogPrefix = (typeof LOG_PREFIX)[keyof typeof LOG_PREFIX];

export class CompilerLogger {
	constructor(readonly io: IO) {}

	log(prefix: LogPrefix, message: string, verbosity: Verbosity = "normal"): void {
		const style = stylerFor(this.io);
		const rendered = match(prefix)
			.with("!", (p) => style.red(p))
			.with("*", (p) => style.green(p))
			.with("?", (p) => style.yellow(p))
			.with("+", "-", (p) => `  ${style.yellow(p)}`)
			.with(">", (p) => `    ${style.yellow(p)}`)
			.exhaustive();
		this.io.writeln(`${rendered} ${message}`, verbosity);
	}
}
