// CHANGE: Splice Composer's bootstrap into the relocation loader
// WHY: The relocation loader needs Composer's ClassLoader instance before it runs
// PURITY: CORE
// INVARIANT: registry.count() = 0 ⇒ rewriteAutoload(s, registry) = s
// INVARIANT: registry.count() > 0 ⇒ output has one "<?php" and no "\n\n\n"
// COMPLEXITY: O(n + m) where n = |source|, m = |generated loader|

import type { SymbolsRegistry } from "../symbols/registry.js";
import { dumpScoperAutoload, SCOPER_BANNER } from "./scoper-autoload.js";

/**
 * Banner written in place of the generator's own.
 */
export const BOX_BANNER = "@generated by Humbug Box";

/**
 * Every pattern that depends on the output format of Composer or of the
 * relocation loader generator. Update here when either format changes.
 */
export const AUTOLOAD_PATTERNS = {
	openTag: "<?php",
	composerReturn: /return (ComposerAutoloaderInit.+::getLoader\(\));/gu,
	scoperBanner: new RegExp(SCOPER_BANNER.replaceAll(".", "\\."), "gu"),
	scoperLoaderLine: /(\s*\$loader = .*)/gu,
	blankLineRun: /\n{2,}/gu,
} as const;

/**
 * Produces the relocation loader text for a registry.
 */
export type ScoperAutoloadDumper = (registry: SymbolsRegistry) => string;

/**
 * Locate Composer's `return ComposerAutoloaderInit…::getLoader();` statement.
 *
 * @returns The initialiser expression, or null when the bootstrap does not
 *          contain the statement (for instance because it was already rewritten)
 * @pure true
 */
export function findLoaderStatement(source: string): string | null {
	const pattern = new RegExp(AUTOLOAD_PATTERNS.composerReturn.source, "u");
	return pattern.exec(source)?.[1] ?? null;
}

/**
 * Turn `return X::getLoader();` into `$loader = X::getLoader();` and drop open tags.
 *
 * @pure true
 */
export function toLoaderAssignment(source: string): string {
	return source
		.replaceAll(AUTOLOAD_PATTERNS.openTag, "")
		.replace(
			AUTOLOAD_PATTERNS.composerReturn,
			(_statement, initializer: string) => `$loader = ${initializer};`,
		);
}

/**
 * Collapse runs of blank lines into a single blank line.
 *
 * @pure true
 */
export function collapseBlankLines(source: string): string {
	return source.replace(AUTOLOAD_PATTERNS.blankLineRun, "\n\n");
}

/**
 * Rewrite Composer's `autoload.php` so that it builds Composer's loader and
 * then runs the relocation loader on top of it.
 *
 * Not idempotent: once rewritten, the bootstrap no longer contains the
 * `return …::getLoader();` statement, and a second pass splices it verbatim.
 *
 * @param source Current contents of `vendor/autoload.php`
 * @param registry Symbols exposed while scoping
 * @param dump Relocation loader generator
 * @returns New bootstrap contents, or `source` itself for an empty registry
 *
 * @pure true
 */
export function rewriteAutoload(
	source: string,
	registry: SymbolsRegistry,
	dump: ScoperAutoloadDumper = dumpScoperAutoload,
): string {
	if (registry.count() === 0) {
		return source;
	}

	const autoload = toLoaderAssignment(source);

	const scoperStatements = dump(registry)
		.replace(AUTOLOAD_PATTERNS.scoperBanner, BOX_BANNER)
		.replace(AUTOLOAD_PATTERNS.scoperLoaderLine, () => autoload);

	return collapseBlankLines(scoperStatements);
}
