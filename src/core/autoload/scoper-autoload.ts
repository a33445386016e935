// CHANGE: Generate the PHP relocation loader for a symbols registry
// WHY: Exposed symbols must resolve to their prefixed counterparts at runtime
// PURITY: CORE
// INVARIANT: output starts with "<?php", contains SCOPER_BANNER once and exactly one `$loader = ` line
// COMPLEXITY: O(n) where n = registry.count()

import type { SymbolPair, SymbolsRegistry } from "../symbols/registry.js";

/**
 * Banner the generator writes under the open tag.
 */
export const SCOPER_BANNER = "scoper-autoload.php @generated by PhpScoper";

const INDENT = "    ";
const DOCS_URL =
	"https://github.com/humbug/php-scoper/blob/master/docs/further-reading.md";

function indent(lines: ReadonlyArray<string>): string[] {
	return lines.map((line) => (line === "" ? line : `${INDENT}${line}`));
}

function namespaceOf(symbol: string): string {
	const separator = symbol.lastIndexOf("\\");
	return separator === -1 ? "" : symbol.slice(0, separator);
}

function shortNameOf(symbol: string): string {
	return symbol.slice(symbol.lastIndexOf("\\") + 1);
}

function classStatement([original, prefixed]: SymbolPair): string[] {
	return [
		`if (!class_exists('${original}', false) && !interface_exists('${original}', false) && !trait_exists('${original}', false)) {`,
		`${INDENT}spl_autoload_call('${prefixed}');`,
		"}",
	];
}

function functionStatement([original, prefixed]: SymbolPair): string[] {
	return [
		`if (!function_exists('${original}')) {`,
		`${INDENT}function ${shortNameOf(original)}() {`,
		`${INDENT}${INDENT}return \\${prefixed}(...func_get_args());`,
		`${INDENT}}`,
		"}",
	];
}

function section(
	title: string,
	anchor: string,
	statements: ReadonlyArray<string[]>,
): string[] {
	return [
		`// ${title}. For more information see:`,
		`// ${DOCS_URL}#${anchor}`,
		...statements.flat(),
	];
}

function groupByNamespace(
	pairs: ReadonlyArray<SymbolPair>,
): ReadonlyMap<string, SymbolPair[]> {
	const groups = new Map<string, SymbolPair[]>();
	for (const pair of pairs) {
		const namespace = namespaceOf(pair[0]);
		const group = groups.get(namespace) ?? [];
		group.push(pair);
		groups.set(namespace, group);
	}
	return groups;
}

function namespaceBlock(namespace: string, body: ReadonlyArray<string>): string[] {
	const opening = namespace === "" ? "namespace {" : `namespace ${namespace} {`;
	return [opening, ...indent(body), "}", ""];
}

const LOADER_STATEMENT = "$loader = require_once __DIR__.'/autoload.php';";
const RETURN_STATEMENT = "return $loader;";

function dumpFlat(
	classes: ReadonlyArray<SymbolPair>,
	functions: ReadonlyArray<SymbolPair>,
): string[] {
	const lines = [LOADER_STATEMENT, ""];
	if (classes.length > 0) {
		lines.push(
			...section("Exposed classes", "exposing-classes", classes.map(classStatement)),
			"",
		);
	}
	if (functions.length > 0) {
		lines.push(
			...section(
				"Exposed functions",
				"exposing-functions",
				functions.map(functionStatement),
			),
			"",
		);
	}
	lines.push(RETURN_STATEMENT, "");
	return lines;
}

// Functions declared outside the global namespace need bracketed
// namespace blocks, and PHP then forbids code outside any block.
function dumpNamespaced(
	classes: ReadonlyArray<SymbolPair>,
	functions: ReadonlyArray<SymbolPair>,
): string[] {
	const lines = namespaceBlock("", [LOADER_STATEMENT]);
	if (classes.length > 0) {
		lines.push(
			...namespaceBlock(
				"",
				section("Exposed classes", "exposing-classes", classes.map(classStatement)),
			),
		);
	}
	for (const [namespace, group] of groupByNamespace(functions)) {
		lines.push(
			...namespaceBlock(
				namespace,
				section("Exposed functions", "exposing-functions", group.map(functionStatement)),
			),
		);
	}
	lines.push(...namespaceBlock("", [RETURN_STATEMENT]));
	return lines;
}

/**
 * Dump the relocation loader source for a registry.
 *
 * The loader requires Composer's `autoload.php`, triggers autoloading of
 * prefixed classes under their original names and declares forwarding
 * functions for exposed functions.
 *
 * @pure true
 */
export function dumpScoperAutoload(registry: SymbolsRegistry): string {
	const classes = registry.getRecordedClasses();
	const functions = registry.getRecordedFunctions();
	const namespaced = functions.some(([original]) => namespaceOf(original) !== "");
	const body = namespaced
		? dumpNamespaced(classes, functions)
		: dumpFlat(classes, functions);
	return ["<?php", "", `// ${SCOPER_BANNER}`, "", ...body].join("\n");
}
