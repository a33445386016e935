// CHANGE: Immutable registry of exposed symbols and their prefixed aliases
// PURITY: CORE
// INVARIANT: count() = |functions| + |classes|; one entry per original symbol
// COMPLEXITY: O(1) lookups, O(n) copies on record

/**
 * One relocation rule: the symbol users call and the prefixed symbol
 * that actually exists in the scoped code.
 */
export type SymbolPair = readonly [original: string, prefixed: string];

export interface SymbolsRegistryData {
	readonly functions?: ReadonlyArray<SymbolPair>;
	readonly classes?: ReadonlyArray<SymbolPair>;
}

function normalizeSymbol(name: string): string {
	return name.replace(/^\\+/u, "");
}

function toMap(
	pairs: ReadonlyArray<SymbolPair>,
): ReadonlyMap<string, SymbolPair> {
	const map = new Map<string, SymbolPair>();
	for (const [original, prefixed] of pairs) {
		const key = normalizeSymbol(original);
		map.set(key, [key, normalizeSymbol(prefixed)]);
	}
	return map;
}

/**
 * Exposed functions and classes recorded while scoping the code.
 *
 * Names are stored fully qualified without the leading backslash.
 * Recording the same original twice keeps the latest alias, in the
 * position of the first record.
 */
export class SymbolsRegistry {
	private constructor(
		private readonly functions: ReadonlyMap<string, SymbolPair>,
		private readonly classes: ReadonlyMap<string, SymbolPair>,
	) {}

	/**
	 * Registry with nothing recorded.
	 *
	 * @pure true
	 * @complexity O(1)
	 */
	static empty(): SymbolsRegistry {
		return new SymbolsRegistry(new Map(), new Map());
	}

	/**
	 * Registry holding the given pairs, normalized and deduplicated.
	 *
	 * @pure true
	 * @complexity O(f + c)
	 */
	static create(data: SymbolsRegistryData): SymbolsRegistry {
		return new SymbolsRegistry(
			toMap(data.functions ?? []),
			toMap(data.classes ?? []),
		);
	}

	/**
	 * Copy of this registry with one more exposed function.
	 *
	 * @pure true
	 * @complexity O(f)
	 */
	recordFunction(original: string, prefixed: string): SymbolsRegistry {
		return new SymbolsRegistry(
			toMap([...this.functions.values(), [original, prefixed]]),
			this.classes,
		);
	}

	/**
	 * Copy of this registry with one more exposed class.
	 *
	 * @pure true
	 * @complexity O(c)
	 */
	recordClass(original: string, prefixed: string): SymbolsRegistry {
		return new SymbolsRegistry(
			this.functions,
			toMap([...this.classes.values(), [original, prefixed]]),
		);
	}

	/** Function pairs in recording order. */
	getRecordedFunctions(): ReadonlyArray<SymbolPair> {
		return [...this.functions.values()];
	}

	/** Class pairs in recording order. */
	getRecordedClasses(): ReadonlyArray<SymbolPair> {
		return [...this.classes.values()];
	}

	/**
	 * Number of recorded functions plus classes.
	 *
	 * @pure true
	 * @complexity O(1)
	 */
	count(): number {
		return this.functions.size + this.classes.size;
	}
}
