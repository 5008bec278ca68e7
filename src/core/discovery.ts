// CHANGE: Pure filtering and ordering of discovered input paths
// WHY: Discovery order must be deterministic regardless of readdir order
// FORMAT THEOREM: sortInputPaths(ps) is a total order on segment lists (lexicographic per segment, prefix first)
// PURITY: CORE
// INVARIANT: `a/b.cnf` < `a-b.cnf` because segments are compared, not joined strings
// COMPLEXITY: O(n log n · d) where n = |paths|, d = depth

export const CNF_EXTENSION = ".cnf";

/**
 * Case-sensitive suffix check; a file named exactly `.cnf` qualifies.
 *
 * @pure true
 */
export function isCnfFileName(name: string): boolean {
	return name.endsWith(CNF_EXTENSION);
}

/**
 * Compare two names by Unicode code point. Plain `<` compares UTF-16 code
 * units, which puts astral characters before U+E000..U+FFFF.
 *
 * @pure true
 */
export function compareCodePoints(a: string, b: string): number {
	const left = Array.from(a);
	const right = Array.from(b);
	const shared = Math.min(left.length, right.length);
	for (let i = 0; i < shared; i++) {
		const diff =
			(left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
		if (diff !== 0) return diff;
	}
	return left.length - right.length;
}

/**
 * Compare two relative paths given as segment lists.
 *
 * @returns negative if a < b, positive if a > b, 0 if equal
 * @pure true
 */
export function compareSegments(
	a: ReadonlyArray<string>,
	b: ReadonlyArray<string>,
): number {
	const shared = Math.min(a.length, b.length);
	for (let i = 0; i < shared; i++) {
		const order = compareCodePoints(a[i] ?? "", b[i] ?? "");
		if (order !== 0) return order;
	}
	return a.length - b.length;
}

/**
 * Sort relative segment lists into run order without mutating the input.
 */
export function sortInputPaths(
	paths: ReadonlyArray<ReadonlyArray<string>>,
): ReadonlyArray<ReadonlyArray<string>> {
	return [...paths].sort(compareSegments);
}
