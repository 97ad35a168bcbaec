// CHANGE: Pure half of the diagnostic snapshot provider
// WHY: Deciding what to analyze is pure; running the analyzer is an effect owned by the app layer
// REF: REQ-DIAGNOSTIC-SNAPSHOT
// FORMAT THEOREM:
//   scope = null ⇒ whole-tree
//   E = {e ∈ topLevel | valid(scope) ∧ overlaps(range(e), scope)}; E = ∅ ⇒ nothing; else elements(E)
// PURITY: CORE
// INVARIANT: An invalid scope never triggers analysis
// COMPLEXITY: O(k) where k = top-level elements

import type {
	AnalysisTarget,
	Diagnostic,
	DiagnosticSet,
	RangeMarker,
	SyntaxTree,
	TextRange,
} from "../types/index.js";
import { rangesOverlap, sameRange } from "./range.js";

export const emptyDiagnostics: DiagnosticSet = { entries: [] };

/**
 * Wrap analyzer output as a snapshot set.
 *
 * @pure true
 */
export const diagnosticSetOf = (
	entries: ReadonlyArray<Diagnostic>,
): DiagnosticSet => ({ entries });

/**
 * Decide what the analyzer has to look at for this snapshot.
 *
 * @returns The analysis target, or null when there is nothing to analyze
 *
 * @pure true (reads tree and marker state only)
 * @complexity O(k)
 */
export function analysisTargetFor<N>(
	tree: SyntaxTree<N>,
	scope: RangeMarker | null,
): AnalysisTarget<N> | null {
	if (scope === null) return { kind: "whole-tree" };
	if (!scope.isValid()) return null;
	const scopeRange = scope.range();
	const elements = tree
		.topLevelElements()
		.filter((element) => rangesOverlap(tree.rangeOf(element), scopeRange));
	return elements.length === 0 ? null : { kind: "elements", elements };
}

/**
 * Diagnostics reported at exactly `range`.
 *
 * @pure true
 * @complexity O(d) where d = |diagnostics|
 */
export const diagnosticsAt = (
	diagnostics: DiagnosticSet,
	range: TextRange,
): ReadonlyArray<Diagnostic> =>
	diagnostics.entries.filter((d) => sameRange(d.range, range));
