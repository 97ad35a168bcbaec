// CHANGE: Model semantic diagnostics as immutable snapshot data
// WHY: Rules read diagnostics computed for one tree snapshot; a new set is built every round
// REF: REQ-DIAGNOSTIC-SNAPSHOT
// PURITY: CORE (types only)
// INVARIANT: A DiagnosticSet is never patched, only replaced
// COMPLEXITY: O(1)

import type { TextRange } from "./tree.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/**
 * One semantic fact about the tree (e.g. `TS2304` at an identifier).
 */
export interface Diagnostic {
	readonly code: string;
	readonly message: string;
	readonly severity: DiagnosticSeverity;
	readonly range: TextRange;
}

/**
 * Diagnostics valid for exactly one snapshot of the tree.
 */
export interface DiagnosticSet {
	readonly entries: ReadonlyArray<Diagnostic>;
}

/**
 * What the semantic analyzer is asked to look at.
 *
 * @invariant elements.length > 0 for the "elements" variant
 */
export type AnalysisTarget<N> =
	| { readonly kind: "whole-tree" }
	| { readonly kind: "elements"; readonly elements: ReadonlyArray<N> };
