// CHANGE: Scope filter classifying nodes against an optional target range
// WHY: Allows partial-tree processing (e.g. a pasted fragment) without re-running the whole tree
// REF: REQ-SCOPE-FILTER
// FORMAT THEOREM:
//   scope = null ⇒ eligible
//   ¬valid(scope) ⇒ excluded
//   contains(scope, node) ⇒ eligible; overlaps(scope, node) ⇒ traverse-only; otherwise excluded
// PURITY: CORE
// INVARIANT: A collapsed scope excludes every node, so the loop ends on an empty action list
// COMPLEXITY: O(1)

import type { ScopeClass } from "../models.js";
import type { RangeMarker, TextRange } from "../types/index.js";
import { rangeContains, rangesOverlap } from "./range.js";

/**
 * Classify a node's range against the scope.
 *
 * @param nodeRange - Text range of the node
 * @param scope - Scope marker, or null for the whole tree
 *
 * @pure true (reads marker state only)
 * @complexity O(1)
 */
export function classifyNode(
	nodeRange: TextRange,
	scope: RangeMarker | null,
): ScopeClass {
	if (scope === null) return "eligible";
	if (!scope.isValid()) return "excluded";
	const scopeRange = scope.range();
	if (rangeContains(scopeRange, nodeRange)) return "eligible";
	if (rangesOverlap(scopeRange, nodeRange)) return "traverse-only";
	return "excluded";
}
