// CHANGE: Pure half-open range arithmetic
// WHY: Scope classification and analysis restriction share one definition of containment and overlap
// REF: REQ-SCOPE-FILTER
// FORMAT THEOREM: contains(a,b) ⇒ (b non-empty ⇒ overlaps(a,b))
// PURITY: CORE
// INVARIANT: Ranges are [start, end); touching ranges do not overlap
// NOTE: Overlap is strict. A node that only touches the scope is excluded
//       rather than traversed; an empty node on the scope boundary is still contained, hence eligible
// COMPLEXITY: O(1)

import type { TextRange } from "../types/index.js";

/**
 * True when `inner` lies entirely inside `outer`.
 *
 * @pure true
 * @complexity O(1)
 */
export const rangeContains = (outer: TextRange, inner: TextRange): boolean =>
	outer.start <= inner.start && inner.end <= outer.end;

/**
 * True when the two ranges share at least one offset.
 *
 * @pure true
 * @complexity O(1)
 */
export const rangesOverlap = (a: TextRange, b: TextRange): boolean =>
	a.start < b.end && b.start < a.end;

export const sameRange = (a: TextRange, b: TextRange): boolean =>
	a.start === b.start && a.end === b.end;
