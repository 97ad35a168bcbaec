// CHANGE: Describe the tree under post-processing as a host-agnostic read interface
// WHY: The convergence engine must walk any translated tree without knowing its node taxonomy
// REF: REQ-TREE-HOST
// PURITY: CORE (types only)
// INVARIANT: Offsets are half-open [start, end) over the tree's source text
// COMPLEXITY: O(1)

/**
 * Half-open text range `[start, end)`.
 *
 * @invariant 0 <= start <= end
 */
export interface TextRange {
	readonly start: number;
	readonly end: number;
}

/**
 * Hooks entered around every exclusive mutation of a tree.
 *
 * Hosts that reject mutation outside a write phase implement this; the
 * mutation substrate calls `enter` before and `exit` after the work.
 */
export interface WriteGuard {
	readonly enter: () => void;
	readonly exit: () => void;
}

/**
 * Read access to a mutable syntax tree.
 *
 * @remarks
 * - `modificationStamp` is opaque: it only answers "did anything change".
 * - `isValid` turns false once a node is detached by a mutation elsewhere.
 * - `topLevelElements` are the direct children of the root that semantic
 *   analysis can be restricted to.
 */
export interface SyntaxTree<N> {
	readonly root: () => N;
	readonly children: (node: N) => ReadonlyArray<N>;
	readonly rangeOf: (node: N) => TextRange;
	readonly isValid: (node: N) => boolean;
	readonly topLevelElements: () => ReadonlyArray<N>;
	readonly modificationStamp: () => number;
	readonly writeGuard?: WriteGuard;
}

/**
 * Reference to a range of the tree's text that follows edits.
 *
 * @invariant range() is meaningful only while isValid() holds
 */
export interface RangeMarker {
	readonly isValid: () => boolean;
	readonly range: () => TextRange;
}
