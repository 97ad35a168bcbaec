// CHANGE: In-memory syntax tree host with tagged nodes, edit-tracking range markers and a write guard
// WHY: Embedders bring their own node taxonomy; the engine needs a concrete mutable tree to run against
// REF: REQ-TREE-HOST
// FORMAT THEOREM:
//   text(leaf) = leaf.text; text(branch) = concat(map(text, children))
//   range(node) = [offset(node), offset(node) + |text(node)|)
//   mutate ⇒ stamp' = stamp + 1 ∧ ∀ detached d: ¬valid(d)
// PURITY: SHELL (mutable state)
// INVARIANT: With guarding enabled, mutation outside the write guard throws
// COMPLEXITY: O(n) per mutation (ranges are recomputed lazily once per stamp)

import type {
	RangeMarker,
	SyntaxTree,
	TextRange,
	WriteGuard,
} from "../../core/types/index.js";

/**
 * Description of a node to build: a leaf carries text, a branch carries children.
 */
export type NodeSpec =
	| { readonly kind: string; readonly text: string }
	| { readonly kind: string; readonly children: ReadonlyArray<NodeSpec> };

export const leaf = (kind: string, text: string): NodeSpec => ({ kind, text });

export const branch = (
	kind: string,
	children: ReadonlyArray<NodeSpec>,
): NodeSpec => ({ kind, children });

/**
 * Public view of a node. Identity is the object itself.
 */
export interface MemoryNode {
	readonly id: number;
	readonly kind: string;
}

interface NodeState {
	readonly node: MemoryNode;
	text: string | null;
	children: NodeState[];
	parent: NodeState | null;
}

export interface DisposableRangeMarker extends RangeMarker {
	readonly dispose: () => void;
}

/**
 * Mutable tree over `MemoryNode`s.
 */
export interface MemoryTree extends SyntaxTree<MemoryNode> {
	readonly text: () => string;
	readonly textOf: (node: MemoryNode) => string;
	readonly parentOf: (node: MemoryNode) => MemoryNode | null;
	/** Replace `node` with a freshly built subtree; returns the new node. */
	readonly replace: (node: MemoryNode, spec: NodeSpec) => MemoryNode;
	readonly remove: (node: MemoryNode) => void;
	readonly setText: (node: MemoryNode, text: string) => void;
	readonly insertChild: (
		parent: MemoryNode,
		index: number,
		spec: NodeSpec,
	) => MemoryNode;
	readonly createRangeMarker: (start: number, end: number) => DisposableRangeMarker;
}

export interface MemoryTreeOptions {
	/** Reject mutation outside the write guard (default true). */
	readonly guarded?: boolean;
}

export interface MarkerState {
	start: number;
	end: number;
	valid: boolean;
}

/**
 * Move a marker across an edit replacing `[editStart, editEnd)` by `insertedLength` characters.
 *
 * @pure false (updates `marker` in place)
 * @invariant edits strictly inside the marker keep it valid; edits across its boundary invalidate it
 */
export function shiftMarker(
	marker: MarkerState,
	editStart: number,
	editEnd: number,
	insertedLength: number,
): void {
	const delta = insertedLength - (editEnd - editStart);
	if (editEnd <= marker.start) {
		marker.start += delta;
		marker.end += delta;
	} else if (editStart >= marker.end) {
		return;
	} else if (marker.start <= editStart && editEnd <= marker.end) {
		marker.end += delta;
	} else {
		marker.valid = false;
	}
}

/**
 * Build a mutable in-memory tree from `spec`.
 *
 * @pure false
 * @example
 * ```ts
 * const tree = createMemoryTree(branch("file", [leaf("x", "X")]));
 * tree.text(); // "X"
 * ```
 */
export function createMemoryTree(
	spec: NodeSpec,
	options: MemoryTreeOptions = {},
): MemoryTree {
	const guarded = options.guarded ?? true;
	const states = new Map<MemoryNode, NodeState>();
	const markers = new Set<MarkerState>();
	let nextId = 0;
	let stamp = 0;
	let guardDepth = 0;
	let layout: { stamp: number; ranges: Map<MemoryNode, TextRange> } | null =
		null;

	const build = (nodeSpec: NodeSpec, parent: NodeState | null): NodeState => {
		const node: MemoryNode = { id: nextId++, kind: nodeSpec.kind };
		const state: NodeState = {
			node,
			text: "text" in nodeSpec ? nodeSpec.text : null,
			children: [],
			parent,
		};
		if ("children" in nodeSpec) {
			state.children = nodeSpec.children.map((child) => build(child, state));
		}
		states.set(node, state);
		return state;
	};

	const detach = (state: NodeState): void => {
		states.delete(state.node);
		for (const child of state.children) detach(child);
	};

	const rootState = build(spec, null);

	const stateOf = (node: MemoryNode): NodeState => {
		const state = states.get(node);
		if (state === undefined) {
			throw new Error(`node #${node.id} (${node.kind}) is not part of the tree`);
		}
		return state;
	};

	const textOfState = (state: NodeState): string =>
		state.text ?? state.children.map(textOfState).join("");

	const ranges = (): Map<MemoryNode, TextRange> => {
		if (layout !== null && layout.stamp === stamp) return layout.ranges;
		const computed = new Map<MemoryNode, TextRange>();
		const place = (state: NodeState, start: number): number => {
			let end = start;
			if (state.text === null) {
				for (const child of state.children) end = place(child, end);
			} else {
				end += state.text.length;
			}
			computed.set(state.node, { start, end });
			return end;
		};
		place(rootState, 0);
		layout = { stamp, ranges: computed };
		return computed;
	};

	const rangeOf = (node: MemoryNode): TextRange => {
		const range = ranges().get(node);
		if (range === undefined) {
			throw new Error(`node #${node.id} (${node.kind}) is not part of the tree`);
		}
		return range;
	};

	const assertWritable = (operation: string): void => {
		if (guarded && guardDepth === 0) {
			throw new Error(`${operation} outside exclusive mutation`);
		}
	};

	const commit = (edit: TextRange, insertedLength: number): void => {
		stamp += 1;
		for (const marker of markers) {
			shiftMarker(marker, edit.start, edit.end, insertedLength);
			if (!marker.valid) markers.delete(marker);
		}
	};

	const parentFor = (state: NodeState, operation: string): NodeState => {
		if (state.parent === null) throw new Error(`cannot ${operation} the root`);
		return state.parent;
	};

	const writeGuard: WriteGuard = {
		enter: () => {
			guardDepth += 1;
		},
		exit: () => {
			guardDepth = Math.max(0, guardDepth - 1);
		},
	};

	return {
		root: () => rootState.node,
		children: (node) => stateOf(node).children.map((child) => child.node),
		rangeOf,
		isValid: (node) => states.has(node),
		topLevelElements: () => rootState.children.map((child) => child.node),
		modificationStamp: () => stamp,
		writeGuard,
		text: () => textOfState(rootState),
		textOf: (node) => textOfState(stateOf(node)),
		parentOf: (node) => stateOf(node).parent?.node ?? null,
		replace: (node, nodeSpec) => {
			assertWritable("replace");
			const state = stateOf(node);
			const parent = parentFor(state, "replace");
			const edit = rangeOf(node);
			const fresh = build(nodeSpec, parent);
			parent.children = parent.children.map((child) =>
				child === state ? fresh : child,
			);
			detach(state);
			commit(edit, textOfState(fresh).length);
			return fresh.node;
		},
		remove: (node) => {
			assertWritable("remove");
			const state = stateOf(node);
			const parent = parentFor(state, "remove");
			const edit = rangeOf(node);
			parent.children = parent.children.filter((child) => child !== state);
			detach(state);
			commit(edit, 0);
		},
		setText: (node, text) => {
			assertWritable("setText");
			const state = stateOf(node);
			if (state.text === null) {
				throw new Error(`node #${node.id} (${node.kind}) is not a leaf`);
			}
			const edit = rangeOf(node);
			state.text = text;
			commit(edit, text.length);
		},
		insertChild: (parentNode, index, nodeSpec) => {
			assertWritable("insertChild");
			const parent = stateOf(parentNode);
			if (parent.text !== null) {
				throw new Error(`node #${parentNode.id} (${parentNode.kind}) is a leaf`);
			}
			const at = Math.max(0, Math.min(index, parent.children.length));
			const next = parent.children[at];
			const offset =
				next === undefined ? rangeOf(parentNode).end : rangeOf(next.node).start;
			const fresh = build(nodeSpec, parent);
			parent.children = [
				...parent.children.slice(0, at),
				fresh,
				...parent.children.slice(at),
			];
			commit({ start: offset, end: offset }, textOfState(fresh).length);
			return fresh.node;
		},
		createRangeMarker: (start, end) => {
			const marker: MarkerState = { start, end, valid: start <= end };
			if (marker.valid) markers.add(marker);
			return {
				isValid: () => marker.valid,
				range: () => ({ start: marker.start, end: marker.end }),
				dispose: () => {
					marker.valid = false;
					markers.delete(marker);
				},
			};
		},
	};
}
