// CHANGE: Adapt a ts-morph SourceFile to the engine's tree interface
// WHY: The built-in rules and the CLI post-process real TypeScript produced by a translator
// REF: REQ-TS-HOST
// SOURCE: https://ts-morph.com/navigation/, https://ts-morph.com/manipulation/
// FORMAT THEOREM:
//   children(n) = n.forEachChildAsArray(); range(n) = [n.getStart(), n.getEnd())
//   valid(n) ⇔ ¬n.wasForgotten()
//   stamp advances ⇔ full text differs from the text seen at the previous read
// PURITY: SHELL
// INVARIANT: Top-level elements are the file's statements
// COMPLEXITY: O(|text|) per stamp read

import type { Node, Project, SourceFile } from "ts-morph";

import type {
	RangeMarker,
	SyntaxTree,
	TextRange,
} from "../../core/types/index.js";

export interface SourceFileTree extends SyntaxTree<Node> {
	readonly sourceFile: SourceFile;
	readonly project: Project;
}

/**
 * Wrap `sourceFile` as a syntax tree.
 *
 * @pure false (the stamp tracks later manipulation of the file)
 */
export function createSourceFileTree(sourceFile: SourceFile): SourceFileTree {
	let seenText = sourceFile.getFullText();
	let stamp = 0;

	return {
		sourceFile,
		project: sourceFile.getProject(),
		root: () => sourceFile,
		children: (node) => node.forEachChildAsArray(),
		rangeOf: (node): TextRange => ({ start: node.getStart(), end: node.getEnd() }),
		isValid: (node) => !node.wasForgotten(),
		topLevelElements: () => sourceFile.getStatements(),
		modificationStamp: () => {
			const text = sourceFile.getFullText();
			if (text !== seenText) {
				seenText = text;
				stamp += 1;
			}
			return stamp;
		},
	};
}

/**
 * Scope anchored on two nodes; it follows them through edits and collapses once either is forgotten.
 */
export const createNodeRangeMarker = (first: Node, last: Node): RangeMarker => ({
	isValid: () => !first.wasForgotten() && !last.wasForgotten(),
	range: () => ({ start: first.getStart(), end: last.getEnd() }),
});

/**
 * Scope covering the outermost statements that lie inside `[start, end)`.
 *
 * @returns null when no statement lies entirely inside the offsets
 */
export function createOffsetRangeMarker(
	tree: SourceFileTree,
	start: number,
	end: number,
): RangeMarker | null {
	const inside = tree.sourceFile
		.getStatements()
		.filter((statement) => start <= statement.getStart() && statement.getEnd() <= end);
	const first = inside[0];
	const last = inside[inside.length - 1];
	if (first === undefined || last === undefined) return null;
	return createNodeRangeMarker(first, last);
}
