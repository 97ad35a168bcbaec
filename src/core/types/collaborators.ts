// CHANGE: Contracts of the external collaborators driven by the post-processor
// WHY: Analysis, formatting and import resolution belong to the host; the engine only schedules them
// REF: REQ-COLLABORATORS
// PURITY: CORE (types only)
// INVARIANT: Mutating collaborators are only invoked under exclusive mutation
// COMPLEXITY: O(1)

import type { AnalysisTarget, Diagnostic } from "./diagnostics.js";
import type { TextRange } from "./tree.js";

/**
 * Computes diagnostics for a snapshot of tree `T`. Read-only.
 */
export interface SemanticAnalyzer<N, T> {
	readonly analyze: (
		tree: T,
		target: AnalysisTarget<N>,
	) => ReadonlyArray<Diagnostic>;
}

/**
 * Reformats a tree or a range of it. Mutating.
 */
export interface CodeFormatter<T> {
	readonly reformat: (tree: T) => void;
	readonly reformatRange: (tree: T, range: TextRange) => void;
}

/**
 * Resolves a qualified name to candidate declarations, most relevant first.
 */
export interface SymbolResolver<T, D> {
	readonly resolveQualifiedName: (tree: T, name: string) => ReadonlyArray<D>;
}

/**
 * Inserts an import of a declaration into a tree. Mutating.
 */
export interface ImportInserter<T, D> {
	readonly insertImport: (tree: T, declaration: D) => void;
}
