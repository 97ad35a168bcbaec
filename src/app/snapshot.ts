// CHANGE: Diagnostic snapshot provider
// WHY: Rules must see diagnostics computed against the tree as it is now, never a stale copy
// REF: REQ-DIAGNOSTIC-SNAPSHOT
// PURITY: APP
// EFFECT: Effect<DiagnosticSet, CollaboratorFailed>
// INVARIANT: Called once per round; no analysis when the scope selects nothing
// COMPLEXITY: O(analysis)

import { Effect } from "effect";

import {
	analysisTargetFor,
	diagnosticSetOf,
	emptyDiagnostics,
} from "../core/engine/diagnostics.js";
import { CollaboratorFailed, describeThrown } from "../core/errors.js";
import type {
	DiagnosticSet,
	RangeMarker,
	SemanticAnalyzer,
	SyntaxTree,
} from "../core/types/index.js";

/**
 * Analyze the current snapshot of `tree` restricted to `scope`.
 *
 * @pure false (runs the host analyzer)
 * @effect Effect<DiagnosticSet, CollaboratorFailed>
 * @postcondition target = null → emptyDiagnostics without calling the analyzer
 */
export function analyzeSnapshot<N, T extends SyntaxTree<N>>(
	analyzer: SemanticAnalyzer<N, T>,
	tree: T,
	scope: RangeMarker | null,
): Effect.Effect<DiagnosticSet, CollaboratorFailed> {
	const target = analysisTargetFor(tree, scope);
	if (target === null) return Effect.succeed(emptyDiagnostics);
	return Effect.try({
		try: () => diagnosticSetOf(analyzer.analyze(tree, target)),
		catch: (error) =>
			new CollaboratorFailed({
				collaborator: "analyzer",
				detail: describeThrown(error),
			}),
	});
}
