// CHANGE: Action collector walking the tree under the scope filter
// WHY: One round's work is decided against one immutable snapshot of tree + diagnostics
// REF: REQ-ACTION-COLLECTOR
// FORMAT THEOREM:
//   collect = stableSortBy(priority, concat_{n ∈ postorder(eligible)} concat_{r ∈ batch} r(n))
// PURITY: CORE (rules are trusted to be side-effect free while deciding)
// INVARIANT: Priority is the only global ordering key; ties keep traversal-then-registry order
// COMPLEXITY: O(n · r + a log a) where n = visited nodes, r = |batch|, a = |actions|

import { Either } from "effect";

import { describeThrown, RuleFailed } from "../errors.js";
import type {
	Action,
	Batch,
	DiagnosticSet,
	RangeMarker,
	RuleSettings,
	SyntaxTree,
} from "../types/index.js";
import { classifyNode } from "./scope-filter.js";

/**
 * Snapshot the collector works on.
 */
export interface CollectionInput<N> {
	readonly batch: Batch<N>;
	readonly tree: SyntaxTree<N>;
	readonly scope: RangeMarker | null;
	readonly diagnostics: DiagnosticSet;
	readonly settings: RuleSettings | null;
}

/**
 * Ask every rule of the batch about one eligible node.
 */
function askRules<N>(
	input: CollectionInput<N>,
	node: N,
	into: Action<N>[],
): RuleFailed | null {
	for (const rule of input.batch) {
		const decided = Either.try({
			try: () => rule.tryCreateAction(node, input.diagnostics, input.settings),
			catch: (error) =>
				new RuleFailed({
					ruleId: rule.id,
					phase: "collect",
					detail: describeThrown(error),
				}),
		});
		if (Either.isLeft(decided)) return decided.left;
		const procedure = decided.right;
		if (procedure !== null) {
			into.push({
				node,
				ruleId: rule.id,
				procedure,
				priority: rule.priority,
				requiresExclusiveMutation: rule.requiresExclusiveMutation,
			});
		}
	}
	return null;
}

/**
 * Depth-first visit; children are collected before their parent.
 */
function visit<N>(
	input: CollectionInput<N>,
	node: N,
	into: Action<N>[],
): RuleFailed | null {
	const scopeClass = classifyNode(input.tree.rangeOf(node), input.scope);
	if (scopeClass === "excluded") return null;

	for (const child of input.tree.children(node)) {
		const failed = visit(input, child, into);
		if (failed !== null) return failed;
	}

	return scopeClass === "eligible" ? askRules(input, node, into) : null;
}

/**
 * Collect the priority-ordered actions of one round.
 *
 * @param input - Batch, tree, scope, diagnostics and settings of this round
 * @returns Actions sorted by ascending priority, or the first rule failure
 *
 * @pure true (no tree mutation)
 * @invariant ∀ i < j: result[i].priority <= result[j].priority
 * @complexity O(n · r + a log a)
 */
export function collectActions<N>(
	input: CollectionInput<N>,
): Either.Either<ReadonlyArray<Action<N>>, RuleFailed> {
	const actions: Action<N>[] = [];
	const failed = visit(input, input.tree.root(), actions);
	if (failed !== null) return Either.left(failed);
	// Array.prototype.sort is stable, equal priorities keep collection order
	return Either.right(actions.sort((a, b) => a.priority - b.priority));
}
