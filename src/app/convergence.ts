// CHANGE: Convergence loop driving one batch of rules to a fixpoint
// WHY: Rules rewrite a tree that mutates underneath them; every round re-reads the tree and its diagnostics
// REF: REQ-CONVERGENCE
// FORMAT THEOREM:
//   round = (before := stamp; A := collect(analyze()); apply(A))
//   stop ⇔ A = ∅ ∨ (¬uncertain ∧ stamp = before)
//   uncertain ⇔ ∃a ∈ A: ¬valid(a.node) when its turn came
// PURITY: APP
// EFFECT: Effect<BatchReport, RuleFailed | CollaboratorFailed | ConvergenceNotReached>
// INVARIANT: Rounds of a batch never overlap; actions of a round run in ascending priority
// COMPLEXITY: O(rounds · (n · r + analysis))

import { Effect } from "effect";

import { collectActions } from "../core/engine/collector.js";
import {
	type CollaboratorFailed,
	ConvergenceNotReached,
	describeThrown,
	RuleFailed,
} from "../core/errors.js";
import type {
	Action,
	Batch,
	BatchReport,
	RangeMarker,
	RuleSettings,
	SemanticAnalyzer,
	SyntaxTree,
} from "../core/types/index.js";
import type { MutationSubstrate } from "../shell/host/substrate.js";
import { debugLog } from "../shell/utils/debug.js";
import { analyzeSnapshot } from "./snapshot.js";

/**
 * Everything a round needs besides the batch itself.
 */
export interface RoundContext<N, T extends SyntaxTree<N>> {
	readonly tree: T;
	readonly scope: RangeMarker | null;
	readonly settings: RuleSettings | null;
	readonly analyzer: SemanticAnalyzer<N, T>;
	readonly substrate: MutationSubstrate;
	readonly maxRounds: number;
}

interface ApplyOutcome {
	readonly applied: number;
	readonly skipped: number;
}

/**
 * Run `work` under exclusive mutation, entering the tree's write guard if it has one.
 *
 * @effect Effect<A, E>
 * @postcondition guard.exit runs even when `work` fails
 */
export function exclusively<A, E>(
	substrate: MutationSubstrate,
	tree: Pick<SyntaxTree<unknown>, "writeGuard">,
	work: Effect.Effect<A, E>,
): Effect.Effect<A, E> {
	const guard = tree.writeGuard;
	if (guard === undefined) return substrate.write(work);
	return substrate.write(
		Effect.acquireUseRelease(
			Effect.sync(() => guard.enter()),
			() => work,
			() => Effect.sync(() => guard.exit()),
		),
	);
}

/**
 * Read phase: fresh diagnostics, then the priority-ordered actions.
 */
function collectRound<N, T extends SyntaxTree<N>>(
	ctx: RoundContext<N, T>,
	batch: Batch<N>,
): Effect.Effect<ReadonlyArray<Action<N>>, RuleFailed | CollaboratorFailed> {
	return Effect.gen(function* () {
		const diagnostics = yield* analyzeSnapshot(ctx.analyzer, ctx.tree, ctx.scope);
		return yield* collectActions({
			batch,
			tree: ctx.tree,
			scope: ctx.scope,
			diagnostics,
			settings: ctx.settings,
		});
	});
}

/**
 * Write phase: run every action whose node is still valid, in order.
 *
 * CHANGE: Skip invalidated actions instead of failing the round
 * WHY: An earlier action of the same round may detach a later action's node;
 *      the skip count marks the round uncertain so another round is mandatory
 *
 * @pure false (mutates the tree through rule procedures)
 * @effect Effect<ApplyOutcome, RuleFailed>
 */
function applyActions<N, T extends SyntaxTree<N>>(
	ctx: RoundContext<N, T>,
	actions: ReadonlyArray<Action<N>>,
): Effect.Effect<ApplyOutcome, RuleFailed> {
	return Effect.gen(function* () {
		let applied = 0;
		let skipped = 0;
		for (const action of actions) {
			if (!ctx.tree.isValid(action.node)) {
				skipped += 1;
				continue;
			}
			const run = Effect.try({
				try: action.procedure,
				catch: (error) =>
					new RuleFailed({
						ruleId: action.ruleId,
						phase: "apply",
						detail: describeThrown(error),
					}),
			});
			yield* action.requiresExclusiveMutation
				? exclusively(ctx.substrate, ctx.tree, run)
				: run;
			applied += 1;
		}
		return { applied, skipped };
	});
}

/**
 * Drive `batch` to a fixpoint.
 *
 * @param ctx - Tree, scope, settings and collaborators of the invocation
 * @param batch - Rules processed together
 * @returns Rounds run and actions applied/skipped
 *
 * @pure false
 * @effect Effect<BatchReport, RuleFailed | CollaboratorFailed | ConvergenceNotReached>
 * @invariant rounds <= ctx.maxRounds
 * @postcondition the last round collected nothing, or changed nothing with certainty
 */
export function runBatchToFixpoint<N, T extends SyntaxTree<N>>(
	ctx: RoundContext<N, T>,
	batch: Batch<N>,
): Effect.Effect<
	BatchReport,
	RuleFailed | CollaboratorFailed | ConvergenceNotReached
> {
	return Effect.gen(function* () {
		const rules = batch.map((rule) => rule.id);
		let rounds = 0;
		let appliedActions = 0;
		let skippedActions = 0;

		for (;;) {
			rounds += 1;
			const before = ctx.tree.modificationStamp();
			const actions = yield* ctx.substrate.read(collectRound(ctx, batch));
			if (actions.length === 0) break;

			const outcome = yield* ctx.substrate.onMutationContext(
				applyActions(ctx, actions),
			);
			appliedActions += outcome.applied;
			skippedActions += outcome.skipped;
			const uncertain = outcome.skipped > 0;
			debugLog(
				`batch=[${rules.join(",")}] round=${rounds} actions=${actions.length} skipped=${outcome.skipped}`,
			);

			if (!uncertain && ctx.tree.modificationStamp() === before) break;
			if (rounds >= ctx.maxRounds) {
				return yield* Effect.fail(new ConvergenceNotReached({ rules, rounds }));
			}
			yield* Effect.yieldNow();
		}

		return { rules, rounds, appliedActions, skippedActions };
	});
}
