// CHANGE: Post-processor entry points: batched convergence, finalizer and import insertion
// WHY: One invocation plans batches once, drives each to its fixpoint in order, then formats once
// REF: REQ-POST-PROCESSOR, REQ-FINALIZER, REQ-IMPORT-INSERTION
// FORMAT THEOREM:
//   run(tree, scope) = finalize ∘ fold(runBatchToFixpoint, plan(registry))
//   finalize: ¬formatCode → false; scope = null → reformat; ¬valid(scope) → false; else reformatRange
// PURITY: APP
// EFFECT: Effect<PostProcessor, never, Scope>
// INVARIANT: All tree mutation happens on the substrate's mutation context under exclusive access
// COMPLEXITY: O(Σ_batches rounds · (n · r + analysis))

import { Effect, Either, type Scope } from "effect";

import { DEFAULT_MAX_ROUNDS_PER_BATCH } from "../core/config.js";
import { planBatches } from "../core/engine/batch-planner.js";
import {
	CollaboratorFailed,
	describeThrown,
	type PostProcessingError,
} from "../core/errors.js";
import type {
	BatchReport,
	CodeFormatter,
	ImportInserter,
	PostProcessingReport,
	RangeMarker,
	RegistryNode,
	RuleSettings,
	SemanticAnalyzer,
	SymbolResolver,
	SyntaxTree,
} from "../core/types/index.js";
import {
	makeMutationSubstrate,
	type MutationSubstrate,
} from "../shell/host/substrate.js";
import { debugLog } from "../shell/utils/debug.js";
import {
	exclusively,
	type RoundContext,
	runBatchToFixpoint,
} from "./convergence.js";

/**
 * Host collaborators and run options of a post-processor.
 *
 * @property registry Rule registry planned on every invocation
 * @property formatCode Run the finalizer after the last batch
 * @property maxRoundsPerBatch Round budget per batch (default 100)
 */
export interface PostProcessorOptions<N, T extends SyntaxTree<N>, D> {
	readonly registry: RegistryNode<N>;
	readonly analyzer: SemanticAnalyzer<N, T>;
	readonly formatter: CodeFormatter<T>;
	readonly resolver: SymbolResolver<T, D>;
	readonly importInserter: ImportInserter<T, D>;
	readonly formatCode: boolean;
	readonly maxRoundsPerBatch?: number;
}

export interface PostProcessor<N, T extends SyntaxTree<N>, D> {
	readonly runPostProcessing: (
		tree: T,
		scope?: RangeMarker | null,
		settings?: RuleSettings | null,
	) => Effect.Effect<PostProcessingReport, PostProcessingError>;
	readonly insertImport: (
		tree: T,
		qualifiedName: string,
	) => Effect.Effect<D | null, CollaboratorFailed>;
}

type Collaborator = CollaboratorFailed["collaborator"];

const callCollaborator = <A>(
	collaborator: Collaborator,
	call: () => A,
): Effect.Effect<A, CollaboratorFailed> =>
	Effect.try({
		try: call,
		catch: (error) =>
			new CollaboratorFailed({ collaborator, detail: describeThrown(error) }),
	});

/**
 * Finalizer: one formatting pass over the scope or the whole tree.
 *
 * @returns Whether the formatter ran
 * @postcondition invalid scope → false without touching the tree
 */
function finalize<N, T extends SyntaxTree<N>, D>(
	options: PostProcessorOptions<N, T, D>,
	substrate: MutationSubstrate,
	tree: T,
	scope: RangeMarker | null,
): Effect.Effect<boolean, CollaboratorFailed> {
	if (!options.formatCode) return Effect.succeed(false);
	const format = Effect.suspend(() => {
		if (scope === null) {
			return callCollaborator("formatter", () => {
				options.formatter.reformat(tree);
				return true;
			});
		}
		if (!scope.isValid()) return Effect.succeed(false);
		const range = scope.range();
		return callCollaborator("formatter", () => {
			options.formatter.reformatRange(tree, range);
			return true;
		});
	});
	return substrate.onMutationContext(exclusively(substrate, tree, format));
}

/**
 * Build a post-processor whose mutation substrate lives as long as the scope.
 *
 * @pure false (forks the mutation worker)
 * @effect Effect<PostProcessor, never, Scope>
 *
 * @example
 * ```ts
 * const report = yield* Effect.scoped(
 *   Effect.flatMap(makePostProcessor(options), (p) => p.runPostProcessing(tree)),
 * );
 * ```
 */
export function makePostProcessor<N, T extends SyntaxTree<N>, D>(
	options: PostProcessorOptions<N, T, D>,
): Effect.Effect<PostProcessor<N, T, D>, never, Scope.Scope> {
	return Effect.gen(function* () {
		const substrate = yield* makeMutationSubstrate;
		const maxRounds = options.maxRoundsPerBatch ?? DEFAULT_MAX_ROUNDS_PER_BATCH;

		const runPostProcessing = (
			tree: T,
			scope: RangeMarker | null = null,
			settings: RuleSettings | null = null,
		): Effect.Effect<PostProcessingReport, PostProcessingError> =>
			Effect.gen(function* () {
				const batches = yield* Either.match(planBatches(options.registry), {
					onLeft: (error) => Effect.fail(error),
					onRight: (planned) => Effect.succeed(planned),
				});
				const ctx: RoundContext<N, T> = {
					tree,
					scope,
					settings,
					analyzer: options.analyzer,
					substrate,
					maxRounds,
				};
				const reports: BatchReport[] = [];
				for (const batch of batches) {
					const report = yield* runBatchToFixpoint(ctx, batch);
					debugLog(
						`batch=[${report.rules.join(",")}] converged after ${report.rounds} round(s)`,
					);
					reports.push(report);
				}
				const formatted = yield* finalize(options, substrate, tree, scope);
				return { batches: reports, formatted };
			});

		const insertImport = (
			tree: T,
			qualifiedName: string,
		): Effect.Effect<D | null, CollaboratorFailed> =>
			substrate.onMutationContext(
				exclusively(
					substrate,
					tree,
					Effect.gen(function* () {
						const candidates = yield* callCollaborator("resolver", () =>
							options.resolver.resolveQualifiedName(tree, qualifiedName),
						);
						const [first] = candidates;
						if (first === undefined) return null;
						yield* callCollaborator("import-inserter", () =>
							options.importInserter.insertImport(tree, first),
						);
						return first;
					}),
				),
			);

		return { runPostProcessing, insertImport };
	});
}

/**
 * Build a post-processor, run it once and release its substrate.
 *
 * @effect Effect<PostProcessingReport, PostProcessingError>
 */
export const runPostProcessingOnce = <N, T extends SyntaxTree<N>, D>(
	options: PostProcessorOptions<N, T, D>,
	tree: T,
	scope: RangeMarker | null = null,
	settings: RuleSettings | null = null,
): Effect.Effect<PostProcessingReport, PostProcessingError> =>
	Effect.scoped(
		Effect.flatMap(makePostProcessor(options), (processor) =>
			processor.runPostProcessing(tree, scope, settings),
		),
	);
