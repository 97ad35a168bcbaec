// CHANGE: Batch planner flattening the rule registry into ordered batches
// WHY: Each maximal group of single rules is driven to a fixpoint before the next one starts
// REF: REQ-BATCH-PLANNER
// FORMAT THEOREM:
//   plan(single r) = [[r]]
//   plan(group g) = [rules(g.children)]            if ∀c ∈ g.children: c is single
//                 = concat(map(plan, g.children))   otherwise
//   empty groups contribute no batch
// PURITY: CORE
// INVARIANT: Batches partition the registry's leaf rules in depth-first left-to-right order
// COMPLEXITY: O(n) where n = registry nodes

import { Either } from "effect";
import { match, P } from "ts-pattern";

import { RegistryCorrupted } from "../errors.js";
import type {
	Batch,
	PostProcessingRule,
	RegistryNode,
	SingleRuleEntry,
} from "../types/index.js";

const isSingle = <N>(node: RegistryNode<N>): node is SingleRuleEntry<N> =>
	node.kind === "single";

/**
 * Plan one registry node located at `path`.
 *
 * The `otherwise` branch is reachable for registries assembled from untyped
 * sources (plugins, deserialized descriptions).
 */
function planNode<N>(
	node: RegistryNode<N>,
	path: string,
): Either.Either<ReadonlyArray<Batch<N>>, RegistryCorrupted> {
	return match<RegistryNode<N>, Either.Either<ReadonlyArray<Batch<N>>, RegistryCorrupted>>(node)
		.with({ kind: "single", rule: P.not(P.nullish) }, (entry) =>
			Either.right([[entry.rule]]),
		)
		.with({ kind: "group", children: P.array() }, (entry) => {
			const childPath = (index: number): string =>
				`${path}/${entry.name}[${index}]`;
			const coBatched = entry.children.every(isSingle);
			const batches: Batch<N>[] = [];
			for (const [index, child] of entry.children.entries()) {
				const planned = planNode(child, childPath(index));
				if (Either.isLeft(planned)) return planned;
				batches.push(...planned.right);
			}
			if (coBatched) {
				const rules: PostProcessingRule<N>[] = batches.flat();
				return Either.right(rules.length === 0 ? [] : [rules]);
			}
			return Either.right(batches);
		})
		.otherwise(() =>
			Either.left(
				new RegistryCorrupted({
					path,
					detail: "registry node is neither a single rule nor a group",
				}),
			),
		);
}

/**
 * Flatten a registry into the ordered list of batches.
 *
 * @param registry - Root of the rule registry
 * @returns Batches in execution order, or RegistryCorrupted for a malformed node
 *
 * @pure true
 * @invariant ∀ leaf rule r: r occurs in exactly one batch
 * @complexity O(n)
 *
 * @example
 * ```ts
 * planBatches(group("root", [single(a), group("g", [single(b), single(c)])]));
 * // Right([[a], [b, c]])
 * ```
 */
export const planBatches = <N>(
	registry: RegistryNode<N>,
): Either.Either<ReadonlyArray<Batch<N>>, RegistryCorrupted> =>
	planNode(registry, "$");
