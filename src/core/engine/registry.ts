// CHANGE: Registry builders and rule filtering
// WHY: Registries are written as nested group/single trees; configuration may disable rules by id
// REF: REQ-REGISTRY, REQ-CONFIG
// PURITY: CORE
// INVARIANT: Filtering keeps the relative order of remaining rules and drops groups left empty;
//            malformed nodes are kept as they are so that planning reports them as RegistryCorrupted
// COMPLEXITY: O(n) where n = registry nodes

import { match, P } from "ts-pattern";

import type {
	PostProcessingRule,
	RegistryNode,
	RuleGroupEntry,
	SingleRuleEntry,
} from "../types/index.js";

export const single = <N>(rule: PostProcessingRule<N>): SingleRuleEntry<N> => ({
	kind: "single",
	rule,
});

export const group = <N>(
	name: string,
	children: ReadonlyArray<RegistryNode<N>>,
): RuleGroupEntry<N> => ({ kind: "group", name, children });

/**
 * Remove rules whose id is listed in `disabled`.
 *
 * @returns The filtered registry, or null when nothing is left
 *
 * @pure true
 * @complexity O(n)
 */
export function withoutRules<N>(
	registry: RegistryNode<N>,
	disabled: ReadonlyArray<string>,
): RegistryNode<N> | null {
	if (disabled.length === 0) return registry;
	return match<RegistryNode<N>, RegistryNode<N> | null>(registry)
		.with({ kind: "single", rule: P.not(P.nullish) }, (entry) =>
			disabled.includes(entry.rule.id) ? null : entry,
		)
		.with({ kind: "group", children: P.array() }, (entry) => {
			const children = entry.children
				.map((child) => withoutRules(child, disabled))
				.filter((child): child is RegistryNode<N> => child !== null);
			return children.length === 0 ? null : group(entry.name, children);
		})
		.otherwise(() => registry);
}

/**
 * Ids of every rule in registry order. Malformed nodes contribute nothing.
 *
 * @pure true
 */
export const ruleIdsOf = <N>(registry: RegistryNode<N>): ReadonlyArray<string> =>
	match<RegistryNode<N>, ReadonlyArray<string>>(registry)
		.with({ kind: "single", rule: P.not(P.nullish) }, (entry) => [entry.rule.id])
		.with({ kind: "group", children: P.array() }, (entry) =>
			entry.children.flatMap((child) => ruleIdsOf(child)),
		)
		.otherwise(() => []);
