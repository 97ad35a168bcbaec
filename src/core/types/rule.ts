// CHANGE: Rule, registry and action types for the convergence engine
// WHY: Rules stay opaque units; the engine only sees their priority, exclusivity and optional procedure
// REF: REQ-RULES, REQ-REGISTRY
// PURITY: CORE (types only)
// INVARIANT: Actions are created per round and never outlive it
// COMPLEXITY: O(1)

import type { RuleSettings } from "./config.js";
import type { DiagnosticSet } from "./diagnostics.js";

/**
 * Zero-argument mutation returned by a rule.
 */
export type RuleProcedure = () => void;

/**
 * A stateless rewrite rule over nodes of type `N`.
 *
 * @property id Stable identifier used in reports, errors and configuration
 * @property priority Ascending execution order inside a round
 * @property requiresExclusiveMutation Run the procedure under exclusive mutation
 */
export interface PostProcessingRule<N> {
	readonly id: string;
	readonly priority: number;
	readonly requiresExclusiveMutation: boolean;
	readonly tryCreateAction: (
		node: N,
		diagnostics: DiagnosticSet,
		settings: RuleSettings | null,
	) => RuleProcedure | null;
}

export interface SingleRuleEntry<N> {
	readonly kind: "single";
	readonly rule: PostProcessingRule<N>;
}

export interface RuleGroupEntry<N> {
	readonly kind: "group";
	readonly name: string;
	readonly children: ReadonlyArray<RegistryNode<N>>;
}

/**
 * Node of the rule registry tree.
 */
export type RegistryNode<N> = SingleRuleEntry<N> | RuleGroupEntry<N>;

/**
 * Rules processed together to a shared fixpoint.
 */
export type Batch<N> = ReadonlyArray<PostProcessingRule<N>>;

/**
 * Ready-to-run mutation produced by one rule for one node.
 */
export interface Action<N> {
	readonly node: N;
	readonly ruleId: string;
	readonly procedure: RuleProcedure;
	readonly priority: number;
	readonly requiresExclusiveMutation: boolean;
}

/**
 * Outcome of running one batch to its fixpoint.
 *
 * @invariant rounds >= 1
 */
export interface BatchReport {
	readonly rules: ReadonlyArray<string>;
	readonly rounds: number;
	readonly appliedActions: number;
	readonly skippedActions: number;
}

/**
 * Outcome of a whole post-processing invocation.
 */
export interface PostProcessingReport {
	readonly batches: ReadonlyArray<BatchReport>;
	readonly formatted: boolean;
}
