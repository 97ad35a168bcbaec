// CHANGE: Functional Core domain models for the post-processor (pure, immutable)
// WHY: Keep classification and exit decisions as plain values the shell can render
// REF: REQ-SCOPE-FILTER, REQ-CLI
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * How the collector treats a node relative to the scope.
 *
 * - `excluded`: skip the node and its whole subtree
 * - `traverse-only`: visit children, never ask rules about this node
 * - `eligible`: visit children and ask every rule of the batch
 */
export type ScopeClass = "excluded" | "traverse-only" | "eligible";

/**
 * Minimal decision state for producing the CLI exit code.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly failed: boolean;
}
