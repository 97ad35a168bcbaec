// CHANGE: Pure decision function computing the CLI exit code
// WHY: Centralize termination logic in Functional Core; the bin only calls process.exit
// REF: REQ-CLI
// FORMAT THEOREM: ∀s ∈ State: s.failed ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the run outcome (pure function).
 *
 * @param state - Immutable flags describing how the run ended
 * @returns 1 if the run failed; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ failed: false });
 * // exitCode === 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, (s): ExitCode => (s.failed ? 1 : 0));
