// CHANGE: Typed domain error ADT for the convergence engine using Effect.Data
// WHY: Failures that reach the caller are explicit, tagged variants in the Effect error channel
// REF: Effect Data API, REQ-ERRORS
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; absorbed anomalies never appear here
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Registry node that is neither a single rule nor a group.
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 */
export class RegistryCorrupted extends Data.TaggedError("RegistryCorrupted")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * A rule threw while deciding on a node or while running its procedure.
 *
 * @pure true (Data class)
 */
export class RuleFailed extends Data.TaggedError("RuleFailed")<{
	readonly ruleId: string;
	readonly phase: "collect" | "apply";
	readonly detail: string;
}> {}

/**
 * A host collaborator threw.
 *
 * @pure true (Data class)
 */
export class CollaboratorFailed extends Data.TaggedError("CollaboratorFailed")<{
	readonly collaborator: "analyzer" | "formatter" | "resolver" | "import-inserter";
	readonly detail: string;
}> {}

/**
 * A batch kept changing the tree for more rounds than allowed.
 *
 * @pure true (Data class)
 * @invariant rounds > 0
 */
export class ConvergenceNotReached extends Data.TaggedError(
	"ConvergenceNotReached",
)<{
	readonly rules: ReadonlyArray<string>;
	readonly rounds: number;
}> {}

/**
 * Configuration file exists but cannot be used.
 *
 * @pure true (Data class)
 */
export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command line cannot be turned into options, or the input file cannot be loaded.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Everything `runPostProcessing` may fail with.
 */
export type PostProcessingError =
	| RegistryCorrupted
	| RuleFailed
	| CollaboratorFailed
	| ConvergenceNotReached;

/**
 * Union of all application errors.
 */
export type AppError = PostProcessingError | ConfigInvalid | UsageError;

/**
 * Render a thrown value as text for error details.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeThrown(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
