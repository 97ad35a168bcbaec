// CHANGE: Centralize test builders for rules, markers and diagnostics
// WHY: Engine tests share the same small vocabulary; builders are pure and reusable

import type {
	Diagnostic,
	DiagnosticSet,
	PostProcessingRule,
	RangeMarker,
	RuleProcedure,
	RuleSettings,
} from "../../src/core/types/index.js";

/** Build a rule with sensible defaults; `decide` defaults to "never acts". */
export const rule = <N>(
	id: string,
	over: {
		readonly priority?: number;
		readonly requiresExclusiveMutation?: boolean;
		readonly decide?: (
			node: N,
			diagnostics: DiagnosticSet,
			settings: RuleSettings | null,
		) => RuleProcedure | null;
	} = {},
): PostProcessingRule<N> => ({
	id,
	priority: over.priority ?? 0,
	requiresExclusiveMutation: over.requiresExclusiveMutation ?? true,
	tryCreateAction: over.decide ?? (() => null),
});

/** Scope marker over a fixed range. */
export const fixedMarker = (
	start: number,
	end: number,
	valid = true,
): RangeMarker => ({
	isValid: () => valid,
	range: () => ({ start, end }),
});

export const diagnostic = (
	code: string,
	start: number,
	end: number,
): Diagnostic => ({
	code,
	message: `${code} at ${start}`,
	severity: "error",
	range: { start, end },
});
