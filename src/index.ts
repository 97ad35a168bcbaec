// CHANGE: Public API entry point for library consumers
// WHY: Export the engine, its types and the shipped hosts; keep CLI plumbing internal
// REF: REQ-PUBLIC-API
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effect constructors or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// POST-PROCESSOR (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build a post-processor and drive a tree to its fixpoint.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { createDefaultRegistry, runPostProcessingOnce } from "fixpoint-postprocessor";
 *
 * const report = await Effect.runPromise(
 *   runPostProcessingOnce({ registry: createDefaultRegistry(), ...collaborators, formatCode: true }, tree),
 * );
 * ```
 */
export {
	makePostProcessor,
	type PostProcessor,
	type PostProcessorOptions,
	runPostProcessingOnce,
} from "./app/postProcessor.js";
export { type RoundContext, runBatchToFixpoint } from "./app/convergence.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure engine pieces)
// ═══════════════════════════════════════════════════════════════════════════════

export { planBatches } from "./core/engine/batch-planner.js";
export { collectActions } from "./core/engine/collector.js";
export { group, single, withoutRules } from "./core/engine/registry.js";
export { classifyNode } from "./core/engine/scope-filter.js";
export { DEFAULT_CONFIG, parsePostProcessingConfig } from "./core/config.js";
export {
	type AppError,
	CollaboratorFailed,
	ConfigInvalid,
	ConvergenceNotReached,
	type PostProcessingError,
	RegistryCorrupted,
	RuleFailed,
	UsageError,
} from "./core/errors.js";
export type { ExitCode, ScopeClass } from "./core/models.js";
export type * from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Hosts)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	makeMutationSubstrate,
	type MutationSubstrate,
} from "./shell/host/substrate.js";
export {
	branch,
	createMemoryTree,
	leaf,
	type MemoryNode,
	type MemoryTree,
	type NodeSpec,
} from "./shell/memory/tree.js";
export { typeScriptAnalyzer } from "./shell/typescript/analyzer.js";
export { typeScriptFormatter } from "./shell/typescript/formatter.js";
export {
	type ImportCandidate,
	typeScriptImportInserter,
	typeScriptResolver,
} from "./shell/typescript/imports.js";
export { createDefaultRegistry } from "./shell/typescript/registry.js";
export {
	missingImport,
	strictEquality,
	unwrapParentheses,
	varToLet,
} from "./shell/typescript/rules.js";
export {
	createNodeRangeMarker,
	createOffsetRangeMarker,
	createSourceFileTree,
	type SourceFileTree,
} from "./shell/typescript/tree.js";
export { loadPostProcessingConfig } from "./shell/config/loader.js";
