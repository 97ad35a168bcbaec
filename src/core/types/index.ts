// CHANGE: Central export point for the engine's type definitions
// WHY: Provides a single import point for all types used across modules
// REF: REQ-MODULAR-ARCH
// SOURCE: n/a

export type {
	CodeFormatter,
	ImportInserter,
	SemanticAnalyzer,
	SymbolResolver,
} from "./collaborators.js";
export type {
	CLIOptions,
	JSONValue,
	PostProcessingConfig,
	RuleSettings,
} from "./config.js";
export type {
	AnalysisTarget,
	Diagnostic,
	DiagnosticSet,
	DiagnosticSeverity,
} from "./diagnostics.js";
export type {
	Action,
	Batch,
	BatchReport,
	PostProcessingReport,
	PostProcessingRule,
	RegistryNode,
	RuleGroupEntry,
	RuleProcedure,
	SingleRuleEntry,
} from "./rule.js";
export type {
	RangeMarker,
	SyntaxTree,
	TextRange,
	WriteGuard,
} from "./tree.js";
