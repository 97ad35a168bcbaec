// CHANGE: Semantic analyzer over TypeScript pre-emit diagnostics
// WHY: Rules such as missing-import react to compiler errors of the current snapshot
// REF: REQ-TS-HOST, REQ-DIAGNOSTIC-SNAPSHOT
// SOURCE: https://ts-morph.com/details/diagnostics
// FORMAT THEOREM:
//   analyze(tree, whole-tree) = {toDiagnostic(d) | d ∈ preEmit(file) ∧ file(d) = file}
//   analyze(tree, elements(E)) = {x ∈ analyze(tree, whole-tree) | ∃ e ∈ E: range(e) ⊇ range(x)}
// PURITY: SHELL (runs the type checker)
// INVARIANT: Codes are rendered as TS<number>; file-less diagnostics are dropped
// COMPLEXITY: O(type-check(file))

import { type Diagnostic as MorphDiagnostic, type Node, ts } from "ts-morph";

import { rangeContains } from "../../core/engine/range.js";
import type {
	Diagnostic,
	DiagnosticSeverity,
	SemanticAnalyzer,
} from "../../core/types/index.js";
import type { SourceFileTree } from "./tree.js";

const severityOf = (category: ts.DiagnosticCategory): DiagnosticSeverity => {
	if (category === ts.DiagnosticCategory.Error) return "error";
	if (category === ts.DiagnosticCategory.Warning) return "warning";
	return "info";
};

/** Convert a ts-morph diagnostic of `filePath` into an engine diagnostic. */
function toDiagnostic(
	diagnostic: MorphDiagnostic,
	filePath: string,
): Diagnostic | null {
	const file = diagnostic.getSourceFile();
	const start = diagnostic.getStart();
	if (file === undefined || start === undefined) return null;
	if (file.getFilePath() !== filePath) return null;
	return {
		code: `TS${diagnostic.getCode()}`,
		message: ts.flattenDiagnosticMessageText(
			diagnostic.compilerObject.messageText,
			"\n",
		),
		severity: severityOf(diagnostic.getCategory()),
		range: { start, end: start + (diagnostic.getLength() ?? 0) },
	};
}

export const typeScriptAnalyzer: SemanticAnalyzer<Node, SourceFileTree> = {
	analyze: (tree, target) => {
		const filePath = tree.sourceFile.getFilePath();
		const diagnostics = tree.sourceFile
			.getPreEmitDiagnostics()
			.map((diagnostic) => toDiagnostic(diagnostic, filePath))
			.filter((diagnostic): diagnostic is Diagnostic => diagnostic !== null);
		if (target.kind === "whole-tree") return diagnostics;
		const ranges = target.elements.map((element) => tree.rangeOf(element));
		return diagnostics.filter((diagnostic) =>
			ranges.some((range) => rangeContains(range, diagnostic.range)),
		);
	},
};
