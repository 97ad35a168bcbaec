// CHANGE: Built-in translation fix-up rules for the TypeScript host
// WHY: Translators emit `var`, loose equality, redundant parentheses and unresolved names
// REF: REQ-BUILTIN-RULES
// SOURCE: https://ts-morph.com/navigation/, https://github.com/gvergnaud/ts-pattern
// FORMAT THEOREM:
//   var-to-let:          VariableDeclarationList(var)                 ↦ let
//   strict-equality:     a == b, a != b (¬null operand unless allowed)  ↦ a === b, a !== b
//   unwrap-parentheses:  (x) where x ∈ {identifier, literal, this, (…)} ↦ x
//   missing-import:      identifier with TS2304/TS2552 at its range     ↦ import first candidate
// PURITY: SHELL (procedures mutate the source file)
// INVARIANT: Each rule returns null when its rewrite would not change the tree
// COMPLEXITY: O(1) per node, except missing-import (project-wide resolution)

import { Node, SyntaxKind, VariableDeclarationKind } from "ts-morph";
import { match } from "ts-pattern";

import { diagnosticsAt } from "../../core/engine/diagnostics.js";
import type {
	PostProcessingRule,
	RuleSettings,
	TextRange,
} from "../../core/types/index.js";
import { insertImportInto, resolveInProject } from "./imports.js";

/** Diagnostic codes meaning "cannot find name". */
const UNRESOLVED_NAME_CODES: ReadonlyArray<string> = ["TS2304", "TS2552"];

const ALLOW_NULL_COMPARISON_KEY = "strict-equality.allowNullComparison";

const rangeOfNode = (node: Node): TextRange => ({
	start: node.getStart(),
	end: node.getEnd(),
});

export const varToLet: PostProcessingRule<Node> = {
	id: "var-to-let",
	priority: 10,
	requiresExclusiveMutation: true,
	tryCreateAction: (node) => {
		if (!Node.isVariableDeclarationList(node)) return null;
		if (node.getDeclarationKind() !== VariableDeclarationKind.Var) return null;
		return () => {
			node.setDeclarationKind(VariableDeclarationKind.Let);
		};
	},
};

/** Strict counterpart of a loose equality operator, or null for any other operator. */
const strictOperatorFor = (kind: SyntaxKind): string | null =>
	match(kind)
		.with(SyntaxKind.EqualsEqualsToken, () => "===")
		.with(SyntaxKind.ExclamationEqualsToken, () => "!==")
		.otherwise(() => null);

const allowsNullComparison = (settings: RuleSettings | null): boolean =>
	settings?.[ALLOW_NULL_COMPARISON_KEY] !== false;

export const strictEquality: PostProcessingRule<Node> = {
	id: "strict-equality",
	priority: 20,
	requiresExclusiveMutation: true,
	tryCreateAction: (node, _diagnostics, settings) => {
		if (!Node.isBinaryExpression(node)) return null;
		const operator = node.getOperatorToken();
		const replacement = strictOperatorFor(operator.getKind());
		if (replacement === null) return null;
		const comparesNull =
			Node.isNullLiteral(node.getLeft()) || Node.isNullLiteral(node.getRight());
		if (comparesNull && allowsNullComparison(settings)) return null;
		return () => {
			node.replaceWithText(
				`${node.getLeft().getText()} ${replacement} ${node.getRight().getText()}`,
			);
		};
	},
};

/** Expressions that never need parentheses around them. */
const SELF_DELIMITING: ReadonlyArray<(node: Node) => boolean> = [
	Node.isIdentifier,
	Node.isLiteralExpression,
	Node.isTrueLiteral,
	Node.isFalseLiteral,
	Node.isNullLiteral,
	Node.isThisExpression,
	Node.isParenthesizedExpression,
];

const isSelfDelimiting = (node: Node): boolean =>
	SELF_DELIMITING.some((isKind) => isKind(node));

export const unwrapParentheses: PostProcessingRule<Node> = {
	id: "unwrap-parentheses",
	priority: 30,
	requiresExclusiveMutation: true,
	tryCreateAction: (node) => {
		if (!Node.isParenthesizedExpression(node)) return null;
		if (!isSelfDelimiting(node.getExpression())) return null;
		return () => {
			node.replaceWithText(node.getExpression().getText());
		};
	},
};

export const missingImport: PostProcessingRule<Node> = {
	id: "missing-import",
	priority: 0,
	requiresExclusiveMutation: true,
	tryCreateAction: (node, diagnostics) => {
		if (!Node.isIdentifier(node)) return null;
		const unresolved = diagnosticsAt(diagnostics, rangeOfNode(node)).some((d) =>
			UNRESOLVED_NAME_CODES.includes(d.code),
		);
		if (!unresolved) return null;
		const sourceFile = node.getSourceFile();
		const [candidate] = resolveInProject(sourceFile, node.getText());
		if (candidate === undefined) return null;
		return () => {
			insertImportInto(sourceFile, candidate);
		};
	},
};
