// CHANGE: Code formatter backed by the TypeScript language service
// WHY: The finalizer reformats either the whole file or only the post-processed range
// REF: REQ-TS-HOST, REQ-FINALIZER
// SOURCE: https://ts-morph.com/manipulation/formatting
// PURITY: SHELL (mutates the source file)
// COMPLEXITY: O(|text|)

import type { FormatCodeSettings } from "ts-morph";

import type { CodeFormatter, TextRange } from "../../core/types/index.js";
import type { SourceFileTree } from "./tree.js";

const FORMAT_SETTINGS: FormatCodeSettings = {
	indentSize: 4,
	convertTabsToSpaces: true,
	insertSpaceAfterCommaDelimiter: true,
	insertSpaceBeforeAndAfterBinaryOperators: true,
};

export const typeScriptFormatter: CodeFormatter<SourceFileTree> = {
	reformat: (tree) => {
		tree.sourceFile.formatText(FORMAT_SETTINGS);
	},
	reformatRange: (tree, range: TextRange) => {
		const edits = tree.project
			.getLanguageService()
			.getFormattingEditsForRange(
				tree.sourceFile.getFilePath(),
				[range.start, range.end],
				FORMAT_SETTINGS,
			);
		if (edits.length > 0) tree.sourceFile.applyTextChanges(edits);
	},
};
