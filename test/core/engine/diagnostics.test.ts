// CHANGE: Specs for choosing what the analyzer looks at
// WHY: Analysis is restricted to top-level elements overlapping the scope; an invalid scope analyzes nothing
// REF: REQ-DIAGNOSTIC-SNAPSHOT

import { describe, expect, it } from "vitest";

import {
	analysisTargetFor,
	diagnosticSetOf,
	diagnosticsAt,
} from "../../../src/core/engine/diagnostics.js";
import { branch, createMemoryTree, leaf } from "../../../src/shell/memory/tree.js";
import { diagnostic, fixedMarker } from "../../utils/builders.js";

const tree = createMemoryTree(
	branch("file", [leaf("first", "one;"), leaf("second", "two;"), leaf("third", "six;")]),
);

describe("analysisTargetFor", () => {
	it("analyzes the whole tree without a scope", () => {
		expect(analysisTargetFor(tree, null)).toEqual({ kind: "whole-tree" });
	});

	it("analyzes nothing for an invalid scope", () => {
		expect(analysisTargetFor(tree, fixedMarker(0, 12, false))).toBeNull();
	});

	it("restricts analysis to the top-level elements overlapping the scope", () => {
		const target = analysisTargetFor(tree, fixedMarker(3, 5));
		expect(target?.kind).toBe("elements");
		if (target?.kind === "elements") {
			expect(target.elements.map((element) => element.kind)).toEqual([
				"first",
				"second",
			]);
		}
	});

	it("analyzes nothing when the scope overlaps no element", () => {
		expect(analysisTargetFor(tree, fixedMarker(12, 20))).toBeNull();
	});
});

describe("diagnosticsAt", () => {
	it("keeps only diagnostics at exactly the given range", () => {
		const set = diagnosticSetOf([
			diagnostic("TS2304", 4, 7),
			diagnostic("TS2552", 4, 8),
			diagnostic("TS1005", 0, 3),
		]);
		expect(diagnosticsAt(set, { start: 4, end: 7 }).map((d) => d.code)).toEqual([
			"TS2304",
		]);
	});
});
