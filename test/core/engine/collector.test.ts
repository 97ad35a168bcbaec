// CHANGE: Specs for the action collector
// WHY: Priority ordering, traversal order and scope containment are the collector's whole contract
// REF: REQ-ACTION-COLLECTOR
// FORMAT THEOREM: ∀ i < j: actions[i].priority <= actions[j].priority

import { Either } from "effect";
import { describe, expect, it, vi } from "vitest";

import { collectActions } from "../../../src/core/engine/collector.js";
import { diagnosticSetOf, emptyDiagnostics } from "../../../src/core/engine/diagnostics.js";
import type {
	Action,
	Batch,
	RangeMarker,
	RuleSettings,
} from "../../../src/core/types/index.js";
import {
	branch,
	createMemoryTree,
	leaf,
	type MemoryNode,
} from "../../../src/shell/memory/tree.js";
import { diagnostic, fixedMarker, rule } from "../../utils/builders.js";

const makeTree = () =>
	createMemoryTree(branch("file", [leaf("a", "AA"), leaf("b", "BB")]));

const noop = (): void => undefined;

const collect = (
	batch: Batch<MemoryNode>,
	scope: RangeMarker | null = null,
	settings: RuleSettings | null = null,
) => {
	const tree = makeTree();
	return collectActions({
		batch,
		tree,
		scope,
		diagnostics: emptyDiagnostics,
		settings,
	});
};

const labels = (
	collected: Either.Either<ReadonlyArray<Action<MemoryNode>>, unknown>,
): string[] =>
	Either.isRight(collected)
		? collected.right.map((action) => `${action.ruleId}@${action.node.kind}`)
		: [];

const onKind =
	(kind: string) =>
	(node: MemoryNode): (() => void) | null =>
		node.kind === kind ? noop : null;

describe("collectActions", () => {
	it("orders actions by ascending priority", () => {
		const batch = [
			rule<MemoryNode>("p2", { priority: 2, decide: onKind("a") }),
			rule<MemoryNode>("p1", { priority: 1, decide: onKind("a") }),
			rule<MemoryNode>("p3", { priority: 3, decide: onKind("a") }),
		];
		expect(labels(collect(batch))).toEqual(["p1@a", "p2@a", "p3@a"]);
	});

	it("keeps traversal then registry order for equal priorities, children first", () => {
		const batch = [
			rule<MemoryNode>("t1", { priority: 5, decide: () => noop }),
			rule<MemoryNode>("t2", { priority: 5, decide: () => noop }),
		];
		expect(labels(collect(batch))).toEqual([
			"t1@a",
			"t2@a",
			"t1@b",
			"t2@b",
			"t1@file",
			"t2@file",
		]);
	});

	it("asks rules only about nodes contained in the scope", () => {
		const seen: string[] = [];
		const spy = rule<MemoryNode>("spy", {
			decide: (node) => {
				seen.push(node.kind);
				return null;
			},
		});
		collect([spy], fixedMarker(2, 4));
		expect(seen).toEqual(["b"]);
	});

	it("never descends into a subtree outside the scope", () => {
		const tree = createMemoryTree(
			branch("file", [branch("outside", [leaf("deep", "DD")]), leaf("in", "II")]),
		);
		const seen: string[] = [];
		const spy = rule<MemoryNode>("spy", {
			decide: (node) => {
				seen.push(node.kind);
				return null;
			},
		});
		collectActions({
			batch: [spy],
			tree,
			scope: fixedMarker(2, 4),
			diagnostics: emptyDiagnostics,
			settings: null,
		});
		expect(seen).toEqual(["in"]);
	});

	it("asks nothing once the scope marker is invalid", () => {
		const decide = vi.fn(() => null);
		const collected = collect([rule<MemoryNode>("spy", { decide })], fixedMarker(0, 4, false));
		expect(decide).not.toHaveBeenCalled();
		expect(labels(collected)).toEqual([]);
	});

	it("hands diagnostics and settings to every rule untouched", () => {
		const tree = makeTree();
		const diagnostics = diagnosticSetOf([diagnostic("TS2304", 0, 2)]);
		const settings: RuleSettings = { mode: "strict" };
		const decide = vi.fn(() => null);
		collectActions({
			batch: [rule<MemoryNode>("spy", { decide })],
			tree,
			scope: null,
			diagnostics,
			settings,
		});
		expect(decide).toHaveBeenCalledTimes(3);
		expect(decide).toHaveBeenCalledWith(tree.root(), diagnostics, settings);
	});

	it("reports a rule throwing while deciding as RuleFailed", () => {
		const collected = collect([
			rule<MemoryNode>("explosive", {
				decide: () => {
					throw new Error("boom");
				},
			}),
		]);
		expect(Either.isLeft(collected)).toBe(true);
		if (Either.isLeft(collected)) {
			expect(collected.left).toMatchObject({
				_tag: "RuleFailed",
				ruleId: "explosive",
				phase: "collect",
				detail: "boom",
			});
		}
	});
});
