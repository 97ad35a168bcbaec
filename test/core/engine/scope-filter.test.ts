// CHANGE: Specs for half-open range arithmetic and scope classification
// WHY: Containment and overlap decide which nodes rules ever see
// REF: REQ-SCOPE-FILTER
// FORMAT THEOREM: ∀a,b: contains(a,b) ∧ |b| > 0 ⇒ overlaps(a,b)

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	rangeContains,
	rangesOverlap,
	sameRange,
} from "../../../src/core/engine/range.js";
import { classifyNode } from "../../../src/core/engine/scope-filter.js";
import { fixedMarker } from "../../utils/builders.js";

const rangeArb = fc
	.tuple(fc.nat(1000), fc.nat(1000))
	.map(([a, b]) => ({ start: Math.min(a, b), end: Math.max(a, b) }));

describe("range arithmetic", () => {
	it("treats touching ranges as disjoint", () => {
		expect(rangesOverlap({ start: 0, end: 2 }, { start: 2, end: 4 })).toBe(false);
	});

	it("contains an empty range sitting on the outer end", () => {
		expect(rangeContains({ start: 2, end: 4 }, { start: 4, end: 4 })).toBe(true);
	});

	it("compares ranges by both offsets", () => {
		expect(sameRange({ start: 1, end: 3 }, { start: 1, end: 3 })).toBe(true);
		expect(sameRange({ start: 1, end: 3 }, { start: 1, end: 4 })).toBe(false);
	});

	it("containment of a non-empty range implies overlap", () => {
		fc.assert(
			fc.property(rangeArb, rangeArb, (outer, inner) => {
				if (rangeContains(outer, inner) && inner.end > inner.start) {
					expect(rangesOverlap(outer, inner)).toBe(true);
				}
			}),
		);
	});

	it("overlap is symmetric", () => {
		fc.assert(
			fc.property(rangeArb, rangeArb, (a, b) => {
				expect(rangesOverlap(a, b)).toBe(rangesOverlap(b, a));
			}),
		);
	});
});

describe("classifyNode", () => {
	it("makes every node eligible without a scope", () => {
		expect(classifyNode({ start: 0, end: 100 }, null)).toBe("eligible");
	});

	it("excludes every node once the scope marker is invalid", () => {
		expect(classifyNode({ start: 2, end: 3 }, fixedMarker(0, 10, false))).toBe(
			"excluded",
		);
	});

	it("makes nodes inside the scope eligible", () => {
		expect(classifyNode({ start: 2, end: 4 }, fixedMarker(2, 4))).toBe("eligible");
	});

	it("traverses nodes that straddle the scope without making them eligible", () => {
		expect(classifyNode({ start: 0, end: 4 }, fixedMarker(2, 4))).toBe(
			"traverse-only",
		);
	});

	it("excludes nodes that only touch the scope", () => {
		expect(classifyNode({ start: 0, end: 2 }, fixedMarker(2, 4))).toBe("excluded");
	});

	it("makes an empty node on the scope boundary eligible", () => {
		expect(classifyNode({ start: 4, end: 4 }, fixedMarker(2, 4))).toBe("eligible");
		expect(classifyNode({ start: 2, end: 2 }, fixedMarker(2, 4))).toBe("eligible");
	});

	it("excludes nodes after the scope", () => {
		expect(classifyNode({ start: 5, end: 9 }, fixedMarker(2, 4))).toBe("excluded");
	});
});
