// CHANGE: Specs for fixpoint-postprocess argument parsing
// WHY: Every flag maps to one option; malformed input becomes a UsageError, never an exception
// REF: REQ-CLI

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { parseCLIArgs } from "../../../src/shell/config/cli.js";

const usageDetail = (args: ReadonlyArray<string>): string | null =>
	Either.match(parseCLIArgs(args), {
		onLeft: (error) => error.detail,
		onRight: () => null,
	});

describe("parseCLIArgs", () => {
	it("applies defaults for a bare file argument", () => {
		expect(parseCLIArgs(["out.ts"])).toEqual(
			Either.right({
				filePath: "out.ts",
				range: null,
				noFormat: false,
				write: false,
				configPath: "fixpoint.config.json",
				tsconfigPath: null,
			}),
		);
	});

	it("reads every flag", () => {
		expect(
			parseCLIArgs([
				"--range",
				"10:42",
				"out.ts",
				"--no-format",
				"--write",
				"--config",
				"cfg.json",
				"--tsconfig",
				"tsconfig.json",
			]),
		).toEqual(
			Either.right({
				filePath: "out.ts",
				range: { start: 10, end: 42 },
				noFormat: true,
				write: true,
				configPath: "cfg.json",
				tsconfigPath: "tsconfig.json",
			}),
		);
	});

	it.each([
		[["out.ts", "--range", "7"], '--range expects <start>:<end>, got "7"'],
		[["out.ts", "--range", "9:3"], '--range expects <start>:<end>, got "9:3"'],
		[["out.ts", "--config"], "--config expects a value"],
		[["out.ts", "--verbose"], "unknown option --verbose"],
		[["out.ts", "more.ts"], 'unexpected argument "more.ts"'],
		[["--write"], "missing <file> argument"],
	] as const)("rejects %j", (args, detail) => {
		expect(usageDetail(args)).toBe(detail);
	});
});
