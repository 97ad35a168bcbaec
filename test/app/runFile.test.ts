// CHANGE: Specs for the fixpoint-postprocess orchestration
// WHY: The CLI writes the converged file back and maps every failure to exit code 1
// REF: REQ-CLI

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { formatAppError, formatBatchReport, runFile } from "../../src/app/runFile.js";
import { ConvergenceNotReached, RuleFailed } from "../../src/core/errors.js";
import type { CLIOptions } from "../../src/core/types/index.js";

describe("runFile", () => {
	let dir = "";

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "fixpoint-run-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	const optionsFor = (file: string, over: Partial<CLIOptions> = {}): CLIOptions => ({
		filePath: file,
		range: null,
		noFormat: true,
		write: true,
		configPath: path.join(dir, "fixpoint.config.json"),
		tsconfigPath: null,
		...over,
	});

	it("writes the converged file back and exits with 0", async () => {
		const file = path.join(dir, "main.ts");
		fs.writeFileSync(file, "var a = 1;\nvar b = a == 2;\n");
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		const code = await Effect.runPromise(runFile(optionsFor(file)));

		expect(code).toBe(0);
		expect(fs.readFileSync(file, "utf8")).toBe("let a = 1;\nlet b = a === 2;\n");
		expect(log).toHaveBeenCalledWith(`✅ Wrote ${file}`);
	});

	it("exits with 1 and reports an invalid configuration", async () => {
		const file = path.join(dir, "main.ts");
		fs.writeFileSync(file, "var a = 1;\n");
		const configPath = path.join(dir, "fixpoint.config.json");
		fs.writeFileSync(configPath, '{ "maxRoundsPerBatch": -1 }');
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		const code = await Effect.runPromise(runFile(optionsFor(file)));

		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith(
			`❌ Invalid configuration ${configPath}: maxRoundsPerBatch must be a positive integer`,
		);
		expect(fs.readFileSync(file, "utf8")).toBe("var a = 1;\n");
	});

	it("rejects a range that contains no statement", async () => {
		const file = path.join(dir, "main.ts");
		fs.writeFileSync(file, "var a = 1;\n");
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		const code = await Effect.runPromise(
			runFile(optionsFor(file, { range: { start: 2, end: 4 } })),
		);

		expect(code).toBe(1);
		expect(error).toHaveBeenCalledWith("❌ no statement lies inside 2:4");
	});
});

describe("formatAppError", () => {
	it("names the failing rule and phase", () => {
		expect(
			formatAppError(new RuleFailed({ ruleId: "grow", phase: "apply", detail: "boom" })),
		).toBe("Rule grow failed while applying: boom");
	});

	it("lists the rules that did not converge", () => {
		expect(
			formatAppError(new ConvergenceNotReached({ rules: ["a", "b"], rounds: 100 })),
		).toBe("Rules [a, b] did not converge within 100 rounds");
	});
});

describe("formatBatchReport", () => {
	it("renders one summary line", () => {
		expect(
			formatBatchReport({
				rules: ["var-to-let"],
				rounds: 2,
				appliedActions: 3,
				skippedActions: 0,
			}),
		).toBe("[var-to-let] rounds=2 applied=3 skipped=0");
	});
});
