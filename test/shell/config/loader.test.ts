// CHANGE: Specs for loading fixpoint.config.json from disk
// WHY: A missing file means defaults; unreadable JSON is reported as ConfigInvalid
// REF: REQ-CONFIG

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../../../src/core/config.js";
import { loadPostProcessingConfig } from "../../../src/shell/config/loader.js";

describe("loadPostProcessingConfig", () => {
	let dir = "";

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "fixpoint-config-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	const write = (contents: string): string => {
		const file = path.join(dir, "fixpoint.config.json");
		fs.writeFileSync(file, contents);
		return file;
	};

	it("falls back to the defaults when the file does not exist", async () => {
		const config = await Effect.runPromise(
			loadPostProcessingConfig(path.join(dir, "absent.json")),
		);
		expect(config).toEqual(DEFAULT_CONFIG);
	});

	it("merges the file over the defaults", async () => {
		const file = write('{ "maxRoundsPerBatch": 7, "settings": { "strict-equality.allowNullComparison": false } }');
		const config = await Effect.runPromise(loadPostProcessingConfig(file));
		expect(config).toEqual({
			formatCode: true,
			maxRoundsPerBatch: 7,
			disabledRules: [],
			settings: { "strict-equality.allowNullComparison": false },
		});
	});

	it("reports malformed JSON", async () => {
		const file = write("{ formatCode: ");
		const error = await Effect.runPromise(Effect.flip(loadPostProcessingConfig(file)));
		expect(error._tag).toBe("ConfigInvalid");
		expect(error.path).toBe(file);
		expect(error.detail.startsWith("invalid JSON: ")).toBe(true);
	});

	it("reports a field of the wrong type", async () => {
		const file = write('{ "formatCode": 1 }');
		const error = await Effect.runPromise(Effect.flip(loadPostProcessingConfig(file)));
		expect(error).toMatchObject({
			_tag: "ConfigInvalid",
			path: file,
			detail: "formatCode must be a boolean",
		});
	});
});
