// CHANGE: Load fixpoint.config.json from disk
// WHY: A missing file means defaults; an unreadable or malformed one is an error the CLI reports
// REF: REQ-CONFIG
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<PostProcessingConfig, ConfigInvalid>
// COMPLEXITY: O(|file|)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { DEFAULT_CONFIG, parsePostProcessingConfig } from "../../core/config.js";
import { ConfigInvalid, describeThrown } from "../../core/errors.js";
import type { JSONValue, PostProcessingConfig } from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "fixpoint.config.json";

/**
 * Read and validate the configuration file at `configPath`.
 *
 * @pure false
 * @effect Effect<PostProcessingConfig, ConfigInvalid>
 * @postcondition file absent → DEFAULT_CONFIG
 */
export function loadPostProcessingConfig(
	configPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE),
): Effect.Effect<PostProcessingConfig, ConfigInvalid> {
	return Effect.gen(function* () {
		if (!fs.existsSync(configPath)) return DEFAULT_CONFIG;
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new ConfigInvalid({ path: configPath, detail: describeThrown(error) }),
		});
		const parsed: JSONValue = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				new ConfigInvalid({
					path: configPath,
					detail: `invalid JSON: ${describeThrown(error)}`,
				}),
		});
		return yield* parsePostProcessingConfig(parsed, configPath);
	});
}
