// CHANGE: Default run configuration and validation of fixpoint.config.json contents
// WHY: Reading the file is a shell concern; deciding whether its JSON is usable is pure
// REF: REQ-CONFIG
// FORMAT THEOREM:
//   parse(v) = Right(defaults ⊕ v)  if v is an object and every present field has its type
//            = Left(ConfigInvalid)   otherwise
// PURITY: CORE
// INVARIANT: maxRoundsPerBatch is a positive integer
// COMPLEXITY: O(|v|)

import { Either } from "effect";

import { ConfigInvalid } from "./errors.js";
import type {
	JSONValue,
	PostProcessingConfig,
	RuleSettings,
} from "./types/index.js";

/**
 * Rounds one batch may take before the run fails with ConvergenceNotReached.
 */
export const DEFAULT_MAX_ROUNDS_PER_BATCH = 100;

export const DEFAULT_CONFIG: PostProcessingConfig = {
	formatCode: true,
	maxRoundsPerBatch: DEFAULT_MAX_ROUNDS_PER_BATCH,
	disabledRules: [],
	settings: {},
};

function isJSONObject(value: JSONValue): value is RuleSettings {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validate parsed configuration JSON.
 *
 * @param value - Parsed file contents
 * @param path - File the value came from, used in errors
 * @returns The configuration with defaults for absent fields
 *
 * @pure true
 * @complexity O(|value|)
 */
export function parsePostProcessingConfig(
	value: JSONValue,
	path: string,
): Either.Either<PostProcessingConfig, ConfigInvalid> {
	const invalid = (detail: string) =>
		Either.left(new ConfigInvalid({ path, detail }));
	if (!isJSONObject(value)) return invalid("expected a JSON object");

	const {
		formatCode = DEFAULT_CONFIG.formatCode,
		maxRoundsPerBatch = DEFAULT_CONFIG.maxRoundsPerBatch,
		disabledRules = DEFAULT_CONFIG.disabledRules,
		settings = DEFAULT_CONFIG.settings,
	} = value;

	if (typeof formatCode !== "boolean") {
		return invalid("formatCode must be a boolean");
	}
	if (
		typeof maxRoundsPerBatch !== "number" ||
		!Number.isInteger(maxRoundsPerBatch) ||
		maxRoundsPerBatch < 1
	) {
		return invalid("maxRoundsPerBatch must be a positive integer");
	}
	if (!isStringArray(disabledRules)) {
		return invalid("disabledRules must be an array of rule ids");
	}
	if (!isJSONObject(settings)) {
		return invalid("settings must be a JSON object");
	}
	return Either.right({ formatCode, maxRoundsPerBatch, disabledRules, settings });
}
