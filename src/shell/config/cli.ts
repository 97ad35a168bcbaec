// CHANGE: CLI argument parsing for fixpoint-postprocess
// WHY: Keep flag handling in a lookup table so every flag stays a one-line entry
// REF: REQ-CLI
// SOURCE: n/a

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CLIOptions } from "../../core/types/index.js";
import { DEFAULT_CONFIG_FILE } from "./loader.js";

type ParseState = Omit<CLIOptions, "filePath"> & {
	readonly filePath: string | null;
};

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
}

type ValueFlagHandler = (
	value: string,
	current: ParseState,
) => Either.Either<ParseState, UsageError>;

const RANGE_PATTERN = /^(\d+):(\d+)$/;

function parseRange(
	value: string,
): Either.Either<NonNullable<CLIOptions["range"]>, UsageError> {
	const found = RANGE_PATTERN.exec(value);
	const start = Number(found?.[1]);
	const end = Number(found?.[2]);
	if (found === null || start > end) {
		return Either.left(
			new UsageError({ detail: `--range expects <start>:<end>, got "${value}"` }),
		);
	}
	return Either.right({ start, end });
}

const valueHandlers: Record<string, ValueFlagHandler | undefined> = {
	"--range": (value, current) =>
		Either.map(parseRange(value), (range) => ({ ...current, range })),
	"--config": (value, current) => Either.right({ ...current, configPath: value }),
	"--tsconfig": (value, current) =>
		Either.right({ ...current, tsconfigPath: value }),
};

const booleanFlags: Record<string, ((current: ParseState) => ParseState) | undefined> = {
	"--no-format": (current) => ({ ...current, noFormat: true }),
	"--write": (current) => ({ ...current, write: true }),
};

function processArgument(
	arg: string,
	next: string | undefined,
	current: ParseState,
): Either.Either<ArgProcessResult, UsageError> {
	const valueHandler = valueHandlers[arg];
	if (valueHandler !== undefined) {
		if (next === undefined) {
			return Either.left(new UsageError({ detail: `${arg} expects a value` }));
		}
		return Either.map(valueHandler(next, current), (state) => ({
			state,
			skipNext: true,
		}));
	}

	const flag = booleanFlags[arg];
	if (flag !== undefined) return Either.right({ state: flag(current), skipNext: false });

	if (arg.startsWith("--")) {
		return Either.left(new UsageError({ detail: `unknown option ${arg}` }));
	}
	if (current.filePath !== null) {
		return Either.left(
			new UsageError({ detail: `unexpected argument "${arg}"` }),
		);
	}
	return Either.right({ state: { ...current, filePath: arg }, skipNext: false });
}

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @returns Options, or UsageError for unknown flags, missing values or a missing file
 *
 * @example
 * ```ts
 * parseCLIArgs(["src/out.ts", "--range", "10:42", "--write"]);
 * // Right({ filePath: "src/out.ts", range: { start: 10, end: 42 }, write: true, ... })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string>,
): Either.Either<CLIOptions, UsageError> {
	let state: ParseState = {
		filePath: null,
		range: null,
		noFormat: false,
		write: false,
		configPath: DEFAULT_CONFIG_FILE,
		tsconfigPath: null,
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;
		const result = processArgument(arg, args[i + 1], state);
		if (Either.isLeft(result)) return Either.left(result.left);
		state = result.right.state;
		if (result.right.skipNext) i++;
	}

	const { filePath, ...rest } = state;
	if (filePath === null) {
		return Either.left(new UsageError({ detail: "missing <file> argument" }));
	}
	return Either.right({ ...rest, filePath });
}

export const USAGE =
	"Usage: fixpoint-postprocess <file> [--range <start>:<end>] [--no-format] [--write] [--config <path>] [--tsconfig <path>]";
