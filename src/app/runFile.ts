// CHANGE: Application orchestration of the fixpoint-postprocess command
// WHY: Compose config loading, the TypeScript host and the post-processor; return ExitCode as a value
// REF: REQ-CLI
// PURITY: APP (console output and file writes, no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every failure is reported once on stderr and mapped to exit code 1
// COMPLEXITY: O(post-processing)

import * as path from "node:path";

import { Effect } from "effect";
import { type Node, Project, type SourceFile } from "ts-morph";
import { match } from "ts-pattern";

import { computeExitCode } from "../core/decision.js";
import { group, ruleIdsOf, withoutRules } from "../core/engine/registry.js";
import { type AppError, describeThrown, UsageError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type {
	BatchReport,
	CLIOptions,
	RangeMarker,
} from "../core/types/index.js";
import { loadPostProcessingConfig } from "../shell/config/loader.js";
import { typeScriptAnalyzer } from "../shell/typescript/analyzer.js";
import { typeScriptFormatter } from "../shell/typescript/formatter.js";
import {
	typeScriptImportInserter,
	typeScriptResolver,
} from "../shell/typescript/imports.js";
import { createDefaultRegistry } from "../shell/typescript/registry.js";
import {
	createOffsetRangeMarker,
	createSourceFileTree,
	type SourceFileTree,
} from "../shell/typescript/tree.js";
import { runPostProcessingOnce } from "./postProcessor.js";

/**
 * Render an application error as one line.
 *
 * @pure true
 */
export const formatAppError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "RegistryCorrupted" },
			(e) => `Corrupted rule registry at ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "RuleFailed" },
			(e) =>
				`Rule ${e.ruleId} failed while ${e.phase === "collect" ? "collecting" : "applying"}: ${e.detail}`,
		)
		.with(
			{ _tag: "CollaboratorFailed" },
			(e) => `The ${e.collaborator} failed: ${e.detail}`,
		)
		.with(
			{ _tag: "ConvergenceNotReached" },
			(e) =>
				`Rules [${e.rules.join(", ")}] did not converge within ${e.rounds} rounds`,
		)
		.with(
			{ _tag: "ConfigInvalid" },
			(e) => `Invalid configuration ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.exhaustive();

/**
 * One summary line per converged batch.
 *
 * @pure true
 */
export const formatBatchReport = (report: BatchReport): string =>
	`[${report.rules.join(", ")}] rounds=${report.rounds} applied=${report.appliedActions} skipped=${report.skippedActions}`;

/**
 * Load the input file, through tsconfig.json when given, else with the .ts files beside it.
 *
 * @effect Effect<SourceFile, UsageError>
 */
function loadSourceFile(options: CLIOptions): Effect.Effect<SourceFile, UsageError> {
	return Effect.try({
		try: () => {
			const filePath = path.resolve(options.filePath);
			const project =
				options.tsconfigPath === null
					? new Project()
					: new Project({ tsConfigFilePath: path.resolve(options.tsconfigPath) });
			if (options.tsconfigPath === null) {
				project.addSourceFilesAtPaths([
					path.join(path.dirname(filePath), "**/*.{ts,tsx}"),
					"!**/node_modules/**",
				]);
			}
			return project.getSourceFile(filePath) ?? project.addSourceFileAtPath(filePath);
		},
		catch: (error) =>
			new UsageError({
				detail: `cannot load ${options.filePath}: ${describeThrown(error)}`,
			}),
	});
}

function scopeFor(
	tree: SourceFileTree,
	options: CLIOptions,
): Effect.Effect<RangeMarker | null, UsageError> {
	if (options.range === null) return Effect.succeed(null);
	const marker = createOffsetRangeMarker(tree, options.range.start, options.range.end);
	if (marker === null) {
		return Effect.fail(
			new UsageError({
				detail: `no statement lies inside ${options.range.start}:${options.range.end}`,
			}),
		);
	}
	return Effect.succeed(marker);
}

function postProcessFile(options: CLIOptions): Effect.Effect<void, AppError> {
	return Effect.gen(function* () {
		const config = yield* loadPostProcessingConfig(path.resolve(options.configPath));
		const sourceFile = yield* loadSourceFile(options);
		const tree = createSourceFileTree(sourceFile);
		const scope = yield* scopeFor(tree, options);

		const registry =
			withoutRules(createDefaultRegistry(), config.disabledRules) ??
			group<Node>("translation-fixups", []);
		const enabled = ruleIdsOf(registry);
		if (enabled.length === 0) console.warn("All rules are disabled by configuration");

		const report = yield* runPostProcessingOnce(
			{
				registry,
				analyzer: typeScriptAnalyzer,
				formatter: typeScriptFormatter,
				resolver: typeScriptResolver,
				importInserter: typeScriptImportInserter,
				formatCode: config.formatCode && !options.noFormat,
				maxRoundsPerBatch: config.maxRoundsPerBatch,
			},
			tree,
			scope,
			config.settings,
		);

		// stdout carries only the file text unless it is written back
		const summary = (line: string): void => {
			if (options.write) console.log(line);
			else console.error(line);
		};
		if (options.write) {
			yield* Effect.try({
				try: () => sourceFile.saveSync(),
				catch: (error) =>
					new UsageError({
						detail: `cannot write ${options.filePath}: ${describeThrown(error)}`,
					}),
			});
			summary(`✅ Wrote ${options.filePath}`);
		} else {
			console.log(sourceFile.getFullText());
		}
		for (const batch of report.batches) summary(formatBatchReport(batch));
		if (report.formatted) summary("Formatted");
	});
}

/**
 * Run fixpoint-postprocess for parsed options.
 *
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition any AppError → 1
 */
export function runFile(options: CLIOptions): Effect.Effect<ExitCode, never> {
	return postProcessFile(options).pipe(
		Effect.as(computeExitCode({ failed: false })),
		Effect.catchAll((error) =>
			Effect.sync(() => {
				console.error(`❌ ${formatAppError(error)}`);
				return computeExitCode({ failed: true });
			}),
		),
	);
}
