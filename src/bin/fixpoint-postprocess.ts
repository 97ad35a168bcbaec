#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN parses argv, runs the effect and exits the process
// REF: REQ-CLI
// FORMAT THEOREM: ∀run: exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect, Either } from "effect";

import { runFile } from "../app/runFile.js";
import { parseCLIArgs, USAGE } from "../shell/config/cli.js";

/**
 * CLI entry point for fixpoint-postprocess.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const parsed = parseCLIArgs(process.argv.slice(2));
		if (Either.isLeft(parsed)) {
			console.error(`❌ ${parsed.left.detail}`);
			console.error(USAGE);
			process.exit(1);
		}
		const code = await Effect.runPromise(runFile(parsed.right));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
