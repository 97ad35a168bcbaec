// CHANGE: Optional debug logger controlled by env FIXPOINT_DEBUG
// WHY: Trace rounds, batches and skipped actions without noise in normal runs
// REF: REQ-LOGGING
// PURITY: SHELL (console side effect only when the flag is set)

const ENV: NodeJS.ProcessEnv & { FIXPOINT_DEBUG?: string } = process.env;

/**
 * True when per-round tracing is requested.
 */
export const isDebugEnabled = (): boolean => ENV.FIXPOINT_DEBUG === "1";

/**
 * Write one trace line to stderr when FIXPOINT_DEBUG=1.
 *
 * @pure false
 * @complexity O(1)
 */
export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error("[fixpoint]", message);
	}
}
