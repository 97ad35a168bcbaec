// CHANGE: Configuration types for post-processing runs and opaque rule settings
// WHY: Settings are handed untouched to every rule; run options steer the engine itself
// REF: REQ-CONFIG
// SOURCE: n/a

/**
 * Any JSON value a configuration file may carry.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

/**
 * Opaque settings passed to every rule. Meaning is rule-specific.
 */
export type RuleSettings = { readonly [key: string]: JSONValue };

/**
 * Contents of fixpoint.config.json after validation.
 *
 * @property formatCode Run the formatter once every batch converged
 * @property maxRoundsPerBatch Upper bound on rounds spent on one batch
 * @property disabledRules Rule ids removed from the registry before planning
 * @property settings Opaque settings for rules
 */
export interface PostProcessingConfig {
	readonly formatCode: boolean;
	readonly maxRoundsPerBatch: number;
	readonly disabledRules: ReadonlyArray<string>;
	readonly settings: RuleSettings;
}

/**
 * Command line options of fixpoint-postprocess.
 *
 * @property filePath File to post-process
 * @property range Optional [start, end) scope inside the file
 * @property noFormat Skip the formatting pass regardless of config
 * @property write Write the result back instead of printing it
 * @property configPath Path of the configuration file
 * @property tsconfigPath Optional tsconfig.json the project is loaded from
 */
export interface CLIOptions {
	readonly filePath: string;
	readonly range: { readonly start: number; readonly end: number } | null;
	readonly noFormat: boolean;
	readonly write: boolean;
	readonly configPath: string;
	readonly tsconfigPath: string | null;
}
