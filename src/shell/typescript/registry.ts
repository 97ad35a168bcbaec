// CHANGE: Default rule registry of the TypeScript host
// WHY: Declarations are fixed before expressions; imports are resolved last, once names have settled
// REF: REQ-BUILTIN-RULES, REQ-REGISTRY
// PURITY: CORE (data only)
// INVARIANT: planBatches(createDefaultRegistry()) = [[var-to-let], [strict-equality, unwrap-parentheses], [missing-import]]

import type { Node } from "ts-morph";

import { group, single } from "../../core/engine/registry.js";
import type { RegistryNode } from "../../core/types/index.js";
import {
	missingImport,
	strictEquality,
	unwrapParentheses,
	varToLet,
} from "./rules.js";

export const createDefaultRegistry = (): RegistryNode<Node> =>
	group("translation-fixups", [
		group("declarations", [single(varToLet)]),
		group("expressions", [single(strictEquality), single(unwrapParentheses)]),
		single(missingImport),
	]);
