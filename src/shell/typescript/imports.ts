// CHANGE: Qualified-name resolution and import insertion over a ts-morph project
// WHY: Translated code references declarations of sibling modules without importing them
// REF: REQ-TS-HOST, REQ-IMPORT-INSERTION
// SOURCE: https://ts-morph.com/details/exports, https://ts-morph.com/details/imports
// FORMAT THEOREM:
//   resolve("a.b.Name") = [(f, d) | f ∈ files \ {self}, sorted by path,
//                          module(f) = "a.b" ∨ module(f) ends with ".a.b",
//                          d ∈ exported(f)["Name"]]
// PURITY: SHELL
// INVARIANT: A name already imported by the file is never imported twice
// COMPLEXITY: O(files · exports)

import type { Node, SourceFile } from "ts-morph";

import type { ImportInserter, SymbolResolver } from "../../core/types/index.js";
import type { SourceFileTree } from "./tree.js";

/**
 * Exported declaration that can be imported by name.
 */
export interface ImportCandidate {
	readonly name: string;
	readonly sourceFile: SourceFile;
	readonly declaration: Node;
}

/**
 * Dotted module path of a file: `/src/geometry/shapes.ts` → `src.geometry.shapes`.
 *
 * @pure true
 */
export const dottedModulePath = (filePath: string): string =>
	filePath
		.replace(/\.(?:d\.)?[cm]?tsx?$/, "")
		.split("/")
		.filter((segment) => segment.length > 0)
		.join(".");

const splitQualifiedName = (
	qualifiedName: string,
): { readonly qualifier: string | null; readonly name: string } => {
	const dot = qualifiedName.lastIndexOf(".");
	return dot < 0
		? { qualifier: null, name: qualifiedName }
		: { qualifier: qualifiedName.slice(0, dot), name: qualifiedName.slice(dot + 1) };
};

const moduleMatches = (filePath: string, qualifier: string | null): boolean => {
	if (qualifier === null) return true;
	const modulePath = dottedModulePath(filePath);
	return modulePath === qualifier || modulePath.endsWith(`.${qualifier}`);
};

/**
 * Candidates for `qualifiedName` seen from `from`, ordered by file path.
 *
 * @pure true (reads the project)
 */
export function resolveInProject(
	from: SourceFile,
	qualifiedName: string,
): ReadonlyArray<ImportCandidate> {
	const { qualifier, name } = splitQualifiedName(qualifiedName);
	if (name.length === 0) return [];
	return from
		.getProject()
		.getSourceFiles()
		.filter(
			(file) =>
				file !== from &&
				!file.isInNodeModules() &&
				moduleMatches(file.getFilePath(), qualifier),
		)
		.sort((a, b) => a.getFilePath().localeCompare(b.getFilePath()))
		.flatMap((file) =>
			(file.getExportedDeclarations().get(name) ?? []).map((declaration) => ({
				name,
				sourceFile: file,
				declaration,
			})),
		);
}

const importsName = (file: SourceFile, name: string): boolean =>
	file
		.getImportDeclarations()
		.some(
			(declaration) =>
				declaration.getDefaultImport()?.getText() === name ||
				declaration.getNamespaceImport()?.getText() === name ||
				declaration
					.getNamedImports()
					.some(
						(specifier) =>
							(specifier.getAliasNode() ?? specifier.getNameNode()).getText() ===
							name,
					),
		);

/**
 * Import `candidate` into `into`, merging with an import of the same module when there is one.
 *
 * @returns false when the name was already imported
 */
export function insertImportInto(
	into: SourceFile,
	candidate: ImportCandidate,
): boolean {
	if (importsName(into, candidate.name)) return false;
	const moduleSpecifier = into.getRelativePathAsModuleSpecifierTo(
		candidate.sourceFile,
	);
	const existing = into.getImportDeclaration(
		(declaration) =>
			declaration.getModuleSpecifierValue() === moduleSpecifier &&
			declaration.getNamespaceImport() === undefined,
	);
	if (existing === undefined) {
		into.addImportDeclaration({
			moduleSpecifier,
			namedImports: [candidate.name],
		});
	} else {
		existing.addNamedImport(candidate.name);
	}
	return true;
}

export const typeScriptResolver: SymbolResolver<SourceFileTree, ImportCandidate> = {
	resolveQualifiedName: (tree, name) => resolveInProject(tree.sourceFile, name),
};

export const typeScriptImportInserter: ImportInserter<
	SourceFileTree,
	ImportCandidate
> = {
	insertImport: (tree, candidate) => {
		insertImportInto(tree.sourceFile, candidate);
	},
};
