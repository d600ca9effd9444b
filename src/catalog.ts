// Lexicon Catalog
// Parsing of lexicon documents and the id → document map they form

import { LexiconError } from "./errors.js";
import { isValidNsid } from "./formats.js";
import { isObject, type Catalog, type LexiconDocument, type RawSchema } from "./types.js";

//==============================================================================
// Document Parsing
//==============================================================================

/**
 * Parse a JSON value as a lexicon document: `{ lexicon?, id, description?, defs }`.
 */
export function parseLexiconDocument(value: unknown): LexiconDocument {
	if (!isObject(value)) {
		throw LexiconError.invalidSchema("lexicon document must be an object");
	}

	const { id, lexicon, description, defs } = value;
	if (typeof id !== "string") {
		throw LexiconError.invalidSchema("lexicon document is missing a string 'id'");
	}
	if (!isValidNsid(id)) {
		throw LexiconError.invalidSchema(`lexicon id '${id}' is not a valid NSID`);
	}
	if (lexicon !== undefined && lexicon !== 1) {
		throw LexiconError.invalidSchema(`${id}: unsupported lexicon version ${JSON.stringify(lexicon)}`);
	}
	if (description !== undefined && typeof description !== "string") {
		throw LexiconError.invalidSchema(`${id}: description must be a string`);
	}
	if (!isObject(defs)) {
		throw LexiconError.invalidSchema(`${id}: defs must be an object`);
	}

	const definitions = new Map<string, RawSchema>();
	for (const [name, def] of Object.entries(defs)) {
		if (name === "") {
			throw LexiconError.invalidSchema(`${id}: definition names cannot be empty`);
		}
		if (!isObject(def)) {
			throw LexiconError.invalidSchema(`${id}#${name}: definition must be an object`);
		}
		definitions.set(name, def);
	}

	const doc: LexiconDocument = { id, defs: definitions };
	if (lexicon === 1) doc.lexicon = lexicon;
	if (description !== undefined) doc.description = description;
	return doc;
}

//==============================================================================
// Catalog Construction
//==============================================================================

export interface CatalogProblem {
	/** Document id, or `document[<index>]` without a usable id or for a repeated one. */
	source: string;
	error: LexiconError;
}

export interface CatalogBuild {
	catalog: Catalog;
	problems: CatalogProblem[];
	/** Source of each kept document, by id. */
	sources: Map<string, string>;
}

/**
 * Key a document's problems are reported under.
 */
export function documentSource(value: unknown, index: number): string {
	if (isObject(value) && typeof value.id === "string" && value.id !== "") {
		return value.id;
	}
	return "document[" + String(index) + "]";
}

/**
 * Sources for a list of documents. An id names only its first document;
 * later documents repeating it fall back to their position.
 */
export function documentSources(documents: readonly unknown[]): string[] {
	const claimed = new Set<string>();
	return documents.map((value, index) => {
		const source = documentSource(value, index);
		if (claimed.has(source)) {
			return "document[" + String(index) + "]";
		}
		claimed.add(source);
		return source;
	});
}

/**
 * Parse every document and collect them by id. Documents that fail to parse,
 * and later documents repeating an earlier id, are reported as problems and
 * left out of the catalog.
 */
export function buildCatalog(documents: readonly unknown[]): CatalogBuild {
	const catalog = new Map<string, LexiconDocument>();
	const problems: CatalogProblem[] = [];
	const sources = new Map<string, string>();
	const inputSources = documentSources(documents);

	documents.forEach((value, index) => {
		const source = inputSources[index] ?? documentSource(value, index);
		try {
			const doc = parseLexiconDocument(value);
			if (catalog.has(doc.id)) {
				problems.push({
					source,
					error: LexiconError.invalidSchema(`duplicate lexicon id '${doc.id}'`),
				});
				return;
			}
			catalog.set(doc.id, doc);
			sources.set(doc.id, source);
		} catch (error) {
			if (!(error instanceof LexiconError)) {
				throw error;
			}
			problems.push({ source, error });
		}
	});

	return { catalog, problems, sources };
}

/**
 * Build a catalog, failing on the first problem.
 */
export function createCatalog(documents: readonly unknown[]): Catalog {
	const { catalog, problems } = buildCatalog(documents);
	const [first] = problems;
	if (first !== undefined) {
		throw first.error;
	}
	return catalog;
}

/**
 * Raw `main` definition of a document.
 */
export function lookupMain(catalog: Catalog, id: string): RawSchema {
	const doc = catalog.get(id);
	if (doc === undefined) {
		throw LexiconError.lexiconNotFound(id);
	}
	const main = doc.defs.get("main");
	if (main === undefined) {
		throw LexiconError.invalidSchema(`${id}: lexicon has no 'main' definition`);
	}
	return main;
}
