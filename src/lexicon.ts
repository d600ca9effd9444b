// Lexicon Validation API
// Entry points: whole-catalog schema checks and data checks against a document's main definition

import { buildCatalog, createCatalog, lookupMain } from "./catalog.js";
import {
	capture,
	invalidResult,
	isLexiconError,
	LexiconError,
	validResult,
	type ValidationResult,
} from "./errors.js";
import type { Catalog, SchemaNode, SchemaType } from "./types.js";
import type { ValidationContext, ValidationOptions } from "./validation/context.js";
import { checkDefinition, createContext } from "./validation/dispatcher.js";
import { checkBodyData, checkMessageData, checkParametersData } from "./validation/primary.js";

export type DocumentErrors = Map<string, string[]>;

//==============================================================================
// Schema Validation
//==============================================================================

/**
 * Check every definition of every document. Errors are grouped by document
 * source (see `documentSources`), one message per failing definition, each
 * prefixed `<id>#<def>: `.
 */
export function validate(
	documents: readonly unknown[],
	options?: ValidationOptions,
): ValidationResult<Catalog, DocumentErrors> {
	const { catalog, problems, sources } = buildCatalog(documents);
	const errors: DocumentErrors = new Map();

	const report = (id: string, message: string): void => {
		const list = errors.get(id);
		if (list === undefined) {
			errors.set(id, [message]);
		} else {
			list.push(message);
		}
	};

	for (const { source, error } of problems) {
		report(source, error.message);
	}

	const root = createContext(catalog, options);
	for (const [id, doc] of catalog) {
		const source = sources.get(id) ?? id;
		const docCtx = root.withCurrentDocument(id);
		for (const [name, def] of doc.defs) {
			try {
				checkDefinition(name, def, docCtx.withPath("defs." + name));
			} catch (error) {
				if (!isLexiconError(error)) {
					throw error;
				}
				report(source, `${id}#${name}: ${error.message}`);
			}
		}
	}

	return errors.size === 0 ? validResult(catalog) : invalidResult(errors);
}

//==============================================================================
// Main Definitions
//==============================================================================

type SchemaOf<T extends SchemaType> = Extract<SchemaNode, { type: T }>;

function hasType<T extends SchemaType>(schema: SchemaNode, types: readonly T[]): schema is SchemaOf<T> {
	return types.some((type) => type === schema.type);
}

/**
 * Build the catalog and parse `id`'s main definition, which must be one of
 * `types`. Data checks run in the returned context, rooted at that document.
 */
function loadMain<T extends SchemaType>(
	documents: readonly unknown[],
	id: string,
	types: readonly T[],
	options: ValidationOptions | undefined,
): { ctx: ValidationContext; schema: SchemaOf<T> } {
	const catalog = createCatalog(documents);
	const raw = lookupMain(catalog, id);
	const ctx = createContext(catalog, options).withCurrentDocument(id);
	const schema = ctx.withPath("defs.main").checkSchema(raw);
	if (!hasType(schema, types)) {
		throw LexiconError.invalidSchema(
			`${id}: main definition is a ${schema.type}, expected ${types.join(" or ")}`,
		);
	}
	return { ctx, schema };
}

//==============================================================================
// Data Validation
//==============================================================================

/**
 * Validate a record against the `main` record definition of `typeId`.
 */
export function validateRecord(
	documents: readonly unknown[],
	typeId: string,
	record: unknown,
	options?: ValidationOptions,
): ValidationResult<unknown> {
	return capture(() => {
		const { ctx, schema } = loadMain(documents, typeId, ["record"], options);
		ctx.checkData(record, schema);
		return record;
	});
}

/**
 * Validate decoded query parameters for a query, procedure or subscription.
 */
export function validateXrpcParams(
	documents: readonly unknown[],
	nsid: string,
	params: unknown,
	options?: ValidationOptions,
): ValidationResult<unknown> {
	return capture(() => {
		const { ctx, schema } = loadMain(documents, nsid, ["query", "procedure", "subscription"], options);
		checkParametersData(params, schema.parameters, ctx);
		return params;
	});
}

/**
 * Validate a procedure's input body.
 */
export function validateXrpcInput(
	documents: readonly unknown[],
	nsid: string,
	body: unknown,
	options?: ValidationOptions,
): ValidationResult<unknown> {
	return capture(() => {
		const { ctx, schema } = loadMain(documents, nsid, ["procedure"], options);
		checkBodyData(body, schema.input, ctx);
		return body;
	});
}

/**
 * Validate a query or procedure output body.
 */
export function validateXrpcOutput(
	documents: readonly unknown[],
	nsid: string,
	body: unknown,
	options?: ValidationOptions,
): ValidationResult<unknown> {
	return capture(() => {
		const { ctx, schema } = loadMain(documents, nsid, ["query", "procedure"], options);
		checkBodyData(body, schema.output, ctx);
		return body;
	});
}

export function validateSubscriptionMessage(
	documents: readonly unknown[],
	nsid: string,
	message: unknown,
	options?: ValidationOptions,
): ValidationResult<unknown> {
	return capture(() => {
		const { ctx, schema } = loadMain(documents, nsid, ["subscription"], options);
		checkMessageData(message, schema.message, ctx);
		return message;
	});
}
