// lexicheck Test Helper
// Contexts, fixtures and assertions shared by the validator tests

import assert from "node:assert";
import { createCatalog } from "../src/catalog.js";
import type { SchemaNode } from "../src/types.js";
import type { ValidationContext, ValidationOptions } from "../src/validation/context.js";
import { createContext } from "../src/validation/dispatcher.js";

// CIDv1, raw codec, sha2-256
export const RAW_CID = "bafkreigh2akiscaildcqabsyg3dfr6chu3fgpregiymsck7e7aqa4s52zy";
// Same digest under the dag-cbor codec
export const DAG_CBOR_CID = "bafyreigh2akiscaildcqabsyg3dfr6chu3fgpregiymsck7e7aqa4s52zy";
export const LEGACY_CID = "QmbWqxBEKC3P8tqsKc98xmWNzrzDtRLMiMPL8wBuTGsMnR";

export const POST_URI = "at://did:plc:abc123/com.example.feed.post/3jzfcijpj2z2a";

/**
 * Context over an empty catalog with no current document.
 */
export function rootContext(options?: ValidationOptions): ValidationContext {
	return createContext(new Map(), options);
}

/**
 * Context over a catalog of `documents`, resolving local references in `id`.
 */
export function documentContext(id: string, documents: unknown[]): ValidationContext {
	return createContext(createCatalog(documents)).withCurrentDocument(id);
}

export function lexicon(id: string, defs: Record<string, unknown>): {
	lexicon: 1;
	id: string;
	defs: Record<string, unknown>;
} {
	return { lexicon: 1, id, defs };
}

export function parse(schema: unknown, ctx: ValidationContext = rootContext()): SchemaNode {
	return ctx.checkSchema(schema);
}

/**
 * Parse `schema`, then check `value` against it in the same context.
 */
export function check(schema: unknown, value: unknown, ctx: ValidationContext = rootContext()): void {
	ctx.checkData(value, ctx.checkSchema(schema));
}

export function assertSchemaError(fn: () => unknown, message: string): void {
	assert.throws(fn, { name: "LexiconError", code: "InvalidSchema", message });
}

export function assertDataError(fn: () => unknown, message: string): void {
	assert.throws(fn, { name: "LexiconError", code: "DataValidation", message });
}
