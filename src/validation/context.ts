// Lexicon Validation Context
// Immutable state threaded through schema and data validation

import { LexiconError } from "../errors.js";
import type { Catalog, RawSchema, SchemaNode } from "../types.js";
import { parseReference, referenceKey, type ParsedReference } from "./reference.js";

//==============================================================================
// Injected Dispatchers
//==============================================================================

/**
 * Check the shape of a raw schema object and return its typed form.
 */
export type SchemaChecker = (node: unknown, ctx: ValidationContext) => SchemaNode;

/**
 * Check a data value against a typed schema node.
 */
export type DataChecker = (value: unknown, schema: SchemaNode, ctx: ValidationContext) => void;

//==============================================================================
// Options
//==============================================================================

export interface ValidationOptions {
	/** Deepest schema or data nesting accepted before validation gives up. */
	maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

export interface ResolvedReference extends ParsedReference {
	key: string;
	schema: RawSchema;
}

interface ContextState {
	catalog: Catalog;
	path: string;
	currentDocument: string | undefined;
	references: ReadonlySet<string>;
	depth: number;
	maxDepth: number;
	checkSchema: SchemaChecker;
	checkData: DataChecker;
}

//==============================================================================
// Validation Context
//==============================================================================

export class ValidationContext {
	private readonly state: ContextState;

	private constructor(state: ContextState) {
		this.state = state;
	}

	/**
	 * Create a root context. The dispatchers are fixed here for the whole
	 * traversal, so per-type validators can re-enter them without importing
	 * the dispatcher module.
	 */
	static create(init: {
		catalog: Catalog;
		checkSchema: SchemaChecker;
		checkData: DataChecker;
		options?: ValidationOptions;
	}): ValidationContext {
		return new ValidationContext({
			catalog: init.catalog,
			path: "",
			currentDocument: undefined,
			references: new Set(),
			depth: 0,
			maxDepth: init.options?.maxDepth ?? DEFAULT_MAX_DEPTH,
			checkSchema: init.checkSchema,
			checkData: init.checkData,
		});
	}

	get catalog(): Catalog {
		return this.state.catalog;
	}

	get path(): string {
		return this.state.path;
	}

	get currentDocument(): string | undefined {
		return this.state.currentDocument;
	}

	get depth(): number {
		return this.state.depth;
	}

	//==========================================================================
	// Extension
	//==========================================================================

	private extend(changes: Partial<ContextState>): ValidationContext {
		return new ValidationContext({ ...this.state, ...changes });
	}

	/**
	 * Append a dotted path segment.
	 */
	withPath(segment: string): ValidationContext {
		const path = this.state.path === "" ? segment : this.state.path + "." + segment;
		return this.extend({ path });
	}

	/**
	 * Append an array index, e.g. `images[0]`.
	 */
	withIndex(index: number): ValidationContext {
		return this.extend({ path: this.state.path + "[" + String(index) + "]" });
	}

	/**
	 * Switch the document local references resolve against.
	 */
	withCurrentDocument(id: string): ValidationContext {
		return this.extend({ currentDocument: id });
	}

	/**
	 * Mark a reference as being followed. Returns a new context; the original
	 * (and every sibling branch holding it) is unchanged.
	 */
	withReference(ref: string): ValidationContext {
		const references = new Set(this.state.references);
		references.add(ref);
		return this.extend({ references });
	}

	hasReference(ref: string): boolean {
		return this.state.references.has(ref);
	}

	/**
	 * Descend one nesting level.
	 */
	enter(phase: "schema" | "data"): ValidationContext {
		const depth = this.state.depth + 1;
		if (depth > this.state.maxDepth) {
			const message = "maximum nesting depth " + String(this.state.maxDepth) + " exceeded";
			throw phase === "schema" ? this.schemaError(message) : this.dataError(message);
		}
		return this.extend({ depth });
	}

	//==========================================================================
	// References
	//==========================================================================

	/**
	 * Parse a reference relative to the current document.
	 */
	parseReference(ref: string): ParsedReference {
		const result = parseReference(ref, this.state.currentDocument);
		if (!result.valid) {
			throw this.schemaError(result.error);
		}
		return result.value;
	}

	/**
	 * Find the raw definition a reference points at.
	 */
	resolve(ref: string): ResolvedReference {
		const parsed = this.parseReference(ref);
		const doc = this.state.catalog.get(parsed.documentId);
		if (doc === undefined) {
			throw this.schemaError(
				`reference '${ref}' points to lexicon '${parsed.documentId}', which is not loaded`,
			);
		}
		const schema = doc.defs.get(parsed.name);
		if (schema === undefined) {
			throw this.schemaError(
				`reference '${ref}': definition '${parsed.name}' not found in '${parsed.documentId}'`,
			);
		}
		return { ...parsed, key: referenceKey(parsed), schema };
	}

	//==========================================================================
	// Dispatch
	//==========================================================================

	checkSchema(node: unknown): SchemaNode {
		return this.state.checkSchema(node, this);
	}

	checkData(value: unknown, schema: SchemaNode): void {
		this.state.checkData(value, schema, this);
	}

	//==========================================================================
	// Errors
	//==========================================================================

	/**
	 * Prefix a message with the current path, if there is one.
	 */
	at(message: string): string {
		return this.state.path === "" ? message : this.state.path + ": " + message;
	}

	schemaError(message: string): LexiconError {
		return LexiconError.invalidSchema(this.at(message));
	}

	dataError(message: string): LexiconError {
		return LexiconError.dataValidation(this.at(message));
	}
}
