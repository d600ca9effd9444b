// Lexicon Field Validators
// object, array, union and ref: the recursive field types

import {
	describeValue,
	isObject,
	isPrimaryType,
	isStringArray,
	type ArraySchema,
	type ObjectSchema,
	type RawSchema,
	type RefSchema,
	type SchemaNode,
	type UnionSchema,
} from "../types.js";
import {
	checkAllowedFields,
	checkBounds,
	checkNamesDeclared,
	checkRange,
	optionalBoolean,
	optionalLength,
	optionalString,
	optionalStringArray,
	requiredField,
} from "./constraints.js";
import type { ValidationContext } from "./context.js";
import { checkReferenceSyntax, matchesReference, referenceKey } from "./reference.js";

//==============================================================================
// Nested Fields
//==============================================================================

/**
 * Check a schema in a nested position (object property, array item).
 * Primary types and params only appear as top-level definitions.
 */
export function checkField(node: unknown, ctx: ValidationContext): SchemaNode {
	if (isObject(node) && typeof node.type === "string") {
		if (isPrimaryType(node.type) || node.type === "params") {
			throw ctx.schemaError(`type '${node.type}' is only allowed as a top-level definition`);
		}
	}
	return ctx.checkSchema(node);
}

//==============================================================================
// object
//==============================================================================

export function checkObjectSchema(node: RawSchema, ctx: ValidationContext): ObjectSchema {
	checkAllowedFields(node, "object", ["properties", "required", "nullable"], ctx);

	const rawProperties = node.properties ?? {};
	if (!isObject(rawProperties)) {
		throw ctx.schemaError("properties must be an object");
	}

	const properties = new Map<string, SchemaNode>();
	for (const [name, property] of Object.entries(rawProperties)) {
		properties.set(name, checkField(property, ctx.withPath("properties." + name)));
	}

	const required = optionalStringArray(node, "required", ctx) ?? [];
	checkNamesDeclared(required, "required", properties, ctx);

	const nullable = optionalStringArray(node, "nullable", ctx) ?? [];
	checkNamesDeclared(nullable, "nullable", properties, ctx);

	return {
		type: "object",
		description: optionalString(node, "description", ctx),
		properties,
		required,
		nullable,
	};
}

/**
 * Objects are open: keys without a declared property are accepted as-is.
 */
export function checkObjectData(value: unknown, schema: ObjectSchema, ctx: ValidationContext): void {
	if (!isObject(value)) {
		throw ctx.dataError(`expected object, got ${describeValue(value)}`);
	}

	for (const name of schema.required) {
		if (!Object.hasOwn(value, name)) {
			throw ctx.dataError(`required field '${name}' is missing`);
		}
	}

	for (const [name, property] of schema.properties) {
		if (!Object.hasOwn(value, name)) {
			continue;
		}
		const field = value[name];
		if (field === null && property.type !== "null") {
			if (schema.nullable.includes(name)) {
				continue;
			}
			throw ctx.dataError(`field '${name}' cannot be null`);
		}
		ctx.withPath(name).checkData(field, property);
	}
}

//==============================================================================
// array
//==============================================================================

export function checkArraySchema(node: RawSchema, ctx: ValidationContext): ArraySchema {
	checkAllowedFields(node, "array", ["items", "minLength", "maxLength"], ctx);

	const items = checkField(requiredField(node, "array", "items", ctx), ctx.withPath("items"));

	const minLength = optionalLength(node, "minLength", ctx);
	const maxLength = optionalLength(node, "maxLength", ctx);
	checkRange(minLength, maxLength, "minLength", "maxLength", ctx);

	return {
		type: "array",
		description: optionalString(node, "description", ctx),
		items,
		minLength,
		maxLength,
	};
}

export function checkArrayData(value: unknown, schema: ArraySchema, ctx: ValidationContext): void {
	if (!Array.isArray(value)) {
		throw ctx.dataError(`expected array, got ${describeValue(value)}`);
	}

	checkBounds(value.length, schema.minLength, schema.maxLength, "array length", "minLength", "maxLength", ctx);

	value.forEach((item: unknown, index) => {
		ctx.withIndex(index).checkData(item, schema.items);
	});
}

//==============================================================================
// union
//==============================================================================

export function checkUnionSchema(node: RawSchema, ctx: ValidationContext): UnionSchema {
	checkAllowedFields(node, "union", ["refs", "closed"], ctx);

	const refs = requiredField(node, "union", "refs", ctx);
	if (!isStringArray(refs)) {
		throw ctx.schemaError("refs must be an array of strings");
	}

	const closed = optionalBoolean(node, "closed", ctx) ?? false;
	if (closed && refs.length === 0) {
		throw ctx.schemaError("closed union must have at least one ref");
	}

	refs.forEach((ref, index) => {
		checkReference(ref, ctx.withPath("refs").withIndex(index));
	});

	return {
		type: "union",
		description: optionalString(node, "description", ctx),
		refs,
		closed,
	};
}

/**
 * Match `$type` against the union's refs, then validate against the matched
 * definition. Open unions accept values of types they do not list.
 */
export function checkUnionData(value: unknown, schema: UnionSchema, ctx: ValidationContext): void {
	if (!isObject(value)) {
		throw ctx.dataError(`expected object with '$type' for union, got ${describeValue(value)}`);
	}
	const type = value.$type;
	if (typeof type !== "string") {
		throw ctx.dataError("union value is missing a '$type' string");
	}

	const match = schema.refs.find((ref) => matchesReference(type, ref));
	if (match === undefined) {
		if (schema.refs.length === 0) {
			throw ctx.dataError(`union has no refs to match '$type' '${type}'`);
		}
		if (schema.closed) {
			throw ctx.dataError(
				`'$type' '${type}' is not one of the allowed refs [${schema.refs.join(", ")}]`,
			);
		}
		return;
	}

	// A local ref needs a document to resolve against
	if (ctx.currentDocument === undefined && match.startsWith("#")) {
		return;
	}

	const target = ctx.resolve(match);
	const targetCtx = ctx.withCurrentDocument(target.documentId);
	targetCtx.checkData(value, targetCtx.checkSchema(target.schema));
}

//==============================================================================
// ref
//==============================================================================

/**
 * Syntax-check a reference and, when a document is in scope, make sure it
 * resolves.
 */
function checkReference(ref: string, ctx: ValidationContext): void {
	if (ctx.currentDocument === undefined) {
		const error = checkReferenceSyntax(ref);
		if (error !== undefined) {
			throw ctx.schemaError(error);
		}
		return;
	}
	ctx.resolve(ref);
}

export function checkRefSchema(node: RawSchema, ctx: ValidationContext): RefSchema {
	checkAllowedFields(node, "ref", ["ref"], ctx);

	const ref = requiredField(node, "ref", "ref", ctx);
	if (typeof ref !== "string" || ref === "") {
		throw ctx.schemaError("ref must be a non-empty string");
	}
	checkReference(ref, ctx);

	return {
		type: "ref",
		description: optionalString(node, "description", ctx),
		ref,
	};
}

/**
 * Follow a reference and validate against its target. A reference already
 * being followed on this branch is a cycle.
 */
export function checkRefData(value: unknown, schema: RefSchema, ctx: ValidationContext): void {
	if (ctx.currentDocument === undefined && schema.ref.startsWith("#")) {
		throw ctx.dataError(`cannot resolve local reference '${schema.ref}' without a current document`);
	}

	const key = referenceKey(ctx.parseReference(schema.ref));
	if (ctx.hasReference(key)) {
		throw ctx.dataError(`circular reference detected: ${key}`);
	}

	const inner = ctx.withReference(key);
	const target = inner.resolve(schema.ref);
	const targetCtx = inner.withCurrentDocument(target.documentId);
	targetCtx.checkData(value, targetCtx.checkSchema(target.schema));
}
