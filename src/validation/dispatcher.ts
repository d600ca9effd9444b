// Lexicon Type Dispatcher
// Routes schema and data checks to the per-type validators

import { exhaustive } from "../errors.js";
import { isObject, isPrimaryType, type Catalog, type SchemaNode } from "../types.js";
import { checkBlobData, checkBlobSchema } from "./blob.js";
import { ValidationContext, type ValidationOptions } from "./context.js";
import {
	checkArrayData,
	checkArraySchema,
	checkObjectData,
	checkObjectSchema,
	checkRefData,
	checkRefSchema,
	checkUnionData,
	checkUnionSchema,
} from "./fields.js";
import {
	checkBodyData,
	checkParametersData,
	checkParamsData,
	checkParamsSchema,
	checkProcedureSchema,
	checkQuerySchema,
	checkRecordData,
	checkRecordSchema,
	checkSubscriptionSchema,
} from "./primary.js";
import {
	checkBooleanData,
	checkBooleanSchema,
	checkBytesData,
	checkBytesSchema,
	checkCidLinkData,
	checkCidLinkSchema,
	checkIntegerData,
	checkIntegerSchema,
	checkNullData,
	checkNullSchema,
	checkStringData,
	checkStringSchema,
	checkTokenData,
	checkTokenSchema,
	checkUnknownData,
	checkUnknownSchema,
} from "./primitives.js";

//==============================================================================
// Schema Dispatch
//==============================================================================

/**
 * Check a raw schema object and return its typed form.
 */
export function checkSchema(node: unknown, outer: ValidationContext): SchemaNode {
	const ctx = outer.enter("schema");

	if (!isObject(node)) {
		throw ctx.schemaError("schema must be an object");
	}
	const type = node.type;
	if (type === undefined) {
		throw ctx.schemaError("schema is missing required field 'type'");
	}
	if (typeof type !== "string") {
		throw ctx.schemaError("type must be a string");
	}

	switch (type) {
	case "string":
		return checkStringSchema(node, ctx);
	case "integer":
		return checkIntegerSchema(node, ctx);
	case "boolean":
		return checkBooleanSchema(node, ctx);
	case "null":
		return checkNullSchema(node, ctx);
	case "bytes":
		return checkBytesSchema(node, ctx);
	case "blob":
		return checkBlobSchema(node, ctx);
	case "cid-link":
		return checkCidLinkSchema(node, ctx);
	case "token":
		return checkTokenSchema(node, ctx);
	case "unknown":
		return checkUnknownSchema(node, ctx);
	case "object":
		return checkObjectSchema(node, ctx);
	case "array":
		return checkArraySchema(node, ctx);
	case "union":
		return checkUnionSchema(node, ctx);
	case "ref":
		return checkRefSchema(node, ctx);
	case "record":
		return checkRecordSchema(node, ctx);
	case "params":
		return checkParamsSchema(node, ctx);
	case "query":
		return checkQuerySchema(node, ctx);
	case "procedure":
		return checkProcedureSchema(node, ctx);
	case "subscription":
		return checkSubscriptionSchema(node, ctx);
	default:
		throw ctx.schemaError(`unknown type '${type}'`);
	}
}

/**
 * Check one entry of a document's `defs`. Primary types must be `main`.
 */
export function checkDefinition(name: string, node: unknown, ctx: ValidationContext): SchemaNode {
	if (name !== "main" && isObject(node) && typeof node.type === "string" && isPrimaryType(node.type)) {
		throw ctx.schemaError(`${node.type} definitions must be named 'main', not '${name}'`);
	}
	return ctx.checkSchema(node);
}

//==============================================================================
// Data Dispatch
//==============================================================================

/**
 * Check a data value against a typed schema node.
 */
export function checkData(value: unknown, schema: SchemaNode, outer: ValidationContext): void {
	const ctx = outer.enter("data");

	switch (schema.type) {
	case "string":
		checkStringData(value, schema, ctx);
		break;
	case "integer":
		checkIntegerData(value, schema, ctx);
		break;
	case "boolean":
		checkBooleanData(value, schema, ctx);
		break;
	case "null":
		checkNullData(value, ctx);
		break;
	case "bytes":
		checkBytesData(value, schema, ctx);
		break;
	case "blob":
		checkBlobData(value, schema, ctx);
		break;
	case "cid-link":
		checkCidLinkData(value, ctx);
		break;
	case "token":
		checkTokenData(value, ctx);
		break;
	case "unknown":
		checkUnknownData(value, ctx);
		break;
	case "object":
		checkObjectData(value, schema, ctx);
		break;
	case "array":
		checkArrayData(value, schema, ctx);
		break;
	case "union":
		checkUnionData(value, schema, ctx);
		break;
	case "ref":
		checkRefData(value, schema, ctx);
		break;
	case "record":
		checkRecordData(value, schema, ctx);
		break;
	case "params":
		checkParamsData(value, schema, ctx);
		break;
	case "query":
	case "subscription":
		checkParametersData(value, schema.parameters, ctx);
		break;
	case "procedure":
		checkBodyData(value, schema.input, ctx);
		break;
	default:
		exhaustive(schema);
	}
}

//==============================================================================
// Context Construction
//==============================================================================

/**
 * Build a root context over a catalog with both dispatchers installed.
 */
export function createContext(catalog: Catalog, options?: ValidationOptions): ValidationContext {
	return ValidationContext.create({ catalog, checkSchema, checkData, options });
}
