// Lexicon Primary Validators
// record, params, query, procedure and subscription

import {
	describeValue,
	isObject,
	type BodySchema,
	type ErrorDef,
	type MessageSchema,
	type ParamsPropertySchema,
	type ParamsSchema,
	type ProcedureSchema,
	type QuerySchema,
	type RawSchema,
	type RecordKey,
	type RecordSchema,
	type SchemaNode,
	type SubscriptionSchema,
} from "../types.js";
import {
	checkAllowedFields,
	checkNamesDeclared,
	optionalString,
	optionalStringArray,
	requiredField,
} from "./constraints.js";
import type { ValidationContext } from "./context.js";
import {
	checkObjectData,
	checkObjectSchema,
	checkRefSchema,
	checkUnionSchema,
} from "./fields.js";

//==============================================================================
// record
//==============================================================================

function isRecordKey(key: string): key is RecordKey {
	if (key === "tid" || key === "any" || key === "nsid") {
		return true;
	}
	return key.startsWith("literal:");
}

export function checkRecordSchema(node: RawSchema, ctx: ValidationContext): RecordSchema {
	checkAllowedFields(node, "record", ["key", "record"], ctx);

	const key = requiredField(node, "record", "key", ctx);
	if (typeof key !== "string" || !isRecordKey(key)) {
		throw ctx.schemaError(
			`invalid record key type ${JSON.stringify(key)}; expected tid, any, nsid or literal:<value>`,
		);
	}

	const record = requiredField(node, "record", "record", ctx);
	if (!isObject(record) || record.type !== "object") {
		throw ctx.schemaError("record field must be an object schema");
	}

	return {
		type: "record",
		description: optionalString(node, "description", ctx),
		key,
		record: checkObjectSchema(record, ctx.withPath("record")),
	};
}

export function checkRecordData(value: unknown, schema: RecordSchema, ctx: ValidationContext): void {
	checkObjectData(value, schema.record, ctx);
}

//==============================================================================
// params
//==============================================================================

const PARAM_TYPES = ["boolean", "integer", "string", "unknown"];

function toParamsProperty(
	name: string,
	property: SchemaNode,
	ctx: ValidationContext,
): ParamsPropertySchema {
	switch (property.type) {
	case "boolean":
	case "integer":
	case "string":
	case "unknown":
		return property;
	case "array": {
		const items = property.items;
		switch (items.type) {
		case "boolean":
		case "integer":
		case "string":
		case "unknown":
			return { ...property, items };
		default:
			throw ctx.schemaError(
				`params property '${name}' is an array of unsupported type '${items.type}'`,
			);
		}
	}
	default:
		throw ctx.schemaError(
			`params property '${name}' has unsupported type '${property.type}'; expected one of ${PARAM_TYPES.join(", ")} or an array of them`,
		);
	}
}

export function checkParamsSchema(node: RawSchema, ctx: ValidationContext): ParamsSchema {
	checkAllowedFields(node, "params", ["properties", "required"], ctx);

	const rawProperties = node.properties ?? {};
	if (!isObject(rawProperties)) {
		throw ctx.schemaError("properties must be an object");
	}

	const properties = new Map<string, ParamsPropertySchema>();
	for (const [name, raw] of Object.entries(rawProperties)) {
		if (name === "") {
			throw ctx.schemaError("params property names cannot be empty");
		}
		const propertyCtx = ctx.withPath("properties." + name);
		properties.set(name, toParamsProperty(name, propertyCtx.checkSchema(raw), propertyCtx));
	}

	const required = optionalStringArray(node, "required", ctx) ?? [];
	checkNamesDeclared(required, "required", properties, ctx);

	return {
		type: "params",
		description: optionalString(node, "description", ctx),
		properties,
		required,
	};
}

export function checkParamsData(value: unknown, schema: ParamsSchema, ctx: ValidationContext): void {
	if (!isObject(value)) {
		throw ctx.dataError(`expected params object, got ${describeValue(value)}`);
	}

	// Own keys only; an undefined value counts as absent
	const params = value;
	const paramOf = (name: string): unknown => (Object.hasOwn(params, name) ? params[name] : undefined);

	for (const name of schema.required) {
		if (paramOf(name) === undefined) {
			throw ctx.dataError(`required parameter '${name}' is missing`);
		}
	}

	for (const [name, property] of schema.properties) {
		const param = paramOf(name);
		if (param !== undefined) {
			ctx.withPath(name).checkData(param, property);
		}
	}
}

//==============================================================================
// Bodies, Messages and Errors
//==============================================================================

function checkParameters(node: RawSchema, ctx: ValidationContext): ParamsSchema | undefined {
	const parameters = node.parameters;
	if (parameters === undefined) {
		return undefined;
	}
	if (!isObject(parameters) || parameters.type !== "params") {
		throw ctx.schemaError("parameters must be a params schema");
	}
	return checkParamsSchema(parameters, ctx.withPath("parameters"));
}

function checkBody(node: RawSchema, field: string, ctx: ValidationContext): BodySchema | undefined {
	const body = node[field];
	if (body === undefined) {
		return undefined;
	}
	const bodyCtx = ctx.withPath(field);
	if (!isObject(body)) {
		throw ctx.schemaError(`${field} must be an object`);
	}
	checkAllowedFields(body, field, ["encoding", "schema"], bodyCtx);

	const encoding = requiredField(body, field, "encoding", bodyCtx);
	if (typeof encoding !== "string" || encoding === "") {
		throw bodyCtx.schemaError("encoding must be a non-empty string");
	}

	const result: BodySchema = {
		description: optionalString(body, "description", bodyCtx),
		encoding,
	};

	const schema = body.schema;
	if (schema !== undefined) {
		const schemaCtx = bodyCtx.withPath("schema");
		if (!isObject(schema)) {
			throw schemaCtx.schemaError("body schema must be an object, ref or union");
		}
		switch (schema.type) {
		case "object":
			result.schema = checkObjectSchema(schema, schemaCtx);
			break;
		case "ref":
			result.schema = checkRefSchema(schema, schemaCtx);
			break;
		case "union":
			result.schema = checkUnionSchema(schema, schemaCtx);
			break;
		default:
			throw schemaCtx.schemaError("body schema must be an object, ref or union");
		}
	}

	return result;
}

function checkMessage(node: RawSchema, ctx: ValidationContext): MessageSchema | undefined {
	const message = node.message;
	if (message === undefined) {
		return undefined;
	}
	const messageCtx = ctx.withPath("message");
	if (!isObject(message)) {
		throw ctx.schemaError("message must be an object");
	}
	checkAllowedFields(message, "message", ["schema"], messageCtx);

	const result: MessageSchema = {
		description: optionalString(message, "description", messageCtx),
	};

	const schema = message.schema;
	if (schema !== undefined) {
		const schemaCtx = messageCtx.withPath("schema");
		if (!isObject(schema) || schema.type !== "union") {
			throw schemaCtx.schemaError("message schema must be a union");
		}
		result.schema = checkUnionSchema(schema, schemaCtx);
	}

	return result;
}

function checkErrors(node: RawSchema, ctx: ValidationContext): ErrorDef[] | undefined {
	const errors = node.errors;
	if (errors === undefined) {
		return undefined;
	}
	if (!Array.isArray(errors)) {
		throw ctx.schemaError("errors must be an array");
	}
	return errors.map((entry: unknown, index) => {
		const entryCtx = ctx.withPath("errors").withIndex(index);
		if (!isObject(entry) || typeof entry.name !== "string" || entry.name === "") {
			throw entryCtx.schemaError("error definition must have a non-empty 'name'");
		}
		return {
			name: entry.name,
			description: optionalString(entry, "description", entryCtx),
		};
	});
}

//==============================================================================
// query / procedure / subscription
//==============================================================================

export function checkQuerySchema(node: RawSchema, ctx: ValidationContext): QuerySchema {
	checkAllowedFields(node, "query", ["parameters", "output", "errors"], ctx);
	return {
		type: "query",
		description: optionalString(node, "description", ctx),
		parameters: checkParameters(node, ctx),
		output: checkBody(node, "output", ctx),
		errors: checkErrors(node, ctx),
	};
}

export function checkProcedureSchema(node: RawSchema, ctx: ValidationContext): ProcedureSchema {
	checkAllowedFields(node, "procedure", ["parameters", "input", "output", "errors"], ctx);
	return {
		type: "procedure",
		description: optionalString(node, "description", ctx),
		parameters: checkParameters(node, ctx),
		input: checkBody(node, "input", ctx),
		output: checkBody(node, "output", ctx),
		errors: checkErrors(node, ctx),
	};
}

export function checkSubscriptionSchema(node: RawSchema, ctx: ValidationContext): SubscriptionSchema {
	checkAllowedFields(node, "subscription", ["parameters", "message", "errors"], ctx);
	return {
		type: "subscription",
		description: optionalString(node, "description", ctx),
		parameters: checkParameters(node, ctx),
		message: checkMessage(node, ctx),
		errors: checkErrors(node, ctx),
	};
}

/**
 * Validate query string parameters. No declared parameters accepts anything.
 */
export function checkParametersData(
	value: unknown,
	parameters: ParamsSchema | undefined,
	ctx: ValidationContext,
): void {
	if (parameters !== undefined) {
		checkParamsData(value, parameters, ctx);
	}
}

/**
 * Validate an input or output body. A body without a schema accepts anything.
 */
export function checkBodyData(
	value: unknown,
	body: BodySchema | undefined,
	ctx: ValidationContext,
): void {
	if (body?.schema !== undefined) {
		ctx.checkData(value, body.schema);
	}
}

export function checkMessageData(
	value: unknown,
	message: MessageSchema | undefined,
	ctx: ValidationContext,
): void {
	if (message?.schema !== undefined) {
		ctx.checkData(value, message.schema);
	}
}
