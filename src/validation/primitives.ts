// Lexicon Primitive Validators
// string, integer, boolean, null, bytes, cid-link, token and unknown

import { formatValidators, isValidCid } from "../formats.js";
import {
	describeValue,
	isInteger,
	isObject,
	isStringFormat,
	type BooleanSchema,
	type BytesSchema,
	type CidLinkSchema,
	type IntegerSchema,
	type NullSchema,
	type RawSchema,
	type StringSchema,
	type TokenSchema,
	type UnknownSchema,
} from "../types.js";
import {
	checkAllowedFields,
	checkBounds,
	checkConstDefault,
	checkRange,
	optionalBoolean,
	optionalInteger,
	optionalIntegerArray,
	optionalLength,
	optionalString,
	optionalStringArray,
} from "./constraints.js";
import type { ValidationContext } from "./context.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Number of user-perceived characters (extended grapheme clusters).
 */
export function countGraphemes(value: string): number {
	return Array.from(graphemes.segment(value)).length;
}

//==============================================================================
// string
//==============================================================================

export function checkStringSchema(node: RawSchema, ctx: ValidationContext): StringSchema {
	checkAllowedFields(node, "string", [
		"format",
		"minLength",
		"maxLength",
		"minGraphemes",
		"maxGraphemes",
		"enum",
		"knownValues",
		"const",
		"default",
	], ctx);

	const format = optionalString(node, "format", ctx);
	if (format !== undefined && !isStringFormat(format)) {
		throw ctx.schemaError(`unknown string format '${format}'`);
	}

	const minLength = optionalLength(node, "minLength", ctx);
	const maxLength = optionalLength(node, "maxLength", ctx);
	checkRange(minLength, maxLength, "minLength", "maxLength", ctx);

	const minGraphemes = optionalLength(node, "minGraphemes", ctx);
	const maxGraphemes = optionalLength(node, "maxGraphemes", ctx);
	checkRange(minGraphemes, maxGraphemes, "minGraphemes", "maxGraphemes", ctx);

	checkConstDefault(node, ctx);

	return {
		type: "string",
		description: optionalString(node, "description", ctx),
		format,
		minLength,
		maxLength,
		minGraphemes,
		maxGraphemes,
		enum: optionalStringArray(node, "enum", ctx),
		knownValues: optionalStringArray(node, "knownValues", ctx),
		const: optionalString(node, "const", ctx),
		default: optionalString(node, "default", ctx),
	};
}

export function checkStringData(
	value: unknown,
	schema: StringSchema,
	ctx: ValidationContext,
): void {
	if (typeof value !== "string") {
		throw ctx.dataError(`expected string, got ${describeValue(value)}`);
	}

	if (schema.const !== undefined && value !== schema.const) {
		throw ctx.dataError(`value '${value}' does not match const '${schema.const}'`);
	}

	if (schema.enum !== undefined && !schema.enum.includes(value)) {
		throw ctx.dataError(`value '${value}' is not in enum [${schema.enum.join(", ")}]`);
	}

	if (schema.minLength !== undefined || schema.maxLength !== undefined) {
		checkBounds(
			Buffer.byteLength(value, "utf8"),
			schema.minLength,
			schema.maxLength,
			"string byte length",
			"minLength",
			"maxLength",
			ctx,
		);
	}

	if (schema.minGraphemes !== undefined || schema.maxGraphemes !== undefined) {
		checkBounds(
			countGraphemes(value),
			schema.minGraphemes,
			schema.maxGraphemes,
			"string grapheme count",
			"minGraphemes",
			"maxGraphemes",
			ctx,
		);
	}

	if (schema.format !== undefined && !formatValidators[schema.format](value)) {
		throw ctx.dataError(`'${value}' is not a valid ${schema.format}`);
	}
}

//==============================================================================
// integer
//==============================================================================

export function checkIntegerSchema(node: RawSchema, ctx: ValidationContext): IntegerSchema {
	checkAllowedFields(node, "integer", ["minimum", "maximum", "enum", "const", "default"], ctx);

	const minimum = optionalInteger(node, "minimum", ctx);
	const maximum = optionalInteger(node, "maximum", ctx);
	checkRange(minimum, maximum, "minimum", "maximum", ctx);
	checkConstDefault(node, ctx);

	return {
		type: "integer",
		description: optionalString(node, "description", ctx),
		minimum,
		maximum,
		enum: optionalIntegerArray(node, "enum", ctx),
		const: optionalInteger(node, "const", ctx),
		default: optionalInteger(node, "default", ctx),
	};
}

export function checkIntegerData(
	value: unknown,
	schema: IntegerSchema,
	ctx: ValidationContext,
): void {
	if (!isInteger(value)) {
		throw ctx.dataError(`expected integer, got ${describeValue(value)}`);
	}

	if (schema.const !== undefined && value !== schema.const) {
		throw ctx.dataError(`value ${value} does not match const ${schema.const}`);
	}

	checkBounds(value, schema.minimum, schema.maximum, "value", "minimum", "maximum", ctx);

	if (schema.enum !== undefined && !schema.enum.includes(value)) {
		throw ctx.dataError(`value ${value} is not in enum [${schema.enum.join(", ")}]`);
	}
}

//==============================================================================
// boolean
//==============================================================================

export function checkBooleanSchema(node: RawSchema, ctx: ValidationContext): BooleanSchema {
	checkAllowedFields(node, "boolean", ["const", "default"], ctx);
	checkConstDefault(node, ctx);

	return {
		type: "boolean",
		description: optionalString(node, "description", ctx),
		const: optionalBoolean(node, "const", ctx),
		default: optionalBoolean(node, "default", ctx),
	};
}

export function checkBooleanData(
	value: unknown,
	schema: BooleanSchema,
	ctx: ValidationContext,
): void {
	if (typeof value !== "boolean") {
		throw ctx.dataError(`expected boolean, got ${describeValue(value)}`);
	}
	if (schema.const !== undefined && value !== schema.const) {
		throw ctx.dataError(`value ${String(value)} does not match const ${String(schema.const)}`);
	}
}

//==============================================================================
// null
//==============================================================================

export function checkNullSchema(node: RawSchema, ctx: ValidationContext): NullSchema {
	checkAllowedFields(node, "null", [], ctx);
	return { type: "null", description: optionalString(node, "description", ctx) };
}

export function checkNullData(value: unknown, ctx: ValidationContext): void {
	if (value !== null) {
		throw ctx.dataError(`expected null, got ${describeValue(value)}`);
	}
}

//==============================================================================
// bytes
//==============================================================================

export function checkBytesSchema(node: RawSchema, ctx: ValidationContext): BytesSchema {
	checkAllowedFields(node, "bytes", ["minLength", "maxLength"], ctx);

	const minLength = optionalLength(node, "minLength", ctx);
	const maxLength = optionalLength(node, "maxLength", ctx);
	checkRange(minLength, maxLength, "minLength", "maxLength", ctx);

	return {
		type: "bytes",
		description: optionalString(node, "description", ctx),
		minLength,
		maxLength,
	};
}

/**
 * Decoded length of a base64 string (standard alphabet, padding optional),
 * or undefined when the string is not base64.
 */
export function decodedBase64Length(encoded: string): number | undefined {
	if (!BASE64_PATTERN.test(encoded)) {
		return undefined;
	}
	const unpadded = encoded.replace(/=+$/, "");
	if (unpadded.length % 4 === 1) {
		return undefined;
	}
	if (unpadded.length !== encoded.length && encoded.length % 4 !== 0) {
		return undefined;
	}
	return Buffer.from(unpadded, "base64").length;
}

export function checkBytesData(value: unknown, schema: BytesSchema, ctx: ValidationContext): void {
	if (!isObject(value) || typeof value.$bytes !== "string") {
		throw ctx.dataError("expected bytes object with a '$bytes' string field");
	}
	if (Object.keys(value).length !== 1) {
		throw ctx.dataError("bytes object must only contain '$bytes'");
	}

	const length = decodedBase64Length(value.$bytes);
	if (length === undefined) {
		throw ctx.dataError("'$bytes' is not valid base64");
	}

	checkBounds(length, schema.minLength, schema.maxLength, "bytes length", "minLength", "maxLength", ctx);
}

//==============================================================================
// cid-link
//==============================================================================

export function checkCidLinkSchema(node: RawSchema, ctx: ValidationContext): CidLinkSchema {
	checkAllowedFields(node, "cid-link", [], ctx);
	return { type: "cid-link", description: optionalString(node, "description", ctx) };
}

export function checkCidLinkData(value: unknown, ctx: ValidationContext): void {
	if (!isObject(value) || typeof value.$link !== "string") {
		throw ctx.dataError("expected cid-link object with a '$link' string field");
	}
	if (Object.keys(value).length !== 1) {
		throw ctx.dataError("cid-link object must only contain '$link'");
	}
	if (!isValidCid(value.$link)) {
		throw ctx.dataError(`'${value.$link}' is not a valid cid`);
	}
}

//==============================================================================
// token
//==============================================================================

export function checkTokenSchema(node: RawSchema, ctx: ValidationContext): TokenSchema {
	checkAllowedFields(node, "token", [], ctx);
	return { type: "token", description: optionalString(node, "description", ctx) };
}

/**
 * A token value is its fully-qualified name. Which names are acceptable is
 * decided by the union or string that embeds it.
 */
export function checkTokenData(value: unknown, ctx: ValidationContext): void {
	if (typeof value !== "string") {
		throw ctx.dataError(`expected token string, got ${describeValue(value)}`);
	}
	if (value === "") {
		throw ctx.dataError("token must not be empty");
	}
}

//==============================================================================
// unknown
//==============================================================================

export function checkUnknownSchema(node: RawSchema, ctx: ValidationContext): UnknownSchema {
	checkAllowedFields(node, "unknown", [], ctx);
	return { type: "unknown", description: optionalString(node, "description", ctx) };
}

export function checkUnknownData(value: unknown, ctx: ValidationContext): void {
	if (!isObject(value)) {
		throw ctx.dataError(`expected object, got ${describeValue(value)}`);
	}
	if ("$bytes" in value) {
		throw ctx.dataError("unknown value cannot be a bytes object");
	}
	if (value.$type === "blob") {
		throw ctx.dataError("unknown value cannot be a blob");
	}
}
