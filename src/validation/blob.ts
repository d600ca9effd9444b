// Lexicon Blob Validator
// Blob references: `{ $type: "blob", ref: { $link }, mimeType, size }`

import { isValidRawCid } from "../formats.js";
import { describeValue, isInteger, isObject, type BlobSchema, type RawSchema } from "../types.js";
import {
	checkAllowedFields,
	optionalInteger,
	optionalString,
	optionalStringArray,
} from "./constraints.js";
import type { ValidationContext } from "./context.js";

const BLOB_FIELDS = ["$type", "ref", "mimeType", "size"];

// A MIME pattern is an exact type/subtype, a type with a wildcard subtype,
// or the full wildcard. "*" must be a whole segment, and a wildcard type
// needs a wildcard subtype.
export function isValidMimePattern(pattern: string): boolean {
	const parts = pattern.split("/");
	if (parts.length !== 2) {
		return false;
	}
	const [type = "", subtype = ""] = parts;
	if (type === "" || subtype === "") {
		return false;
	}
	for (const part of parts) {
		if (part !== "*" && part.includes("*")) {
			return false;
		}
	}
	return type !== "*" || subtype === "*";
}

export function mimeTypeMatches(mimeType: string, pattern: string): boolean {
	if (pattern === "*/*") {
		return true;
	}
	if (pattern.endsWith("/*")) {
		return mimeType.startsWith(pattern.slice(0, -1));
	}
	return mimeType === pattern;
}

export function checkBlobSchema(node: RawSchema, ctx: ValidationContext): BlobSchema {
	checkAllowedFields(node, "blob", ["accept", "maxSize"], ctx);

	const accept = optionalStringArray(node, "accept", ctx);
	for (const pattern of accept ?? []) {
		if (!isValidMimePattern(pattern)) {
			throw ctx.schemaError(`invalid accept pattern '${pattern}'`);
		}
	}

	const maxSize = optionalInteger(node, "maxSize", ctx);
	if (maxSize !== undefined && maxSize <= 0) {
		throw ctx.schemaError(`maxSize must be greater than 0, got ${maxSize}`);
	}

	return {
		type: "blob",
		description: optionalString(node, "description", ctx),
		accept,
		maxSize,
	};
}

export function checkBlobData(value: unknown, schema: BlobSchema, ctx: ValidationContext): void {
	if (!isObject(value)) {
		throw ctx.dataError(`expected blob object, got ${describeValue(value)}`);
	}

	for (const key of Object.keys(value)) {
		if (!BLOB_FIELDS.includes(key)) {
			throw ctx.dataError(`blob has unexpected field '${key}'`);
		}
	}
	for (const key of BLOB_FIELDS) {
		if (value[key] === undefined) {
			throw ctx.dataError(`blob is missing required field '${key}'`);
		}
	}

	if (value.$type !== "blob") {
		throw ctx.dataError("blob '$type' must be 'blob'");
	}

	const ref = value.ref;
	if (!isObject(ref) || typeof ref.$link !== "string" || Object.keys(ref).length !== 1) {
		throw ctx.dataError("blob ref must be an object with only a '$link' field");
	}
	if (!isValidRawCid(ref.$link)) {
		throw ctx.dataError(`blob ref '${ref.$link}' is not a raw cid`);
	}

	const { mimeType, size } = value;
	if (typeof mimeType !== "string" || mimeType === "") {
		throw ctx.dataError("blob mimeType must be a non-empty string");
	}
	if (!isInteger(size) || size < 0) {
		throw ctx.dataError("blob size must be a non-negative integer");
	}

	if (schema.accept !== undefined && !schema.accept.some((p) => mimeTypeMatches(mimeType, p))) {
		throw ctx.dataError(
			`mime type '${mimeType}' is not accepted (allowed: ${schema.accept.join(", ")})`,
		);
	}

	if (schema.maxSize !== undefined && size > schema.maxSize) {
		throw ctx.dataError(`blob size ${size} exceeds maxSize ${schema.maxSize}`);
	}
}
