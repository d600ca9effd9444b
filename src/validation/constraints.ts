// Lexicon Constraint Helpers
// Field readers and range/enum checks shared by the per-type validators

import { isInteger, isStringArray, type RawSchema } from "../types.js";
import type { ValidationContext } from "./context.js";

//==============================================================================
// Field Sets
//==============================================================================

const BASE_FIELDS = ["type", "description"];

/**
 * Reject any field outside the type's allow-list. `type` and `description`
 * are always allowed; `description` must be a string.
 */
export function checkAllowedFields(
	node: RawSchema,
	typeName: string,
	allowed: readonly string[],
	ctx: ValidationContext,
): void {
	for (const key of Object.keys(node)) {
		if (!BASE_FIELDS.includes(key) && !allowed.includes(key)) {
			throw ctx.schemaError(`${typeName} has unknown field '${key}'`);
		}
	}
	if (node.description !== undefined && typeof node.description !== "string") {
		throw ctx.schemaError("description must be a string");
	}
}

//==============================================================================
// Field Readers
//==============================================================================

export function optionalString(
	node: RawSchema,
	field: string,
	ctx: ValidationContext,
): string | undefined {
	const value = node[field];
	if (value === undefined) return undefined;
	if (typeof value !== "string") {
		throw ctx.schemaError(`${field} must be a string`);
	}
	return value;
}

export function optionalBoolean(
	node: RawSchema,
	field: string,
	ctx: ValidationContext,
): boolean | undefined {
	const value = node[field];
	if (value === undefined) return undefined;
	if (typeof value !== "boolean") {
		throw ctx.schemaError(`${field} must be a boolean`);
	}
	return value;
}

export function optionalInteger(
	node: RawSchema,
	field: string,
	ctx: ValidationContext,
): number | undefined {
	const value = node[field];
	if (value === undefined) return undefined;
	if (!isInteger(value)) {
		throw ctx.schemaError(`${field} must be an integer`);
	}
	return value;
}

/**
 * Length-style bound: an integer that is zero or more.
 */
export function optionalLength(
	node: RawSchema,
	field: string,
	ctx: ValidationContext,
): number | undefined {
	const value = optionalInteger(node, field, ctx);
	if (value !== undefined && value < 0) {
		throw ctx.schemaError(`${field} must be non-negative, got ${value}`);
	}
	return value;
}

export function optionalStringArray(
	node: RawSchema,
	field: string,
	ctx: ValidationContext,
): string[] | undefined {
	const value = node[field];
	if (value === undefined) return undefined;
	if (!isStringArray(value)) {
		throw ctx.schemaError(`${field} must be an array of strings`);
	}
	return value;
}

export function optionalIntegerArray(
	node: RawSchema,
	field: string,
	ctx: ValidationContext,
): number[] | undefined {
	const value = node[field];
	if (value === undefined) return undefined;
	if (!Array.isArray(value) || !value.every(isInteger)) {
		throw ctx.schemaError(`${field} must be an array of integers`);
	}
	return value;
}

export function requiredField(
	node: RawSchema,
	typeName: string,
	field: string,
	ctx: ValidationContext,
): unknown {
	const value = node[field];
	if (value === undefined) {
		throw ctx.schemaError(`${typeName} is missing required field '${field}'`);
	}
	return value;
}

//==============================================================================
// Schema Consistency
//==============================================================================

/**
 * Lower bound must not exceed the upper bound when both are set.
 */
export function checkRange(
	min: number | undefined,
	max: number | undefined,
	minField: string,
	maxField: string,
	ctx: ValidationContext,
): void {
	if (min !== undefined && max !== undefined && min > max) {
		throw ctx.schemaError(
			`${minField} (${min}) cannot be greater than ${maxField} (${max})`,
		);
	}
}

export function checkConstDefault(node: RawSchema, ctx: ValidationContext): void {
	if (node.const !== undefined && node.default !== undefined) {
		throw ctx.schemaError("const and default are mutually exclusive");
	}
}

/**
 * Every listed name must be a declared property.
 */
export function checkNamesDeclared(
	names: readonly string[],
	field: string,
	declared: ReadonlyMap<string, unknown>,
	ctx: ValidationContext,
): void {
	for (const name of names) {
		if (!declared.has(name)) {
			throw ctx.schemaError(`${field} field '${name}' is not defined in properties`);
		}
	}
}

//==============================================================================
// Data Checks
//==============================================================================

/**
 * Check a measured size against optional bounds. `what` names the measured
 * quantity in messages, e.g. "array length".
 */
export function checkBounds(
	actual: number,
	min: number | undefined,
	max: number | undefined,
	what: string,
	minField: string,
	maxField: string,
	ctx: ValidationContext,
): void {
	if (min !== undefined && actual < min) {
		throw ctx.dataError(`${what} ${actual} is less than ${minField} ${min}`);
	}
	if (max !== undefined && actual > max) {
		throw ctx.dataError(`${what} ${actual} exceeds ${maxField} ${max}`);
	}
}
