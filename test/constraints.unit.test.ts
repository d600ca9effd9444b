// lexicheck Constraint Helper Tests

import { describe, it } from "node:test";
import assert from "node:assert";
import {
	checkAllowedFields,
	checkBounds,
	checkConstDefault,
	checkNamesDeclared,
	checkRange,
	optionalInteger,
	optionalIntegerArray,
	optionalLength,
	optionalStringArray,
	requiredField,
} from "../src/validation/constraints.js";
import { assertDataError, assertSchemaError, rootContext } from "./helper.js";

const ctx = rootContext();

describe("checkAllowedFields", () => {
	it("should allow type and description on every node", () => {
		assert.doesNotThrow(() => checkAllowedFields({ type: "null", description: "nothing" }, "null", [], ctx));
	});

	it("should reject fields outside the allow-list", () => {
		assertSchemaError(
			() => checkAllowedFields({ type: "null", extra: 1 }, "null", [], ctx),
			"null has unknown field 'extra'",
		);
	});

	it("should require description to be a string", () => {
		assertSchemaError(
			() => checkAllowedFields({ type: "null", description: 5 }, "null", [], ctx),
			"description must be a string",
		);
	});
});

describe("Field Readers", () => {
	it("should read absent fields as undefined", () => {
		assert.strictEqual(optionalInteger({}, "minimum", ctx), undefined);
		assert.strictEqual(optionalStringArray({}, "enum", ctx), undefined);
	});

	it("should reject non-integers", () => {
		assertSchemaError(() => optionalInteger({ maximum: 1.5 }, "maximum", ctx), "maximum must be an integer");
	});

	it("should reject negative lengths", () => {
		assertSchemaError(
			() => optionalLength({ minLength: -1 }, "minLength", ctx),
			"minLength must be non-negative, got -1",
		);
	});

	it("should check array element types", () => {
		assertSchemaError(
			() => optionalStringArray({ enum: ["a", 1] }, "enum", ctx),
			"enum must be an array of strings",
		);
		assertSchemaError(
			() => optionalIntegerArray({ enum: [1, "2"] }, "enum", ctx),
			"enum must be an array of integers",
		);
	});

	it("should report missing required fields", () => {
		assertSchemaError(
			() => requiredField({ type: "array" }, "array", "items", ctx),
			"array is missing required field 'items'",
		);
	});
});

describe("checkRange", () => {
	it("should reject a lower bound above the upper bound", () => {
		assertSchemaError(
			() => checkRange(5, 2, "minLength", "maxLength", ctx),
			"minLength (5) cannot be greater than maxLength (2)",
		);
	});

	it("should accept equal or partial bounds", () => {
		assert.doesNotThrow(() => checkRange(2, 2, "minLength", "maxLength", ctx));
		assert.doesNotThrow(() => checkRange(undefined, 2, "minLength", "maxLength", ctx));
		assert.doesNotThrow(() => checkRange(7, undefined, "minimum", "maximum", ctx));
	});
});

describe("checkConstDefault", () => {
	it("should reject const together with default", () => {
		assertSchemaError(
			() => checkConstDefault({ const: "a", default: "b" }, ctx),
			"const and default are mutually exclusive",
		);
	});
});

describe("checkNamesDeclared", () => {
	it("should reject names without a property", () => {
		assertSchemaError(
			() => checkNamesDeclared(["x"], "required", new Map([["y", 1]]), ctx),
			"required field 'x' is not defined in properties",
		);
	});
});

describe("checkBounds", () => {
	it("should report values below and above the bounds", () => {
		assertDataError(
			() => checkBounds(0, 1, 100, "value", "minimum", "maximum", ctx),
			"value 0 is less than minimum 1",
		);
		assertDataError(
			() => checkBounds(200, 1, 100, "value", "minimum", "maximum", ctx),
			"value 200 exceeds maximum 100",
		);
	});

	it("should accept values inside the bounds", () => {
		assert.doesNotThrow(() => checkBounds(50, 1, 100, "value", "minimum", "maximum", ctx));
	});
});
