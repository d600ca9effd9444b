// lexicheck Primary Validator Tests
// record, params, query, procedure and subscription

import { describe, it } from "node:test";
import assert from "node:assert";
import { checkMessageData } from "../src/validation/primary.js";
import { assertDataError, assertSchemaError, check, parse, rootContext } from "./helper.js";

const KEY_ERROR = "expected tid, any, nsid or literal:<value>";

//==============================================================================
// record
//==============================================================================

describe("record", () => {
	const note = {
		type: "record",
		key: "tid",
		record: {
			type: "object",
			required: ["text"],
			properties: { text: { type: "string" } },
		},
	};

	describe("schema", () => {
		it("should accept every key type", () => {
			for (const key of ["tid", "any", "nsid", "literal:self", "literal:"]) {
				assert.doesNotThrow(() => parse({ ...note, key }));
			}
		});

		it("should reject other keys", () => {
			assertSchemaError(() => parse({ ...note, key: "uuid" }), `invalid record key type "uuid"; ${KEY_ERROR}`);
			assertSchemaError(() => parse({ ...note, key: "Literal:self" }), `invalid record key type "Literal:self"; ${KEY_ERROR}`);
		});

		it("should require key and record", () => {
			assertSchemaError(
				() => parse({ type: "record", record: note.record }),
				"record is missing required field 'key'",
			);
			assertSchemaError(() => parse({ type: "record", key: "tid" }), "record is missing required field 'record'");
		});

		it("should require an object record", () => {
			assertSchemaError(
				() => parse({ type: "record", key: "tid", record: { type: "string" } }),
				"record field must be an object schema",
			);
		});

		it("should report record errors under record", () => {
			assertSchemaError(
				() => parse({ type: "record", key: "tid", record: { type: "object", required: ["x"] } }),
				"record: required field 'x' is not defined in properties",
			);
		});
	});

	describe("data", () => {
		it("should validate like its object", () => {
			assert.doesNotThrow(() => check(note, { text: "hello" }));
			assertDataError(() => check(note, {}), "required field 'text' is missing");
		});
	});
});

//==============================================================================
// params
//==============================================================================

describe("params", () => {
	const search = {
		type: "params",
		required: ["q"],
		properties: {
			q: { type: "string" },
			limit: { type: "integer", minimum: 1 },
			tags: { type: "array", items: { type: "string" } },
			exact: { type: "boolean" },
		},
	};

	describe("schema", () => {
		it("should accept scalar and scalar-array properties", () => {
			assert.doesNotThrow(() => parse(search));
		});

		it("should reject object properties", () => {
			assertSchemaError(
				() => parse({ type: "params", properties: { obj: { type: "object" } } }),
				"properties.obj: params property 'obj' has unsupported type 'object'; expected one of boolean, integer, string, unknown or an array of them",
			);
		});

		it("should reject arrays of objects", () => {
			assertSchemaError(
				() => parse({ type: "params", properties: { list: { type: "array", items: { type: "object" } } } }),
				"properties.list: params property 'list' is an array of unsupported type 'object'",
			);
		});

		it("should reject empty property names", () => {
			assertSchemaError(
				() => parse({ type: "params", properties: { "": { type: "string" } } }),
				"params property names cannot be empty",
			);
		});

		it("should require declared required names", () => {
			assertSchemaError(
				() => parse({ type: "params", required: ["x"] }),
				"required field 'x' is not defined in properties",
			);
		});
	});

	describe("data", () => {
		it("should accept valid parameters and extra keys", () => {
			assert.doesNotThrow(() => check(search, { q: "cats", limit: 5, tags: ["a"], page: "2" }));
		});

		it("should report missing required parameters", () => {
			assertDataError(() => check(search, {}), "required parameter 'q' is missing");
		});

		it("should check each parameter under its name", () => {
			assertDataError(() => check(search, { q: "cats", limit: 0 }), "limit: value 0 is less than minimum 1");
			assertDataError(() => check(search, { q: "cats", tags: ["a", 2] }), "tags[1]: expected string, got integer");
		});

		it("should require an object", () => {
			assertDataError(() => check(search, []), "expected params object, got array");
		});

		it("should only read parameters the value itself carries", () => {
			const named = {
				type: "params",
				required: ["constructor"],
				properties: { constructor: { type: "string" }, toString: { type: "string" } },
			};

			assertDataError(() => check(named, {}), "required parameter 'constructor' is missing");
			assert.doesNotThrow(() => check(named, { constructor: "x" }));
			assertDataError(
				() => check(named, { constructor: "x", toString: 1 }),
				"toString: expected string, got integer",
			);
		});
	});
});

//==============================================================================
// query / procedure / subscription
//==============================================================================

describe("query", () => {
	it("should accept parameters, output and errors", () => {
		assert.doesNotThrow(() => parse({
			type: "query",
			parameters: { type: "params", properties: { uri: { type: "string" } } },
			output: { encoding: "application/json", schema: { type: "object" } },
			errors: [{ name: "NotFound", description: "No such post." }],
		}));
	});

	it("should reject input", () => {
		assertSchemaError(
			() => parse({ type: "query", input: { encoding: "application/json" } }),
			"query has unknown field 'input'",
		);
	});

	it("should require params for parameters", () => {
		assertSchemaError(
			() => parse({ type: "query", parameters: { type: "object" } }),
			"parameters must be a params schema",
		);
	});

	it("should check output bodies", () => {
		assertSchemaError(() => parse({ type: "query", output: "json" }), "output must be an object");
		assertSchemaError(
			() => parse({ type: "query", output: {} }),
			"output: output is missing required field 'encoding'",
		);
		assertSchemaError(
			() => parse({ type: "query", output: { encoding: "" } }),
			"output: encoding must be a non-empty string",
		);
		assertSchemaError(
			() => parse({ type: "query", output: { encoding: "application/json", format: "x" } }),
			"output: output has unknown field 'format'",
		);
		assertSchemaError(
			() => parse({ type: "query", output: { encoding: "application/json", schema: { type: "string" } } }),
			"output.schema: body schema must be an object, ref or union",
		);
	});

	it("should check errors", () => {
		assertSchemaError(() => parse({ type: "query", errors: {} }), "errors must be an array");
		assertSchemaError(
			() => parse({ type: "query", errors: [{ name: "" }] }),
			"errors[0]: error definition must have a non-empty 'name'",
		);
		assertSchemaError(
			() => parse({ type: "query", errors: [{ name: "A", description: 3 }] }),
			"errors[0]: description must be a string",
		);
	});

	it("should check parameters as its data", () => {
		const schema = {
			type: "query",
			parameters: { type: "params", required: ["q"], properties: { q: { type: "string" } } },
		};

		assertDataError(() => check(schema, {}), "required parameter 'q' is missing");
		assert.doesNotThrow(() => check({ type: "query" }, "anything"));
	});
});

describe("procedure", () => {
	const create = {
		type: "procedure",
		input: {
			encoding: "application/json",
			schema: {
				type: "object",
				required: ["text"],
				properties: { text: { type: "string" } },
			},
		},
	};

	it("should check input as its data", () => {
		assert.doesNotThrow(() => check(create, { text: "hi" }));
		assertDataError(() => check(create, {}), "required field 'text' is missing");
	});

	it("should accept anything without input", () => {
		assert.doesNotThrow(() => check({ type: "procedure" }, 42));
	});

	it("should accept an input body without a schema", () => {
		assert.doesNotThrow(() => check({ type: "procedure", input: { encoding: "*/*" } }, "raw"));
	});
});

describe("subscription", () => {
	it("should require a union message schema", () => {
		assertSchemaError(
			() => parse({ type: "subscription", message: { schema: { type: "object" } } }),
			"message.schema: message schema must be a union",
		);
		assertSchemaError(() => parse({ type: "subscription", message: "x" }), "message must be an object");
		assertSchemaError(
			() => parse({ type: "subscription", message: { encoding: "x" } }),
			"message: message has unknown field 'encoding'",
		);
	});

	it("should check messages against the union", () => {
		const ctx = rootContext();
		const node = parse({
			type: "subscription",
			message: { schema: { type: "union", refs: ["#a"], closed: true } },
		}, ctx);
		if (node.type !== "subscription") {
			assert.fail("expected a subscription");
		}

		assertDataError(
			() => checkMessageData({ $type: "b" }, node.message, ctx),
			"'$type' 'b' is not one of the allowed refs [#a]",
		);
		assert.doesNotThrow(() => checkMessageData({ $type: "a" }, node.message, ctx));
	});
});
