// lexicheck Blob Validator Tests

import { describe, it } from "node:test";
import assert from "node:assert";
import { isValidMimePattern, mimeTypeMatches } from "../src/validation/blob.js";
import { assertDataError, assertSchemaError, check, DAG_CBOR_CID, parse, RAW_CID } from "./helper.js";

function blob(mimeType: string, size: number): Record<string, unknown> {
	return { $type: "blob", ref: { $link: RAW_CID }, mimeType, size };
}

const imageBlob = { type: "blob", accept: ["image/*"], maxSize: 10000 };

describe("MIME patterns", () => {
	it("should accept exact, subtype-wildcard and full-wildcard patterns", () => {
		assert.strictEqual(isValidMimePattern("image/png"), true);
		assert.strictEqual(isValidMimePattern("image/*"), true);
		assert.strictEqual(isValidMimePattern("*/*"), true);
	});

	it("should reject partial wildcards and malformed patterns", () => {
		assert.strictEqual(isValidMimePattern("*/png"), false);
		assert.strictEqual(isValidMimePattern("image/p*g"), false);
		assert.strictEqual(isValidMimePattern("image"), false);
		assert.strictEqual(isValidMimePattern("/png"), false);
		assert.strictEqual(isValidMimePattern("a/b/c"), false);
	});

	it("should match MIME types against patterns", () => {
		assert.strictEqual(mimeTypeMatches("image/jpeg", "image/*"), true);
		assert.strictEqual(mimeTypeMatches("video/mp4", "image/*"), false);
		assert.strictEqual(mimeTypeMatches("text/plain", "*/*"), true);
		assert.strictEqual(mimeTypeMatches("image/png", "image/png"), true);
		assert.strictEqual(mimeTypeMatches("image/pngx", "image/png"), false);
	});
});

describe("blob schema", () => {
	it("should reject invalid accept patterns", () => {
		assertSchemaError(() => parse({ type: "blob", accept: ["image"] }), "invalid accept pattern 'image'");
	});

	it("should require a positive integer maxSize", () => {
		assertSchemaError(() => parse({ type: "blob", maxSize: 0 }), "maxSize must be greater than 0, got 0");
		assertSchemaError(() => parse({ type: "blob", maxSize: 1.5 }), "maxSize must be an integer");
	});
});

describe("blob data", () => {
	it("should accept an image under maxSize", () => {
		assert.doesNotThrow(() => check(imageBlob, blob("image/jpeg", 5000)));
	});

	it("should reject a blob over maxSize", () => {
		assertDataError(() => check(imageBlob, blob("image/jpeg", 50000)), "blob size 50000 exceeds maxSize 10000");
	});

	it("should reject a MIME type outside accept", () => {
		assertDataError(
			() => check(imageBlob, blob("video/mp4", 5000)),
			"mime type 'video/mp4' is not accepted (allowed: image/*)",
		);
	});

	it("should accept any MIME type without accept", () => {
		assert.doesNotThrow(() => check({ type: "blob" }, blob("application/pdf", 1)));
	});

	it("should require a blob object", () => {
		assertDataError(() => check(imageBlob, "image.png"), "expected blob object, got string");
	});

	it("should reject extra and missing fields", () => {
		assertDataError(
			() => check(imageBlob, { ...blob("image/png", 1), name: "cat.png" }),
			"blob has unexpected field 'name'",
		);
		assertDataError(
			() => check(imageBlob, { $type: "blob", ref: { $link: RAW_CID }, mimeType: "image/png" }),
			"blob is missing required field 'size'",
		);
	});

	it("should require $type blob", () => {
		assertDataError(
			() => check(imageBlob, { ...blob("image/png", 1), $type: "image" }),
			"blob '$type' must be 'blob'",
		);
	});

	it("should require a raw CID link", () => {
		assertDataError(
			() => check(imageBlob, { ...blob("image/png", 1), ref: { $link: DAG_CBOR_CID } }),
			`blob ref '${DAG_CBOR_CID}' is not a raw cid`,
		);
		assertDataError(
			() => check(imageBlob, { ...blob("image/png", 1), ref: RAW_CID }),
			"blob ref must be an object with only a '$link' field",
		);
	});

	it("should check mimeType and size values", () => {
		assertDataError(() => check(imageBlob, blob("", 1)), "blob mimeType must be a non-empty string");
		assertDataError(() => check(imageBlob, blob("image/png", -1)), "blob size must be a non-negative integer");
	});
});
