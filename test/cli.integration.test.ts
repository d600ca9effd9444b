// lexicheck CLI Integration Tests
// Loads lexicon directories from disk and checks them as the `check` command does

import { after, before, describe, it } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { checkFiles, formatSummary, loadLexiconFiles } from "../src/cli-utils.js";
import { lexicon } from "./helper.js";

const LEXICON_DIR = fileURLToPath(new URL("../examples/lexicons", import.meta.url));
const FEED_DIR = join(LEXICON_DIR, "com", "example", "feed");

describe("check examples/lexicons", () => {
	it("should report every example file as valid", async () => {
		const reports = checkFiles(await loadLexiconFiles(LEXICON_DIR));

		assert.deepStrictEqual(
			reports.map((r) => [r.path, r.valid, r.definitions]),
			[
				[join(FEED_DIR, "createPost.json"), true, 1],
				[join(FEED_DIR, "defs.json"), true, 4],
				[join(FEED_DIR, "getPost.json"), true, 1],
				[join(FEED_DIR, "post.json"), true, 2],
				[join(FEED_DIR, "subscribePosts.json"), true, 3],
			],
		);
		assert.strictEqual(formatSummary(reports), "5 files checked: 5 valid, 0 invalid");
	});

	it("should fail references when a file is checked alone", async () => {
		const reports = checkFiles(await loadLexiconFiles(join(FEED_DIR, "post.json")));

		assert.deepStrictEqual(reports, [
			{
				path: join(FEED_DIR, "post.json"),
				valid: false,
				errors: [
					"com.example.feed.post#main: defs.main.record.properties.reply: reference 'com.example.feed.defs#replyRef' points to lexicon 'com.example.feed.defs', which is not loaded",
				],
				definitions: 2,
			},
		]);
	});
});

describe("check a broken directory", () => {
	let dir = "";

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), "lexicheck-cli-"));
		await writeFile(join(dir, "a.json"), JSON.stringify(lexicon("com.example.a", { main: { type: "token" } })));
		await writeFile(
			join(dir, "b.json"),
			JSON.stringify(lexicon("com.example.b", {
				main: { type: "object", properties: { a: { type: "ref", ref: "com.example.a" } } },
				count: { type: "integer", minimum: 10, maximum: 1 },
			})),
		);
		await writeFile(join(dir, "c.json"), "[1, 2");
	});

	after(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("should report each file's problems", async () => {
		const reports = checkFiles(await loadLexiconFiles(dir));

		assert.deepStrictEqual(
			reports.map((r) => [r.path, r.valid]),
			[
				[join(dir, "a.json"), true],
				[join(dir, "b.json"), false],
				[join(dir, "c.json"), false],
			],
		);
		assert.deepStrictEqual(reports[1]?.errors, [
			"com.example.b#count: defs.count: minimum (10) cannot be greater than maximum (1)",
		]);
		assert.ok(reports[2]?.errors[0]?.startsWith("invalid JSON: "));
		assert.strictEqual(formatSummary(reports), "3 files checked: 1 valid, 2 invalid");
	});
});
