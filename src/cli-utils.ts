/**
 * lexicheck CLI Utilities
 *
 * CLI functions kept apart from the entry point so they can be tested:
 * - Argument parsing (`check <path>`, `help`, flags)
 * - File I/O (a single lexicon file or a directory of them)
 * - Per-file reports over one shared catalog
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { documentSources } from "./catalog.js";
import { validate } from "./lexicon.js";
import { isObject } from "./types.js";
import type { ValidationOptions } from "./validation/context.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	help: boolean;
}

export interface ParsedArgs {
	command: string | null;
	path: string | null;
	options: Options;
}

/**
 * Parse command-line arguments
 *
 * Supports:
 *   - Commands: `check <path>`, `help`
 *   - Flags: --verbose/-v, --help/-h
 *
 * Unrecognised flags are ignored; an unrecognised command is returned as-is
 * for the caller to report.
 */
export function parseArgs(args: string[]): ParsedArgs {
	const options: Options = {
		verbose: false,
		help: false,
	};
	const positionals: string[] = [];

	for (const arg of args) {
		switch (arg) {
		case "--verbose":
		case "-v":
			options.verbose = true;
			break;
		case "--help":
		case "-h":
			options.help = true;
			break;
		default:
			if (!arg.startsWith("-")) {
				positionals.push(arg);
			}
		}
	}

	const [command = null, path = null] = positionals;
	if (command === "help") {
		options.help = true;
	}

	return { command, path, options };
}

//==============================================================================
// Loading
//==============================================================================

export type LoadedFile =
	| { path: string; ok: true; document: unknown }
	| { path: string; ok: false; error: string };

/**
 * All `*.json` files under a directory, recursively.
 */
export async function findJsonFiles(dir: string): Promise<string[]> {
	const files: string[] = [];
	const entries = await readdir(dir, { withFileTypes: true });

	for (const entry of entries) {
		const fullPath = join(dir, entry.name);
		if (entry.isDirectory()) {
			files.push(...(await findJsonFiles(fullPath)));
		} else if (entry.isFile() && entry.name.endsWith(".json")) {
			files.push(fullPath);
		}
	}

	return files;
}

/**
 * Read and parse one JSON file. A file that is not JSON is reported, not
 * thrown; I/O errors propagate.
 */
export async function readLexiconFile(path: string): Promise<LoadedFile> {
	const content = await readFile(path, "utf-8");
	try {
		const document: unknown = JSON.parse(content);
		return { path, ok: true, document };
	} catch (error) {
		if (error instanceof SyntaxError) {
			return { path, ok: false, error: `invalid JSON: ${error.message}` };
		}
		throw error;
	}
}

/**
 * Load a single file, or every `*.json` file of a directory in path order.
 */
export async function loadLexiconFiles(path: string): Promise<LoadedFile[]> {
	const info = await stat(path);
	const paths = info.isDirectory() ? (await findJsonFiles(path)).sort() : [path];
	return Promise.all(paths.map(readLexiconFile));
}

//==============================================================================
// Checking
//==============================================================================

export interface FileReport {
	path: string;
	valid: boolean;
	errors: string[];
	definitions: number;
}

function countDefinitions(document: unknown): number {
	if (isObject(document) && isObject(document.defs)) {
		return Object.keys(document.defs).length;
	}
	return 0;
}

/**
 * Validate all loaded files together, so references between them resolve,
 * and split the errors back out per file.
 */
export function checkFiles(files: readonly LoadedFile[], options?: ValidationOptions): FileReport[] {
	const documents: unknown[] = [];
	for (const file of files) {
		if (file.ok) {
			documents.push(file.document);
		}
	}
	const sources = documentSources(documents);

	const result = validate(documents, options);
	const errors = result.valid ? new Map<string, string[]>() : result.error;

	let index = 0;
	return files.map((file) => {
		if (!file.ok) {
			return { path: file.path, valid: false, errors: [file.error], definitions: 0 };
		}
		const source = sources[index] ?? "";
		index++;
		const fileErrors = errors.get(source) ?? [];
		return {
			path: file.path,
			valid: fileErrors.length === 0,
			errors: fileErrors,
			definitions: countDefinitions(file.document),
		};
	});
}

/**
 * One-line summary, e.g. `3 files checked: 2 valid, 1 invalid`.
 */
export function formatSummary(reports: readonly FileReport[]): string {
	const valid = reports.filter((r) => r.valid).length;
	const invalid = reports.length - valid;
	const noun = reports.length === 1 ? "file" : "files";
	return `${reports.length} ${noun} checked: ${valid} valid, ${invalid} invalid`;
}
