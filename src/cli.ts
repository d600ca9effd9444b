#!/usr/bin/env node
/**
 * lexicheck
 *
 * Checks lexicon schema documents from the command line.
 *
 * Usage:
 *   lexicheck check <path>        # Check a lexicon file or a directory of them
 *   lexicheck check <path> -v     # Also show definition counts
 *   lexicheck help                # Show help
 */

import {
	checkFiles,
	formatSummary,
	loadLexiconFiles,
	parseArgs,
	type FileReport,
	type Options,
} from "./cli-utils.js";

// Color codes for terminal output
const colors = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	cyan: "\x1b[36m",
};

function print(msg: string, color: keyof typeof colors = "reset"): void {
	process.stdout.write(`${colors[color]}${msg}${colors.reset}\n`);
}

function printError(msg: string): void {
	process.stderr.write(`${colors.red}${msg}${colors.reset}\n`);
}

function printReport(report: FileReport, options: Options): void {
	if (report.valid) {
		print(`✓ ${report.path}`, "green");
	} else {
		print(`✗ ${report.path}`, "red");
		for (const error of report.errors) {
			print(`    ${error}`, "red");
		}
	}
	if (options.verbose) {
		print(`    ${report.definitions} definition(s)`, "dim");
	}
}

async function runCheck(path: string, options: Options): Promise<boolean> {
	const files = await loadLexiconFiles(path);
	if (files.length === 0) {
		print(`No lexicon files found in ${path}`, "yellow");
		return true;
	}

	const reports = checkFiles(files);
	for (const report of reports) {
		printReport(report, options);
	}

	const allValid = reports.every((r) => r.valid);
	print("");
	print(formatSummary(reports), allValid ? "green" : "red");
	return allValid;
}

function showHelp(): void {
	print(`\n${colors.bold}lexicheck${colors.reset} - lexicon schema validator\n`);
	print(`${colors.bold}Usage:${colors.reset}`);
	print("  lexicheck check <path> [options]", "cyan");
	print("  lexicheck help\n", "cyan");
	print(`${colors.bold}Commands:${colors.reset}`);
	print("  check <path>      Check a lexicon file, or every *.json file in a directory");
	print("  help              Show this help message\n");
	print(`${colors.bold}Options:${colors.reset}`);
	print("  -v, --verbose     Show definition counts per file");
	print("  -h, --help        Show this help message\n");
}

async function main(): Promise<number> {
	const { command, path, options } = parseArgs(process.argv.slice(2));

	if (options.help || command === null) {
		showHelp();
		return 0;
	}

	if (command !== "check") {
		printError(`Unknown command: ${command}`);
		printError("Run 'lexicheck help' for usage.");
		return 1;
	}

	if (path === null) {
		printError("check requires a path to a lexicon file or directory");
		return 1;
	}

	const success = await runCheck(path, options);
	return success ? 0 : 1;
}

// Run
main()
	.then((code) => process.exit(code))
	.catch((error: unknown) => {
		printError(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
		process.exit(1);
	});
