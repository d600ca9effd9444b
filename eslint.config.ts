import eslint from "@eslint/js";
import markdown from "@eslint/markdown";
import jsonc from "eslint-plugin-jsonc";
import tseslint from "typescript-eslint";
import type { Linter, Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

const TEST_SUFFIXES = [".unit.test.ts", ".integration.test.ts"];

// Test files end in .unit.test.ts or .integration.test.ts.
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: {
			description: "Require test files to end with .unit.test.ts or .integration.test.ts",
		},
		messages: {
			invalidTestFileName:
				"Test file '{{actual}}' must end with .unit.test.ts or .integration.test.ts",
		},
		schema: [],
	},
	create(context) {
		const filename = context.filename;
		return {
			Program() {
				if (TEST_SUFFIXES.some((suffix) => filename.endsWith(suffix))) {
					return;
				}
				context.report({
					loc: { column: 0, line: 1 },
					messageId: "invalidTestFileName",
					data: { actual: filename },
				});
			},
		};
	},
};

const sharedStyle: Linter.RulesRecord = {
	"@typescript-eslint/no-unused-vars": "error",
	"@typescript-eslint/no-explicit-any": "error",
	indent: ["error", "tab"],
	quotes: ["error", "double", { avoidEscape: true }],
};

export default [
	{
		ignores: ["dist/**", "node_modules/**", "coverage/**", "*.config.ts"],
	},

	{
		files: ["test/**/*.test.ts", "test/**/*.spec.ts"],
		plugins: {
			lexicheck: { rules: { "test-file-naming": testFileNamingRule } },
		},
		rules: {
			"lexicheck/test-file-naming": "error",
		},
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Sources: strict, type-aware
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	...tseslint.configs.stylisticTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			...sharedStyle,
			"@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true }],
			"@typescript-eslint/no-non-null-assertion": "error",
		},
	},

	// Validators work on values already in memory; file access stays in the CLI
	{
		files: ["src/validation/**/*.ts", "src/catalog.ts", "src/lexicon.ts", "src/formats.ts"],
		rules: {
			"no-restricted-imports": [
				"error",
				{ patterns: [{ group: ["node:fs", "node:fs/*", "node:path"], message: "Validators do not touch the filesystem." }] },
			],
		},
	},

	// Tests: recommended rules without type information
	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: sharedStyle,
	},

	// Lexicon documents and project JSON
	...jsonc.configs["flat/recommended-with-json"].map((config) => ({
		...config,
		files: ["**/*.json"],
	})),
	{
		files: ["**/*.json"],
		rules: {
			"jsonc/indent": ["error", 2],
			"jsonc/quotes": ["error", "double"],
		},
	},
	{
		files: ["examples/lexicons/**/*.json"],
		rules: {
			"jsonc/no-dupe-keys": "error",
			"jsonc/no-comments": "error",
		},
	},

	...markdown.configs.recommended.map((config) => ({
		...config,
		files: ["**/*.md"],
	})),
	{
		files: ["**/*.md"],
		rules: {
			"markdown/fenced-code-language": "off",
		},
	},
] satisfies ConfigArray;
