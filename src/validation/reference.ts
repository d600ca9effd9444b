// Lexicon References
// Parsing of `#name`, `nsid` and `nsid#name` references and `$type` matching

import { invalidResult, validResult, type ValidationResult } from "../errors.js";
import { isValidNsid } from "../formats.js";

export interface ParsedReference {
	documentId: string;
	name: string;
}

/**
 * Split a reference into its target document and definition name. Local
 * references (`#name`) are resolved against `currentDocument`; a reference
 * with no fragment targets the document's `main` definition.
 */
export function parseReference(
	ref: string,
	currentDocument: string | undefined,
): ValidationResult<ParsedReference, string> {
	const parts = ref.split("#");
	if (parts.length > 2) {
		return invalidResult(`reference '${ref}' has more than one '#'`);
	}

	const [documentPart = "", namePart] = parts;

	if (namePart === undefined) {
		if (!isValidNsid(documentPart)) {
			return invalidResult(`reference '${ref}' is not a valid NSID`);
		}
		return validResult({ documentId: documentPart, name: "main" });
	}

	if (namePart === "") {
		return invalidResult(`reference '${ref}' has an empty definition name`);
	}

	if (documentPart === "") {
		if (currentDocument === undefined) {
			return invalidResult(
				`cannot resolve local reference '${ref}' without a current document`,
			);
		}
		return validResult({ documentId: currentDocument, name: namePart });
	}

	if (!isValidNsid(documentPart)) {
		return invalidResult(`reference '${ref}' does not start with a valid NSID`);
	}
	return validResult({ documentId: documentPart, name: namePart });
}

/**
 * Check reference syntax only. Local references are accepted without a
 * current document to resolve them against.
 */
export function checkReferenceSyntax(ref: string): string | undefined {
	if (ref.startsWith("#")) {
		if (ref.length === 1) {
			return `reference '${ref}' has an empty definition name`;
		}
		if (ref.indexOf("#", 1) !== -1) {
			return `reference '${ref}' has more than one '#'`;
		}
		return undefined;
	}
	const result = parseReference(ref, undefined);
	return result.valid ? undefined : result.error;
}

/**
 * Absolute form of a parsed reference, used as its identity.
 */
export function referenceKey(ref: ParsedReference): string {
	return ref.documentId + "#" + ref.name;
}

/**
 * Does a union entry accept a value whose `$type` is `type`?
 *
 *   "#post"      matches "post" and any "<nsid>#post"
 *   "a.b.c"      matches "a.b.c" and "a.b.c#main"
 *   "a.b.c#main" matches "a.b.c#main" and "a.b.c"
 *   "a.b.c#view" matches "a.b.c#view" only
 */
export function matchesReference(type: string, ref: string): boolean {
	if (type === ref) {
		return true;
	}
	if (ref.startsWith("#")) {
		const name = ref.slice(1);
		return type === name || type.endsWith(ref);
	}
	if (!ref.includes("#")) {
		return type === ref + "#main";
	}
	if (ref.endsWith("#main")) {
		return type === ref.slice(0, -"#main".length);
	}
	return false;
}
