// Lexicon String Formats
// Syntax predicates for the string formats a lexicon may declare

import { CID } from "multiformats";
import * as raw from "multiformats/codecs/raw";
import { sha256 } from "multiformats/hashes/sha2";
import { invalidResult, validResult, type ValidationResult } from "./errors.js";
import type { StringFormat } from "./types.js";

//==============================================================================
// Patterns
//==============================================================================

const NSID_PATTERN =
	/^[a-zA-Z]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)+(\.[a-zA-Z]([a-zA-Z0-9]{0,62})?)$/;
const DID_PATTERN = /^did:[a-z]+:[a-zA-Z0-9._:%-]*[a-zA-Z0-9._-]$/;
const HANDLE_PATTERN =
	/^([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;
const DATETIME_PATTERN =
	/^[0-9]{4}-[01][0-9]-[0-3][0-9]T[0-2][0-9]:[0-6][0-9]:[0-6][0-9](\.[0-9]{1,20})?(Z|([+-][0-2][0-9]:[0-5][0-9]))$/;
const URI_PATTERN = /^\w+:(?:\/\/)?[^\s/][^\s]*$/;
const AT_URI_PATTERN =
	/^at:\/\/(?<authority>[a-zA-Z0-9._:%-]+)(\/(?<collection>[a-zA-Z0-9.-]+)(\/(?<rkey>[a-zA-Z0-9._~:@!$&%')(*+,;=-]+))?)?(#(?<fragment>\/[a-zA-Z0-9._~:@!$&%')(*+,;=\-[\]/\\]*))?$/;
const TID_PATTERN = /^[234567abcdefghij][234567abcdefghijklmnopqrstuvwxyz]{12}$/;
const RECORD_KEY_PATTERN = /^[a-zA-Z0-9_~.:-]{1,512}$/;
const CID_PATTERN = /^[a-zA-Z0-9+=]{8,256}$/;
const LANGUAGE_PATTERN =
	/^(([a-zA-Z]{2,3}(-[a-zA-Z]{3}){0,3}|[a-zA-Z]{4,8})(-[a-zA-Z]{4})?(-([a-zA-Z]{2}|[0-9]{3}))?(-([a-zA-Z0-9]{5,8}|[0-9][a-zA-Z0-9]{3}))*(-[0-9a-wy-zA-WY-Z](-[a-zA-Z0-9]{2,8})+)*(-x(-[a-zA-Z0-9]{1,8})+)?|x(-[a-zA-Z0-9]{1,8})+|i(-[a-zA-Z0-9]{2,8})+)$/;

//==============================================================================
// Identifiers
//==============================================================================

/**
 * Namespaced identifier: reverse-DNS authority plus a name segment, at least
 * three segments in total.
 */
export function isValidNsid(value: string): boolean {
	return value.length <= 317 && NSID_PATTERN.test(value);
}

export function isValidDid(value: string): boolean {
	return value.length <= 2048 && DID_PATTERN.test(value);
}

export function isValidHandle(value: string): boolean {
	return value.length <= 253 && HANDLE_PATTERN.test(value);
}

export function isValidAtIdentifier(value: string): boolean {
	return isValidDid(value) || isValidHandle(value);
}

export function isValidTid(value: string): boolean {
	return TID_PATTERN.test(value);
}

export function isValidRecordKey(value: string): boolean {
	return value !== "." && value !== ".." && RECORD_KEY_PATTERN.test(value);
}

//==============================================================================
// Links and Times
//==============================================================================

/**
 * RFC 3339 timestamp with a mandatory timezone. `-00:00` is not accepted.
 */
export function isValidDatetime(value: string): boolean {
	if (value.length > 64 || !DATETIME_PATTERN.test(value)) {
		return false;
	}
	if (value.endsWith("-00:00")) {
		return false;
	}
	return !Number.isNaN(Date.parse(value));
}

export function isValidUri(value: string): boolean {
	return value.length <= 8192 && URI_PATTERN.test(value);
}

/**
 * `at://<did-or-handle>[/<nsid>[/<record-key>]][#/<fragment>]`
 */
export function isValidAtUri(value: string): boolean {
	if (value.length > 8192) {
		return false;
	}
	const match = AT_URI_PATTERN.exec(value);
	const groups = match?.groups;
	if (groups === undefined) {
		return false;
	}
	const { authority, collection } = groups;
	if (authority === undefined || !isValidAtIdentifier(authority)) {
		return false;
	}
	return collection === undefined || isValidNsid(collection);
}

export function isValidLanguage(value: string): boolean {
	return LANGUAGE_PATTERN.test(value);
}

//==============================================================================
// Content Identifiers
//==============================================================================

/**
 * Loose CID syntax check. Legacy CIDv0 strings (`Qmb...`) are rejected.
 */
export function isValidCid(value: string): boolean {
	return CID_PATTERN.test(value) && !value.startsWith("Qmb");
}

/**
 * CIDv1 in base32 multibase using the raw codec and a sha2-256 digest, the
 * only CID form a blob reference may carry.
 */
export function isValidRawCid(value: string): boolean {
	if (!isValidCid(value) || !value.startsWith("b")) {
		return false;
	}
	try {
		const cid = CID.parse(value);
		return cid.version === 1 && cid.code === raw.code && cid.multihash.code === sha256.code;
	} catch {
		return false;
	}
}

//==============================================================================
// Format Dispatch
//==============================================================================

export const formatValidators: Record<StringFormat, (value: string) => boolean> = {
	"at-identifier": isValidAtIdentifier,
	"at-uri": isValidAtUri,
	cid: isValidCid,
	datetime: isValidDatetime,
	did: isValidDid,
	handle: isValidHandle,
	language: isValidLanguage,
	nsid: isValidNsid,
	"record-key": isValidRecordKey,
	tid: isValidTid,
	uri: isValidUri,
};

/**
 * Check a string against a named format.
 */
export function validateStringFormat(
	value: string,
	format: StringFormat,
): ValidationResult<string, string> {
	if (formatValidators[format](value)) {
		return validResult(value);
	}
	return invalidResult(`'${value}' is not a valid ${format}`);
}
