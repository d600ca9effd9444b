// Lexicon Type Definitions
// JSON values, lexicon documents and the schema node domain

//==============================================================================
// JSON Value Domain
//==============================================================================

export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value);
}

export function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Name of a JSON value's kind, for error messages.
 */
export function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	if (isInteger(value)) return "integer";
	return typeof value;
}

//==============================================================================
// Lexicon Documents
//==============================================================================

export type RawSchema = Record<string, unknown>;

export interface LexiconDocument {
	lexicon?: 1;
	id: string;
	description?: string;
	defs: ReadonlyMap<string, RawSchema>;
}

export type Catalog = ReadonlyMap<string, LexiconDocument>;

//==============================================================================
// String Formats
//==============================================================================

export const STRING_FORMATS = [
	"at-identifier",
	"at-uri",
	"cid",
	"datetime",
	"did",
	"handle",
	"language",
	"nsid",
	"record-key",
	"tid",
	"uri",
] as const;

export type StringFormat = (typeof STRING_FORMATS)[number];

export function isStringFormat(value: unknown): value is StringFormat {
	return STRING_FORMATS.some((format) => format === value);
}

//==============================================================================
// Schema Node Domain
//==============================================================================

export type SchemaType = SchemaNode["type"];

export type SchemaNode =
	| StringSchema
	| IntegerSchema
	| BooleanSchema
	| NullSchema
	| BytesSchema
	| BlobSchema
	| CidLinkSchema
	| TokenSchema
	| UnknownSchema
	| ObjectSchema
	| ArraySchema
	| UnionSchema
	| RefSchema
	| RecordSchema
	| ParamsSchema
	| QuerySchema
	| ProcedureSchema
	| SubscriptionSchema;

interface SchemaBase {
	description?: string;
}

export interface StringSchema extends SchemaBase {
	type: "string";
	format?: StringFormat;
	minLength?: number;
	maxLength?: number;
	minGraphemes?: number;
	maxGraphemes?: number;
	enum?: string[];
	knownValues?: string[];
	const?: string;
	default?: string;
}

export interface IntegerSchema extends SchemaBase {
	type: "integer";
	minimum?: number;
	maximum?: number;
	enum?: number[];
	const?: number;
	default?: number;
}

export interface BooleanSchema extends SchemaBase {
	type: "boolean";
	const?: boolean;
	default?: boolean;
}

export interface NullSchema extends SchemaBase {
	type: "null";
}

export interface BytesSchema extends SchemaBase {
	type: "bytes";
	minLength?: number;
	maxLength?: number;
}

export interface BlobSchema extends SchemaBase {
	type: "blob";
	accept?: string[];
	maxSize?: number;
}

export interface CidLinkSchema extends SchemaBase {
	type: "cid-link";
}

export interface TokenSchema extends SchemaBase {
	type: "token";
}

export interface UnknownSchema extends SchemaBase {
	type: "unknown";
}

export interface ObjectSchema extends SchemaBase {
	type: "object";
	properties: ReadonlyMap<string, SchemaNode>;
	required: string[];
	nullable: string[];
}

export interface ArraySchema extends SchemaBase {
	type: "array";
	items: SchemaNode;
	minLength?: number;
	maxLength?: number;
}

export interface UnionSchema extends SchemaBase {
	type: "union";
	refs: string[];
	closed: boolean;
}

export interface RefSchema extends SchemaBase {
	type: "ref";
	ref: string;
}

export type RecordKey = "tid" | "any" | "nsid" | `literal:${string}`;

export interface RecordSchema extends SchemaBase {
	type: "record";
	key: RecordKey;
	record: ObjectSchema;
}

export type ParamsPropertySchema =
	| BooleanSchema
	| IntegerSchema
	| StringSchema
	| UnknownSchema
	| (ArraySchema & { items: BooleanSchema | IntegerSchema | StringSchema | UnknownSchema });

export interface ParamsSchema extends SchemaBase {
	type: "params";
	properties: ReadonlyMap<string, ParamsPropertySchema>;
	required: string[];
}

export type BodySchemaNode = ObjectSchema | RefSchema | UnionSchema;

export interface BodySchema {
	description?: string;
	encoding: string;
	schema?: BodySchemaNode;
}

export interface MessageSchema {
	description?: string;
	schema?: UnionSchema;
}

export interface ErrorDef {
	name: string;
	description?: string;
}

export interface QuerySchema extends SchemaBase {
	type: "query";
	parameters?: ParamsSchema;
	output?: BodySchema;
	errors?: ErrorDef[];
}

export interface ProcedureSchema extends SchemaBase {
	type: "procedure";
	parameters?: ParamsSchema;
	input?: BodySchema;
	output?: BodySchema;
	errors?: ErrorDef[];
}

export interface SubscriptionSchema extends SchemaBase {
	type: "subscription";
	parameters?: ParamsSchema;
	message?: MessageSchema;
	errors?: ErrorDef[];
}

export const PRIMARY_TYPES = ["record", "query", "procedure", "subscription"] as const;

export type PrimaryType = (typeof PRIMARY_TYPES)[number];

export function isPrimaryType(type: string): type is PrimaryType {
	return PRIMARY_TYPES.some((t) => t === type);
}
