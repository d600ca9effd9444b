// lexicheck - lexicon schema and data validation
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	ArraySchema, BlobSchema, BodySchema, BooleanSchema, BytesSchema, Catalog,
	CidLinkSchema, ErrorDef, IntegerSchema, LexiconDocument, MessageSchema,
	NullSchema, ObjectSchema, ParamsPropertySchema, ParamsSchema, PrimaryType,
	ProcedureSchema, QuerySchema, RawSchema, RecordKey, RecordSchema, RefSchema,
	SchemaNode, SchemaType, StringFormat, StringSchema, SubscriptionSchema,
	TokenSchema, UnionSchema, UnknownSchema,
} from "./types.js";

export type { ErrorCode, ValidationResult } from "./errors.js";

export type { ValidationOptions } from "./validation/context.js";

export type { CatalogBuild, CatalogProblem } from "./catalog.js";

export type { DocumentErrors } from "./lexicon.js";

//==============================================================================
// Errors
//==============================================================================

export {
	ErrorCodes, LexiconError, invalidResult, isLexiconError, validResult,
} from "./errors.js";

//==============================================================================
// Catalog
//==============================================================================

export { buildCatalog, createCatalog, documentSources, parseLexiconDocument } from "./catalog.js";

//==============================================================================
// Validation
//==============================================================================

export {
	validate, validateRecord, validateSubscriptionMessage,
	validateXrpcInput, validateXrpcOutput, validateXrpcParams,
} from "./lexicon.js";

export { ValidationContext, DEFAULT_MAX_DEPTH } from "./validation/context.js";

export { checkData, checkSchema, createContext } from "./validation/dispatcher.js";

//==============================================================================
// String Formats
//==============================================================================

export {
	isValidAtIdentifier, isValidAtUri, isValidCid, isValidDatetime, isValidDid,
	isValidHandle, isValidLanguage, isValidNsid, isValidRawCid, isValidRecordKey,
	isValidTid, isValidUri, validateStringFormat,
} from "./formats.js";

export { STRING_FORMATS, isStringFormat } from "./types.js";
