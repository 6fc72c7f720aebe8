/**
 * Error module - exports all Kolumna error types.
 */

export { KolumnaError } from "./base.ts";
export type { ErrorLocation } from "./base.ts";
export { ColumnNotFoundError } from "./column-not-found.ts";
export { ConfigurationError } from "./configuration-error.ts";
export { ConversionError } from "./conversion-error.ts";
export { EmptyInputError } from "./empty-input.ts";
export { InputNotFoundError } from "./input-not-found.ts";
export { MalformedQuotingError } from "./malformed-quoting.ts";
export { SchemaError } from "./schema-error.ts";
