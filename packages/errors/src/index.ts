export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export type * from "./ports/error"
