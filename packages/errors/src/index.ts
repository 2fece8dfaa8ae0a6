export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { toAppError } from "./core/utils/to-app-error"
export type * from "./ports/error"
