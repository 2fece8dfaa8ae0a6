export {
  createRequestIdGenerator,
  generateRequestId,
  type RequestIdDeps,
  requestId,
} from "./adapters/request-id"
export { type IdErrorCode, IdGenerationError } from "./core/errors"
export type { IdType } from "./core/id-type"
export {
  formatRequestId,
  isRequestId,
  parseRequestId,
  type RequestIdParts,
  RequestIdType,
} from "./core/request-id-type"
export { processCounter, SequenceCounter } from "./core/sequence-counter"
export type { IdGenerator } from "./ports/id-generator"
export type { HostnameSource, RandomBytes } from "./ports/random-bytes"
export type { Sequence } from "./ports/sequence"
