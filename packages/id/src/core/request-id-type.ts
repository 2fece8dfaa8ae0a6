import { IdGenerationError } from "./errors"
import type { IdType } from "./id-type"

export const RANDOM_LENGTH = 10
export const SEQUENCE_WIDTH = 6
export const FALLBACK_HOST = "localhost"

export type RequestIdParts = {
  host: string
  random: string
  sequence: number
}

// host may itself contain dots and dashes, so anchor on the tail.
const REQUEST_ID_PATTERN = new RegExp(
  `^(.+)\\.([A-Za-z0-9]{${RANDOM_LENGTH}})-(\\d{${SEQUENCE_WIDTH},})$`,
)

export function formatRequestId({ host, random, sequence }: RequestIdParts): string {
  return `${host}.${random}-${String(sequence).padStart(SEQUENCE_WIDTH, "0")}`
}

export const isRequestId = (value: unknown): value is string =>
  typeof value === "string" && REQUEST_ID_PATTERN.test(value)

export function parseRequestId(value: unknown): RequestIdParts {
  const match = typeof value === "string" ? REQUEST_ID_PATTERN.exec(value) : null
  const [, host, random, sequence] = match ?? []

  if (host === undefined || random === undefined || sequence === undefined) {
    throw new IdGenerationError("Malformed request id", {
      code: "invalid_request_id",
      context: { value },
    })
  }

  return { host, random, sequence: Number(sequence) }
}

export const RequestIdType: IdType<string, RequestIdParts> = {
  kind: "RequestId",
  is: isRequestId,
  parse: parseRequestId,
}
