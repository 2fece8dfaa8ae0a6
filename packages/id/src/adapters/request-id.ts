import { randomBytes as nodeRandomBytes } from "node:crypto"
import { hostname as osHostname } from "node:os"
import { IdGenerationError } from "../core/errors"
import { FALLBACK_HOST, formatRequestId, RANDOM_LENGTH } from "../core/request-id-type"
import { processCounter } from "../core/sequence-counter"
import type { IdGenerator } from "../ports/id-generator"
import type { HostnameSource, RandomBytes } from "../ports/random-bytes"
import type { Sequence } from "../ports/sequence"

// 12 bytes encode to 16 base64 characters with no padding.
const SAMPLE_BYTES = 12

export type RequestIdDeps = {
  hostname?: HostnameSource
  randomBytes?: RandomBytes
  counter?: Sequence
}

function resolveHost(hostname: HostnameSource): string {
  try {
    return hostname() || FALLBACK_HOST
  } catch {
    return FALLBACK_HOST
  }
}

function sample(randomBytes: RandomBytes): Uint8Array {
  let bytes: Uint8Array

  try {
    bytes = randomBytes(SAMPLE_BYTES)
  } catch (err) {
    throw new IdGenerationError("Random source failed", {
      code: "id_generation_failed",
      cause: err,
    })
  }

  if (bytes.length < SAMPLE_BYTES) {
    throw new IdGenerationError("Random source returned too few bytes", {
      code: "id_generation_failed",
      context: { requested: SAMPLE_BYTES, received: bytes.length },
    })
  }

  return bytes
}

/**
 * Base64 without `+` and `/`. Stripping can leave fewer than
 * {@link RANDOM_LENGTH} characters, in which case a fresh sample is drawn.
 */
function randomSegment(randomBytes: RandomBytes): string {
  let encoded = ""

  while (encoded.length < RANDOM_LENGTH) {
    encoded = Buffer.from(sample(randomBytes)).toString("base64").replace(/[+/]/g, "")
  }

  return encoded.slice(0, RANDOM_LENGTH)
}

/**
 * Request ids of the form `host.random-000042`.
 *
 * Uniqueness within a process comes from the counter alone; host and random
 * segment only make ids from different processes distinguishable. The counter
 * advances only once the random segment has been drawn, so a failed call does
 * not use up a sequence number.
 */
export function createRequestIdGenerator(deps: RequestIdDeps = {}): IdGenerator<string> {
  const hostname = deps.hostname ?? osHostname
  const randomBytes = deps.randomBytes ?? nodeRandomBytes
  const counter = deps.counter ?? processCounter

  return {
    generate: () => {
      const host = resolveHost(hostname)
      const random = randomSegment(randomBytes)

      return formatRequestId({ host, random, sequence: counter.next() })
    },
  }
}

export const requestId: IdGenerator<string> = createRequestIdGenerator()

export const generateRequestId = (): string => requestId.generate()
