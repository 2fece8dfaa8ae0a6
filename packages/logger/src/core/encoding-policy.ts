import type { LogLevelName } from "../ports/log-level"
import { DEVELOPMENT_LEVEL, PRODUCTION_LEVEL, SAMPLING } from "./defaults"
import type { SamplingPolicy } from "./sampler"

export type Encoding = "json" | "pretty"

export type EncodingPolicy = {
  level: LogLevelName
  encoding: Encoding
  sampling: SamplingPolicy | null
}

export function encodingPolicy(development: boolean): EncodingPolicy {
  if (development) {
    return { level: DEVELOPMENT_LEVEL, encoding: "pretty", sampling: null }
  }

  return { level: PRODUCTION_LEVEL, encoding: "json", sampling: { ...SAMPLING } }
}
