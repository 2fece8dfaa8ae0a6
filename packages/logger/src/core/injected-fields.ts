import type { IdGenerator } from "@logwell/id"
import type { InjectedFields } from "../ports/log-fields"

export type InjectionInput = {
  withTrace: boolean
  refId: string
}

/**
 * Fields attached to every record of a new logger. A trace id is drawn only
 * when one is attached.
 */
export function injectedFields(input: InjectionInput, traceId: IdGenerator<string>): InjectedFields {
  if (input.refId && input.withTrace) {
    return { "trace-id": traceId.generate(), "ref-id": input.refId }
  }

  if (input.refId) return { "ref-id": input.refId }

  if (input.withTrace) return { "trace-id": traceId.generate() }

  return {}
}
