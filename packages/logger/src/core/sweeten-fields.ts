import type { LogFields } from "../ports/log-fields"

export type SweetenedFields = {
  fields: LogFields
  /** Pairs dropped because their key is not a string. */
  invalid: Array<[unknown, unknown]>
  /** A trailing key with no value, if any. */
  dangling?: unknown
}

export function sweetenFields(keysAndValues: readonly unknown[]): SweetenedFields {
  const fields: LogFields = {}
  const invalid: Array<[unknown, unknown]> = []

  for (let i = 0; i < keysAndValues.length; i += 2) {
    const key = keysAndValues[i]

    if (i + 1 === keysAndValues.length) {
      return { fields, invalid, dangling: key }
    }

    const value = keysAndValues[i + 1]

    if (typeof key === "string") {
      fields[key] = value
    } else {
      invalid.push([key, value])
    }
  }

  return { fields, invalid }
}
