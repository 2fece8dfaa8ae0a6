import { toAppError } from "@logwell/errors"
import type { LogFields, LogParams } from "../ports/log-fields"

export type RoutedCall = {
  level: "info" | "error"
  message: string
  fields: LogFields
}

/**
 * Maps `log(message, params, err)` onto one leveled record. With an error the
 * record carries the error's text instead of `message`.
 */
export function routeLogCall(message: string, params?: LogParams | null, err?: unknown): RoutedCall {
  const fields: LogFields = { ...params }

  if (err !== undefined && err !== null) {
    return { level: "error", message: toAppError(err).message, fields }
  }

  return { level: "info", message, fields }
}
