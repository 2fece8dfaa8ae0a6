import { DEFAULT_TIME_ZONE } from "./defaults"
import { LoggerBuildError } from "./errors"

type Part = "year" | "month" | "day" | "hour" | "minute" | "second"

export function resolveTimeZone(timeZone?: string): string {
  return timeZone || DEFAULT_TIME_ZONE
}

function createFormatter(timeZone: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    })
  } catch (err) {
    throw new LoggerBuildError(`Unknown time zone "${timeZone}"`, {
      code: "invalid_time_zone",
      context: { timeZone },
      cause: err,
    })
  }
}

/**
 * Renders instants as wall-clock time in one IANA zone.
 *
 * Construction fails with `invalid_time_zone` for a zone the runtime does not
 * know; there is no fallback to the host zone.
 */
export class ZonedFormat {
  private readonly formatter: Intl.DateTimeFormat

  constructor(readonly timeZone: string) {
    this.formatter = createFormatter(timeZone)
  }

  private parts(date: Date): Record<Part, string> {
    const values = new Map<string, string>()

    for (const part of this.formatter.formatToParts(date)) {
      values.set(part.type, part.value)
    }

    const pick = (type: Part) => values.get(type) ?? "00"

    return {
      year: pick("year"),
      month: pick("month"),
      day: pick("day"),
      hour: pick("hour"),
      minute: pick("minute"),
      second: pick("second"),
    }
  }

  /** `YYYY-MM-DD` */
  date(date: Date): string {
    const p = this.parts(date)

    return `${p.year}-${p.month}-${p.day}`
  }

  /** `YYYY/MM/DD HH:mm:ss`, 24-hour. */
  timestamp(date: Date): string {
    const p = this.parts(date)

    return `${p.year}/${p.month}/${p.day} ${p.hour}:${p.minute}:${p.second}`
  }
}
