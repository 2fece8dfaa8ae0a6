/**
 * How a logger built by `buildLogger` behaves.
 *
 * @remarks
 * Every field is optional; an empty object gives a production logger writing
 * only to its dated file, in the default time zone, with no injected fields.
 */
export type LogOptions = {
  /**
   * Human-readable lines and `debug` threshold instead of JSON, `info`
   * threshold and sampling.
   * @default false
   */
  development?: boolean

  /**
   * Attach a freshly generated `trace-id` to every record.
   * @default false
   */
  withTrace?: boolean

  /**
   * Attach this value as `ref-id` to every record. Empty means no `ref-id`.
   * @default ""
   */
  refId?: string

  /**
   * Extra sinks, written after the dated file and in this order.
   * `"stdout"` and `"stderr"` name the process streams; anything else is a
   * file path opened for appending.
   *
   * @remarks
   * Entries are not de-duplicated: a sink listed twice receives every record
   * twice.
   * @default []
   */
  outputs?: readonly string[]

  /**
   * IANA time zone used for the file date and for record timestamps.
   * @default "Asia/Jakarta"
   */
  timeZone?: string
}
