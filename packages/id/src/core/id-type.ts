/**
 * Runtime recognizer for an id format, used where ids cross a boundary
 * (a header, a log line read back, a caller-supplied ref-id).
 *
 * @example
 * ```typescript
 * const header = req.headers["x-request-id"]
 * if (RequestIdType.is(header)) {
 *   const { host, sequence } = RequestIdType.parse(header)
 * }
 * ```
 */
export interface IdType<T, P = T> {
  /** Identifier name for error messages and debugging */
  readonly kind: string

  /**
   * Validate unknown input and break it into its parts.
   * @throws Implementation-defined error if validation fails
   */
  parse(value: unknown): P

  /** Type guard for non-throwing validation */
  is(value: unknown): value is T
}
