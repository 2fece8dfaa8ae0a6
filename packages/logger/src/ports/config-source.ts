/**
 * A source of raw logger configuration.
 *
 * A ConfigSource only *loads* values. Validation and defaults happen once,
 * after all sources are merged; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used in error messages.
   * Example: "env", "dotenv:.env.logging"
   */
  readonly name: string

  /**
   * Undefined values mean "not provided" and do not override earlier sources.
   */
  load(): Promise<Record<string, unknown>>
}
