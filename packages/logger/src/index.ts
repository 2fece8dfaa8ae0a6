export { FakeClock } from "./adapters/clock/fake-clock"
export { SystemClock, systemClock } from "./adapters/clock/system-clock"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/config/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/config/env/env-source"
export type { SinkStream } from "./adapters/pino/sink-streams"
export {
  type BuildLoggerDeps,
  buildLogger,
  buildLoggerFromConfig,
  createLogger,
} from "./core/build-logger"
export { DEFAULT_LOG_DIR, DEFAULT_TIME_ZONE } from "./core/defaults"
export {
  LoggerBuildError,
  type LoggerBuildErrorCode,
  LoggerConfigError,
  type LoggerConfigErrorCode,
} from "./core/errors"
export { type LoadLoggerConfigOptions, loadLoggerConfig } from "./core/load-logger-config"
export { type LoggerConfig, loggerConfigSchema } from "./core/logger-config"
export type { Clock, Milliseconds } from "./ports/clock"
export type { ConfigSource } from "./ports/config-source"
export type { InjectedFields, LogContext, LogFields, LogParams } from "./ports/log-fields"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { LogOptions } from "./ports/log-options"
export type { Logger, RoutedLogger, SugaredLogger } from "./ports/logger"
