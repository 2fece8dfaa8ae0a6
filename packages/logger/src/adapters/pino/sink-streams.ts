import pino from "pino"
import { LoggerBuildError } from "../../core/errors"
import { describeSink, type SinkTarget } from "../../core/sinks"

/** What pino writes finished lines to. */
export type SinkStream = {
  write(line: string): unknown
}

export type OpenSinksOptions = {
  /** Rewrites each line before it reaches the sink, e.g. to pretty-print it. */
  render?: (line: string, target: SinkTarget) => string
  /** Where run-time write failures are reported. */
  errorOutput: (line: string) => void
  stdout?: SinkStream
  stderr?: SinkStream
}

type OpenSink = {
  target: SinkTarget
  stream: SinkStream
  flush(): void
  release(): void
}

/**
 * The opened sinks of one logger, in write order.
 */
export type SinkSet = {
  readonly streams: readonly SinkStream[]
  readonly closed: boolean
  flush(): void
  close(): void
}

function openDestination(
  dest: string | 1 | 2,
  target: SinkTarget,
  errorOutput: (line: string) => void,
): OpenSink {
  const stream = pino.destination({ dest, sync: true, append: true, mkdir: false })

  stream.on("error", (err: Error) => {
    errorOutput(`log sink ${describeSink(target)}: ${err.message}`)
  })

  return {
    target,
    stream,
    flush: () => stream.flushSync(),
    // fd 1 and 2 belong to the process
    release: () => {
      if (target.kind === "file") stream.end()
    },
  }
}

function openInjected(target: SinkTarget, stream: SinkStream): OpenSink {
  return { target, stream, flush: () => {}, release: () => {} }
}

function open(target: SinkTarget, options: OpenSinksOptions): OpenSink {
  switch (target.kind) {
    case "stdout":
      return options.stdout
        ? openInjected(target, options.stdout)
        : openDestination(1, target, options.errorOutput)
    case "stderr":
      return options.stderr
        ? openInjected(target, options.stderr)
        : openDestination(2, target, options.errorOutput)
    case "file":
      return openDestination(target.path, target, options.errorOutput)
  }
}

function release(sinks: readonly OpenSink[], errorOutput: (line: string) => void): void {
  for (const sink of sinks) {
    try {
      sink.release()
    } catch (err) {
      errorOutput(`log sink ${describeSink(sink.target)}: ${String(err)}`)
    }
  }
}

/**
 * Opens every target, in order. If one fails, the ones already open are
 * released before `sink_unavailable` is thrown.
 */
export function openSinks(targets: readonly SinkTarget[], options: OpenSinksOptions): SinkSet {
  const opened: OpenSink[] = []

  for (const target of targets) {
    try {
      opened.push(open(target, options))
    } catch (err) {
      release(opened, options.errorOutput)

      throw new LoggerBuildError(`Cannot open log sink "${describeSink(target)}"`, {
        code: "sink_unavailable",
        context: { sink: describeSink(target) },
        cause: err,
      })
    }
  }

  const { render, errorOutput } = options

  const streams = opened.map(
    ({ target, stream }): SinkStream =>
      render ? { write: (line: string) => stream.write(render(line, target)) } : stream,
  )

  let closed = false

  const flush = () => {
    for (const sink of opened) {
      try {
        sink.flush()
      } catch (err) {
        errorOutput(`log sink ${describeSink(sink.target)}: ${String(err)}`)
      }
    }
  }

  return {
    streams,
    get closed() {
      return closed
    },
    flush: () => {
      if (!closed) flush()
    },
    close: () => {
      if (closed) return

      flush()
      closed = true
      release(opened, errorOutput)
    },
  }
}
