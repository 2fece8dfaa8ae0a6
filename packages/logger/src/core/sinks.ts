import { STDERR_TOKEN, STDOUT_TOKEN } from "./defaults"

export type SinkTarget =
  | { kind: "stdout" }
  | { kind: "stderr" }
  | { kind: "file"; path: string }

export function sinkTarget(output: string): SinkTarget {
  if (output === STDOUT_TOKEN) return { kind: "stdout" }
  if (output === STDERR_TOKEN) return { kind: "stderr" }

  return { kind: "file", path: output }
}

/**
 * The primary file first, then every output in order. Repeats are kept.
 */
export function resolveSinks(primaryFile: string, outputs: readonly string[]): SinkTarget[] {
  return [{ kind: "file", path: primaryFile }, ...outputs.map(sinkTarget)]
}

export function describeSink(target: SinkTarget): string {
  return target.kind === "file" ? target.path : target.kind
}
