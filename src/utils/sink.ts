/**
 * Destination for progress and diagnostic lines
 */
export interface OutputSink {
  println(line: string): void
}

/**
 * Sink that keeps every line in memory
 */
export interface MemorySink extends OutputSink {
  readonly lines: string[]
}

/**
 * Write lines to a writable stream such as process.stdout
 */
export function createStreamSink(stream: { write(chunk: string): unknown }): OutputSink {
  return {
    println: (line: string) => {
      stream.write(`${line}\n`)
    }
  }
}

/**
 * Collect lines in memory
 */
export function createMemorySink(): MemorySink {
  const lines: string[] = []

  return {
    lines,
    println: (line: string) => {
      lines.push(line)
    }
  }
}

/**
 * Sink that drops everything
 */
export const nullSink: OutputSink = {
  println: () => {}
}

/**
 * Pass on only the lines the predicate accepts
 */
export function createFilteredSink(
  inner: OutputSink,
  accept: (line: string) => boolean
): OutputSink {
  return {
    println: (line: string) => {
      if (accept(line)) {
        inner.println(line)
      }
    }
  }
}
