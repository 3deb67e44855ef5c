/**
 * Stream processing utilities for line-oriented text input
 *
 * FASTQ is read one line at a time; these helpers turn a byte stream into
 * lines and let the file reader look at the first chunk without losing it.
 */

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  /** Complete lines, without their terminators */
  readonly lines: string[];
  /** Trailing text that has not seen its newline yet */
  readonly remainder: string;
}

/**
 * A stream whose first chunk has already been read
 */
export interface PeekedStream {
  /** First chunk of the stream, or undefined when the stream was empty */
  readonly head: Uint8Array | undefined;
  /** Stream that yields `head` again, followed by the rest of the input */
  readonly stream: ReadableStream<Uint8Array>;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Split a text buffer into complete lines
 *
 * Accepts `\n` and `\r\n` terminators. A `\r` that arrives at the end of one
 * chunk with its `\n` in the next stays in the remainder and is stripped
 * once the line completes.
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const parts = buffer.split("\n");
  const remainder = parts.pop() ?? "";
  return {
    lines: parts.map(stripCarriageReturn),
    remainder,
  };
}

/**
 * Convert a byte stream to an async iterable of lines
 *
 * The final line is yielded even without a trailing newline; an empty
 * remainder after the last newline is not a line. If the consumer stops
 * early (a `break` out of `for await`), the underlying stream is cancelled,
 * which closes the file it was reading.
 *
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('@')) console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let settled = false;

  try {
    while (true) {
      let result: Awaited<ReturnType<typeof reader.read>>;
      try {
        result = await reader.read();
      } catch (error) {
        settled = true;
        throw error;
      }

      if (result.done) {
        settled = true;
        buffer += decoder.decode();
        const last = stripCarriageReturn(buffer);
        if (last.length > 0) {
          yield last;
        }
        return;
      }

      buffer += decoder.decode(result.value, { stream: true });
      const { lines, remainder } = processBuffer(buffer);
      buffer = remainder;

      for (const line of lines) {
        yield line;
      }
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Read the first chunk of a stream and hand back a stream that replays it
 *
 * Cancelling the returned stream cancels the original one.
 */
export async function peekStream(stream: ReadableStream<Uint8Array>): Promise<PeekedStream> {
  const reader = stream.getReader();
  const first = await reader.read();
  const head = first.done ? undefined : first.value;
  let pending = head;

  const replay = new ReadableStream<Uint8Array>({
    pull: async (controller) => {
      if (pending !== undefined) {
        controller.enqueue(pending);
        pending = undefined;
        return;
      }

      const { done, value } = await reader.read();
      if (done) {
        controller.close();
        reader.releaseLock();
        return;
      }
      controller.enqueue(value);
    },
    cancel: (reason) => reader.cancel(reason),
  });

  return { head, stream: replay };
}

export const StreamUtils = {
  processBuffer,
  readLines,
  peekStream,
} as const;
