/**
 * Line buffer for process output.
 *
 * Data arrives in arbitrary chunks that may split across lines or even across
 * UTF-8 multi-byte characters. The buffer accumulates partial data and yields
 * complete lines without their terminator.
 */
export class LineBuffer {
  private buffer = "";
  private decoder = new TextDecoder("utf-8", { fatal: false });

  /** Feed raw bytes or a string. Returns the lines it completed, blank ones included. */
  feed(chunk: string | Uint8Array): string[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.buffer += text;

    const lines: string[] = [];

    // Handle both \n and \r\n line endings
    let newlineIdx = this.buffer.indexOf("\n");
    while (newlineIdx !== -1) {
      const line = this.buffer.slice(0, newlineIdx);
      this.buffer = this.buffer.slice(newlineIdx + 1);
      newlineIdx = this.buffer.indexOf("\n");
      lines.push(line.endsWith("\r") ? line.slice(0, -1) : line);
    }

    return lines;
  }

  /** Remaining text without a trailing newline, or null when there is none. */
  flush(): string | null {
    const remaining = this.buffer + this.decoder.decode();
    this.buffer = "";
    return remaining.length > 0 ? remaining : null;
  }

  /** Current buffer size in characters. */
  get size(): number {
    return this.buffer.length;
  }
}

/** Read `stream` to its end, calling `onLine` for every line. */
export async function readLines(
  stream: ReadableStream<Uint8Array>,
  onLine: (line: string) => void,
): Promise<void> {
  const reader = stream.getReader();
  const buffer = new LineBuffer();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      for (const line of buffer.feed(value)) onLine(line);
    }
    const rest = buffer.flush();
    if (rest !== null) onLine(rest);
  } finally {
    reader.releaseLock();
  }
}
