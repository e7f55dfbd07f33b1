/**
 * Plain-text PPM (P3) output.
 */

import { closeSync, openSync, writeSync } from "fs";
import { formatPixel } from "./color";
import type { Color } from "./vec3";

/** Anything that accepts chunks of text, in order. */
export interface TextSink {
  write(text: string): void;
  close?(): void;
}

// =============================================================================
// Sinks
// =============================================================================

const STDOUT_FD = 1;

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Blocking write of all of `text`. Failures such as EPIPE throw here, in the
 * middle of the render, rather than surfacing later as a stream event.
 */
function writeFully(fd: number, text: string): void {
  const bytes = Buffer.from(text);
  let offset = 0;
  while (offset < bytes.length) {
    try {
      offset += writeSync(fd, bytes, offset);
    } catch (error) {
      // stdout may be a non-blocking pipe that is momentarily full
      if (!isErrno(error, "EAGAIN")) throw error;
    }
  }
}

export function stdoutSink(): TextSink {
  return {
    write: (text) => writeFully(STDOUT_FD, text),
  };
}

/** Writes synchronously to `path`, truncating it first. */
export function fileSink(path: string): TextSink {
  const fd = openSync(path, "w");
  return {
    write: (text) => writeFully(fd, text),
    close: () => closeSync(fd),
  };
}

/** Collects everything written, for tests and in-memory use. */
export class BufferSink implements TextSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    const text = this.toString();
    return text.endsWith("\n") ? text.slice(0, -1).split("\n") : text.split("\n");
  }
}

// =============================================================================
// Writer
// =============================================================================

export class PpmWriter {
  private pending: string[] = [];

  constructor(private sink: TextSink) {}

  header(width: number, height: number): void {
    this.sink.write(`P3\n${width} ${height}\n255\n`);
  }

  /** Queues one pixel; nothing reaches the sink until `flush`. */
  pixel(color: Color): void {
    this.pending.push(formatPixel(color));
  }

  flush(): void {
    if (this.pending.length === 0) return;
    this.sink.write(this.pending.join("\n") + "\n");
    this.pending = [];
  }
}
