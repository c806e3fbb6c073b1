import { StringDecoder } from "node:string_decoder";
import { logger } from "../../config/logger.js";
import type { StreamName } from "./runnerTypes.js";

/**
 * Destination for captured process output. Every call carries exactly one
 * complete line without its terminator.
 */
export interface StreamSink {
  writeLine(stream: StreamName, line: string): void;
}

export interface CapturedLine {
  readonly stream: StreamName;
  readonly line: string;
}

export interface BufferSink extends StreamSink {
  readonly lines: readonly CapturedLine[];
  text(stream?: StreamName): string;
}

/**
 * Incremental UTF-8 line splitter. Invalid byte sequences decode to U+FFFD.
 */
export class LineSplitter {
  private readonly decoder = new StringDecoder("utf8");
  private pending = "";

  push(chunk: Buffer | string): readonly string[] {
    this.pending += typeof chunk === "string" ? chunk : this.decoder.write(chunk);
    const parts = this.pending.split("\n");
    this.pending = parts.pop() ?? "";
    return parts.map(stripCarriageReturn);
  }

  flush(): readonly string[] {
    const rest = this.pending + this.decoder.end();
    this.pending = "";
    if (rest.length === 0) return [];
    return this.push(rest + "\n");
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

export function createBufferSink(): BufferSink {
  const lines: CapturedLine[] = [];

  return {
    lines,
    writeLine(stream, line) {
      lines.push({ stream, line });
    },
    text(stream) {
      return lines
        .filter((entry) => stream === undefined || entry.stream === stream)
        .map((entry) => entry.line)
        .join("\n");
    },
  };
}

export function createLoggerSink(bindings: Record<string, unknown> = {}): StreamSink {
  const child = logger.child(bindings);

  return {
    writeLine(stream, line) {
      child.info({ stream }, line);
    },
  };
}

export function createWritableSink(target: NodeJS.WritableStream, prefix = ""): StreamSink {
  return {
    writeLine(_stream, line) {
      target.write(`${prefix}${line}\n`);
    },
  };
}

export function createTeeSink(...sinks: readonly StreamSink[]): StreamSink {
  return {
    writeLine(stream, line) {
      for (const sink of sinks) {
        sink.writeLine(stream, line);
      }
    },
  };
}
