import { PassThrough } from "node:stream";

import { ExecutionError, describeError } from "../errors.js";
import type { StreamParser } from "./parser.js";
import type { RawLogSink } from "./raw-log.js";
import { outputFlags, parserFor } from "./registry.js";
import { truncate } from "./text.js";
import { eventTypeLabel, type AgentEvent } from "./types.js";

const PIPE_HIGH_WATER_MARK_BYTES = 64 * 1024;
const DEBUG_PREVIEW_CHARS = 100;

export type DebugLogger = (message: string) => void;

/** Consumer of decoded events, normally a StreamFormatter. */
export interface EventSink {
  formatEvent(event: AgentEvent): void;
}

export interface StreamProcessorOptions {
  debugLog?: DebugLogger | undefined;
  rawLog?: RawLogSink | undefined;
}

export interface StreamStats {
  events: number;
  errors: number;
}

/**
 * Decodes an agent's NDJSON stdout in the background and hands every event to
 * the formatter in arrival order.
 *
 * Bytes go in through {@link StreamProcessor.write}; a single decode task reads
 * them back out of an in-process pipe and splits on newlines without any line
 * length limit. The pipe buffer is bounded, so `write` stays pending while the
 * decoder is behind. {@link StreamProcessor.close} ends the input and resolves
 * once everything written before it has been rendered.
 */
export class StreamProcessor {
  readonly parser: StreamParser;
  private readonly formatter: EventSink;
  private readonly pipe: PassThrough;
  private readonly debugLog: DebugLogger | undefined;
  private readonly rawLog: RawLogSink | undefined;
  private readonly done: Promise<void>;
  private readonly pendingWrites = new Set<() => void>();
  private closed = false;
  private stopped = false;
  private eventCount = 0;
  private errorCount = 0;
  private lastActivityAt: Date | null = null;
  private readerError: unknown = null;

  constructor(parser: StreamParser, formatter: EventSink, options: StreamProcessorOptions = {}) {
    this.parser = parser;
    this.formatter = formatter;
    this.debugLog = options.debugLog;
    this.rawLog = options.rawLog;
    this.pipe = new PassThrough({ highWaterMark: PIPE_HIGH_WATER_MARK_BYTES });
    this.pipe.setEncoding("utf8");
    this.done = this.decodeLoop();
  }

  write(chunk: Uint8Array | string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ExecutionError("Cannot write to a closed stream processor."));
    }
    // Dropped once the decoder has stopped.
    if (this.stopped || this.pipe.destroyed) return Promise.resolve();

    return new Promise((resolveWrite) => {
      const settle = (): void => {
        this.pendingWrites.delete(settle);
        resolveWrite();
      };
      this.pendingWrites.add(settle);
      this.pipe.write(chunk, settle);
    });
  }

  /** Ends the input and waits for the decoder to drain. Safe to call repeatedly. */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      if (!this.pipe.destroyed) this.pipe.end();
    }
    return this.done;
  }

  stats(): StreamStats {
    return { events: this.eventCount, errors: this.errorCount };
  }

  /** Time of the most recent non-empty line, or null before the first one. */
  lastActivity(): Date | null {
    return this.lastActivityAt;
  }

  /** The failure that stopped the decode loop early, if any. */
  get lastError(): unknown {
    return this.readerError;
  }

  private debug(message: string): void {
    this.debugLog?.(message);
  }

  private async decodeLoop(): Promise<void> {
    let partial = "";
    try {
      for await (const chunk of this.pipe) {
        const text = typeof chunk === "string" ? chunk : String(chunk);
        let lineStart = 0;
        let newline = text.indexOf("\n");
        while (newline !== -1) {
          const line = partial + text.slice(lineStart, newline);
          partial = "";
          await this.processLine(line);
          lineStart = newline + 1;
          newline = text.indexOf("\n", lineStart);
        }
        partial += text.slice(lineStart);
      }
      if (partial.length > 0) {
        await this.processLine(partial);
      }
    } catch (error) {
      this.errorCount += 1;
      this.readerError = error;
      this.stopped = true;
      // A destroyed Transform never calls back writes it is holding.
      for (const settle of [...this.pendingWrites]) settle();
      if (!this.pipe.destroyed) this.pipe.resume();
      this.debug(`reader error: ${describeError(error)}`);
    }
  }

  private async processLine(rawLine: string): Promise<void> {
    const line = rawLine.trim();
    if (!line) return;

    if (this.rawLog) {
      try {
        await this.rawLog.write(`${line}\n`);
      } catch (error) {
        this.errorCount += 1;
        this.debug(`raw log write error: ${describeError(error)}`);
      }
    }
    this.lastActivityAt = new Date();

    try {
      JSON.parse(line);
    } catch {
      this.errorCount += 1;
      this.debug(`invalid JSON: ${truncate(line, DEBUG_PREVIEW_CHARS)}`);
      return;
    }

    let events: AgentEvent[];
    try {
      events = this.parser.parse(line);
    } catch (error) {
      this.errorCount += 1;
      this.debug(`parse error: ${describeError(error)} (raw: ${truncate(line, DEBUG_PREVIEW_CHARS)})`);
      return;
    }

    for (const event of events) {
      this.eventCount += 1;
      if (event.type === "unknown") this.debug(`${eventTypeLabel(event.type)}: ${event.text}`);
      try {
        this.formatter.formatEvent(event);
      } catch (error) {
        this.errorCount += 1;
        this.debug(`format error: ${describeError(error)}`);
      }
    }
  }
}

/**
 * Builds a processor for the agent command, or returns null when the agent has
 * no structured-output flags or no parser; callers then pass output through raw.
 */
export function createStreamProcessor(
  agentCommand: string,
  formatter: EventSink,
  options: StreamProcessorOptions = {}
): StreamProcessor | null {
  const flags = outputFlags(agentCommand);
  if (!flags || flags.length === 0) return null;

  const parser = parserFor(agentCommand);
  if (!parser) return null;

  return new StreamProcessor(parser, formatter, options);
}
