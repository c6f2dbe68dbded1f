import { describe, expect, it, vi } from "vitest";

import { ExecutionError } from "../src/core/errors.js";
import { ClaudeParser } from "../src/core/stream/claude.js";
import { StreamFormatter } from "../src/core/stream/formatter.js";
import { StreamProcessor, createStreamProcessor, type EventSink } from "../src/core/stream/processor.js";
import type { AgentEvent } from "../src/core/stream/types.js";

const SYSTEM_LINE = JSON.stringify({ type: "system", subtype: "init", session_id: "sess-1" });

function textLine(text: string): string {
  return JSON.stringify({ type: "assistant", message: { content: [{ type: "text", text }] } });
}

function recordingSink(): EventSink & { events: AgentEvent[] } {
  const events: AgentEvent[] = [];
  return {
    events,
    formatEvent(event) {
      events.push(event);
    }
  };
}

describe("StreamProcessor", () => {
  it("renders a Claude session end to end", async () => {
    const chunks: string[] = [];
    const formatter = new StreamFormatter((chunk) => chunks.push(chunk), { useColor: false }, { now: () => 0 });
    const processor = createStreamProcessor("claude", formatter);
    expect(processor).not.toBeNull();
    if (!processor) return;

    const lines = [
      JSON.stringify({
        type: "assistant",
        message: { content: [{ type: "tool_use", id: "toolu_1", name: "Read", input: { file_path: "/test.go" } }] }
      }),
      JSON.stringify({
        type: "user",
        message: { content: [{ type: "tool_result", tool_use_id: "toolu_1", content: "package main" }] }
      }),
      JSON.stringify({ type: "result", subtype: "success", result: "done", total_cost_usd: 0.05 })
    ];
    await processor.write(`${lines.join("\n")}\n`);
    await processor.close();

    expect(chunks.join("")).toBe(
      [
        "⏺ Read(/test.go)",
        "✅ Result ← Read (1 lines, 12 chars)",
        "  ⎿  package main",
        "✅ Complete (cost: $0.05, tools: 1, errors: 0, time: 0s)",
        ""
      ].join("\n")
    );
    expect(processor.stats()).toEqual({ events: 3, errors: 0 });
  });

  it("reassembles lines split across writes, including multi-byte characters", async () => {
    const sink = recordingSink();
    const processor = new StreamProcessor(new ClaudeParser(), sink);
    const bytes = Buffer.from(`${textLine("héllo ✓")}\n${SYSTEM_LINE}\n`, "utf8");

    for (let offset = 0; offset < bytes.length; offset += 3) {
      await processor.write(bytes.subarray(offset, offset + 3));
    }
    await processor.close();

    expect(sink.events).toMatchObject([
      { type: "text", text: "héllo ✓" },
      { type: "progress", text: "session: sess-1" }
    ]);
  });

  it("processes a final line without a trailing newline on close", async () => {
    const sink = recordingSink();
    const processor = new StreamProcessor(new ClaudeParser(), sink);
    await processor.write(SYSTEM_LINE);
    expect(sink.events).toEqual([]);
    await processor.close();
    expect(sink.events).toHaveLength(1);
  });

  it("decodes lines far larger than a pipe buffer", async () => {
    const sink = recordingSink();
    const processor = new StreamProcessor(new ClaudeParser(), sink);
    const text = "a".repeat(2_000_000);
    await processor.write(`${textLine(text)}\n`);
    await processor.close();

    expect(sink.events).toHaveLength(1);
    const [event] = sink.events;
    expect(event?.type === "text" ? event.text.length : 0).toBe(2_000_000);
  });

  it("counts valid events and malformed lines separately", async () => {
    const sink = recordingSink();
    const debugLog = vi.fn();
    const processor = new StreamProcessor(new ClaudeParser(), sink, { debugLog });

    await processor.write(`${textLine("one")}\nnot json\n\n   \n${textLine("two")}\n{broken\n${SYSTEM_LINE}\n`);
    await processor.close();

    expect(processor.stats()).toEqual({ events: 3, errors: 2 });
    expect(sink.events.map((event) => event.type)).toEqual(["text", "text", "progress"]);
    expect(debugLog).toHaveBeenCalledWith("invalid JSON: not json");
    expect(debugLog).toHaveBeenCalledWith("invalid JSON: {broken");
  });

  it("counts known messages with an unexpected shape as errors", async () => {
    const sink = recordingSink();
    const debugLog = vi.fn();
    const processor = new StreamProcessor(new ClaudeParser(), sink, { debugLog });
    const badLine = JSON.stringify({ type: "assistant", message: { content: 42 } });

    await processor.write(`${badLine}\n[1,2]\n`);
    await processor.close();

    expect(processor.stats()).toEqual({ events: 0, errors: 2 });
    expect(debugLog).toHaveBeenCalledTimes(2);
    expect(String(debugLog.mock.calls[0]?.[0])).toMatch(/^parse error: invalid assistant message at message\.content/);
    expect(debugLog).toHaveBeenLastCalledWith("parse error: json parse: expected an object (raw: [1,2])");
  });

  it("reports unknown events to the debug logger", async () => {
    const debugLog = vi.fn();
    const processor = new StreamProcessor(new ClaudeParser(), recordingSink(), { debugLog });
    await processor.write(`${JSON.stringify({ type: "mystery" })}\n`);
    await processor.close();

    expect(debugLog).toHaveBeenCalledWith("Unknown: unknown message type: mystery");
    expect(processor.stats()).toEqual({ events: 1, errors: 0 });
  });

  it("tees every non-empty trimmed line to the raw log", async () => {
    const written: string[] = [];
    const processor = new StreamProcessor(new ClaudeParser(), recordingSink(), {
      rawLog: { write: (chunk) => void written.push(chunk) }
    });

    await processor.write(`  ${SYSTEM_LINE}  \n\nnot json\n`);
    await processor.close();

    expect(written).toEqual([`${SYSTEM_LINE}\n`, "not json\n"]);
  });

  it("keeps decoding when the raw log fails", async () => {
    const sink = recordingSink();
    const debugLog = vi.fn();
    const processor = new StreamProcessor(new ClaudeParser(), sink, {
      debugLog,
      rawLog: {
        write: () => Promise.reject(new Error("disk full"))
      }
    });

    await processor.write(`${SYSTEM_LINE}\n`);
    await processor.close();

    expect(sink.events).toHaveLength(1);
    expect(processor.stats()).toEqual({ events: 1, errors: 1 });
    expect(debugLog).toHaveBeenCalledWith("raw log write error: disk full");
  });

  it("tracks the last activity time", async () => {
    const processor = new StreamProcessor(new ClaudeParser(), recordingSink());
    expect(processor.lastActivity()).toBeNull();

    await processor.write(`${SYSTEM_LINE}\n`);
    await processor.close();
    expect(processor.lastActivity()).toBeInstanceOf(Date);
  });

  it("closes idempotently and rejects writes after close", async () => {
    const processor = new StreamProcessor(new ClaudeParser(), recordingSink());
    await processor.write(`${SYSTEM_LINE}\n`);

    await processor.close();
    await processor.close();

    await expect(processor.write(`${SYSTEM_LINE}\n`)).rejects.toBeInstanceOf(ExecutionError);
    expect(processor.stats()).toEqual({ events: 1, errors: 0 });
    expect(processor.lastError).toBeNull();
  });

  it("holds writers back while the decoder is busy", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolveGate) => {
      release = resolveGate;
    });
    let rawWrites = 0;
    const processor = new StreamProcessor(new ClaudeParser(), recordingSink(), {
      rawLog: {
        write: () => {
          rawWrites += 1;
          return gate;
        }
      }
    });

    await processor.write(`${SYSTEM_LINE}\n`);
    await vi.waitFor(() => expect(rawWrites).toBe(1));

    let settled = false;
    const pending = processor.write(`${SYSTEM_LINE}\n`.repeat(4_000)).then(() => {
      settled = true;
    });
    await new Promise((resolveTimer) => setTimeout(resolveTimer, 20));
    expect(settled).toBe(false);

    release();
    await pending;
    await processor.close();
    expect(settled).toBe(true);
    expect(processor.stats()).toEqual({ events: 4_001, errors: 0 });
  });

  it("keeps decoding when the formatter throws", async () => {
    const debugLog = vi.fn();
    const processor = new StreamProcessor(
      new ClaudeParser(),
      {
        formatEvent: () => {
          throw new Error("terminal gone");
        }
      },
      { debugLog }
    );

    const first = processor.write(`${SYSTEM_LINE}\n`.repeat(5_000));
    const second = processor.write(`${SYSTEM_LINE}\n`.repeat(5_000));
    await Promise.all([first, second]);
    await processor.close();

    expect(processor.stats()).toEqual({ events: 10_000, errors: 10_000 });
    expect(processor.lastError).toBeNull();
    expect(debugLog).toHaveBeenCalledWith("format error: terminal gone");
  });

  it("releases in-flight writes and drops later ones when the decoder stops", async () => {
    const failure = new Error("log sink closed");
    let debugCalls = 0;
    const processor = new StreamProcessor(
      new ClaudeParser(),
      {
        formatEvent: () => {
          throw new Error("terminal gone");
        }
      },
      {
        debugLog: () => {
          debugCalls += 1;
          if (debugCalls === 1) throw failure;
        }
      }
    );

    const first = processor.write(`${SYSTEM_LINE}\n`.repeat(5_000));
    const second = processor.write(`${SYSTEM_LINE}\n`.repeat(5_000));
    await Promise.all([first, second]);

    await processor.write(`${SYSTEM_LINE}\n`);
    await processor.close();

    expect(processor.lastError).toBe(failure);
    expect(processor.stats()).toEqual({ events: 1, errors: 2 });
  });

  it("returns no processor for agents without structured output", () => {
    expect(createStreamProcessor("gemini", recordingSink())).toBeNull();
    expect(createStreamProcessor("/usr/local/bin/codex", recordingSink())?.parser.name).toBe("codex");
  });
});
