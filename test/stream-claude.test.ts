import { describe, expect, it } from "vitest";

import { StreamDecodeError } from "../src/core/errors.js";
import { ClaudeParser } from "../src/core/stream/claude.js";
import { extractToolInput } from "../src/core/stream/tool-input.js";

function line(value: unknown): string {
  return JSON.stringify(value);
}

function assistant(content: unknown[]): string {
  return line({ type: "assistant", message: { role: "assistant", content } });
}

function toolResult(block: Record<string, unknown>): string {
  return line({ type: "user", message: { role: "user", content: [{ type: "tool_result", ...block }] } });
}

describe("ClaudeParser", () => {
  it("emits text and tool starts from an assistant message in block order", () => {
    const events = new ClaudeParser().parse(
      assistant([
        { type: "text", text: "Reading the entry point." },
        { type: "tool_use", id: "toolu_1", name: "Read", input: { file_path: "/test.go" } }
      ])
    );

    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({ type: "text", text: "Reading the entry point." });
    expect(events[1]).toMatchObject({
      type: "tool_start",
      toolName: "Read",
      toolId: "toolu_1",
      toolInput: "/test.go"
    });
  });

  it("skips empty text blocks and non-tool blocks", () => {
    const events = new ClaudeParser().parse(
      assistant([
        { type: "text", text: "" },
        { type: "thinking", thinking: "hmm" }
      ])
    );
    expect(events).toEqual([]);
  });

  it("truncates successful tool output to 100 characters", () => {
    const [event] = new ClaudeParser().parse(toolResult({ tool_use_id: "toolu_1", content: "x".repeat(150) }));
    expect(event).toMatchObject({ type: "tool_end", toolId: "toolu_1", toolError: "" });
    expect(event?.type === "tool_end" ? event.toolOutput : "").toBe(`${"x".repeat(97)}...`);
  });

  it("joins array tool_result content", () => {
    const [event] = new ClaudeParser().parse(
      toolResult({
        tool_use_id: "toolu_2",
        content: [
          { type: "text", text: "first" },
          { type: "image" },
          { type: "text", text: "second" }
        ]
      })
    );
    expect(event).toMatchObject({ type: "tool_end", toolOutput: "first\nsecond" });
  });

  it("reports failed tool results as tool errors", () => {
    const [event] = new ClaudeParser().parse(
      toolResult({ tool_use_id: "toolu_3", is_error: true, content: "File does not exist." })
    );
    expect(event).toMatchObject({ type: "tool_end", toolId: "toolu_3", toolOutput: "", toolError: "File does not exist." });
  });

  it("prefers the error field over content for failed tool results", () => {
    const [event] = new ClaudeParser().parse(
      toolResult({ tool_use_id: "toolu_3", is_error: true, error: "Permission denied", content: "partial output" })
    );
    expect(event).toMatchObject({ type: "tool_end", toolId: "toolu_3", toolOutput: "", toolError: "Permission denied" });
  });

  it("tracks the cost delta between cumulative results", () => {
    const parser = new ClaudeParser();
    const [first] = parser.parse(line({ type: "result", subtype: "success", result: "done", total_cost_usd: 0.01 }));
    const [second] = parser.parse(line({ type: "result", subtype: "success", result: "done", total_cost_usd: 0.03 }));

    expect(first?.type).toBe("result");
    expect(second?.type).toBe("result");
    if (first?.type !== "result" || second?.type !== "result") return;
    expect(first.costDelta).toBeCloseTo(0.01);
    expect(second.costDelta).toBeCloseTo(0.02);
    expect(second.cost).toBeCloseTo(0.03);
    expect(second.isComplete).toBe(true);
    expect(second.result).toBe("done");
  });

  it("maps result token usage", () => {
    const [event] = new ClaudeParser().parse(
      line({
        type: "result",
        total_cost_usd: 0.2,
        usage: {
          input_tokens: 1_200,
          output_tokens: 300,
          cache_read_input_tokens: 800,
          cache_creation_input_tokens: 50
        }
      })
    );
    expect(event).toMatchObject({
      type: "result",
      usage: { inputTokens: 1_200, outputTokens: 300, cacheReadTokens: 800, cacheWriteTokens: 50 }
    });
  });

  it("turns system messages into session progress", () => {
    const [event] = new ClaudeParser().parse(line({ type: "system", subtype: "init", session_id: "sess-1" }));
    expect(event).toMatchObject({ type: "progress", text: "session: sess-1" });
  });

  it("reports unknown message types without failing", () => {
    const events = new ClaudeParser().parse(line({ type: "stream_event" }));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "unknown", text: "unknown message type: stream_event" });
  });

  it("renders TodoWrite as a todo list instead of a tool call", () => {
    const parser = new ClaudeParser();
    const [event] = parser.parse(
      assistant([
        {
          type: "tool_use",
          id: "toolu_4",
          name: "TodoWrite",
          input: {
            todos: [
              { id: "1", content: "Write tests", status: "completed", priority: "high" },
              { id: "2", content: "Ship it", status: "in_progress" },
              { id: "3", content: "Docs", status: "blocked" }
            ]
          }
        }
      ])
    );

    expect(event).toMatchObject({
      type: "todo",
      items: [
        { id: "1", content: "Write tests", status: "completed", priority: "high" },
        { id: "2", content: "Ship it", status: "in_progress" },
        { id: "3", content: "Docs", status: "pending" }
      ]
    });
    expect(parser.parse(assistant([{ type: "tool_use", id: "t", name: "TodoWrite", input: { todos: [] } }]))).toEqual([]);
  });

  it("falls back to a tool start when TodoWrite has no todos array", () => {
    const [event] = new ClaudeParser().parse(assistant([{ type: "tool_use", id: "t5", name: "TodoWrite", input: {} }]));
    expect(event).toMatchObject({ type: "tool_start", toolName: "TodoWrite", toolId: "t5", toolInput: "" });
  });

  it("rejects lines that are not JSON objects", () => {
    const parser = new ClaudeParser();
    expect(() => parser.parse("not json")).toThrow(StreamDecodeError);
    expect(() => parser.parse("[1,2]")).toThrow("json parse: expected an object");
  });

  it("rejects known message types with an unexpected shape", () => {
    expect(() => new ClaudeParser().parse(line({ type: "assistant", message: { content: 42 } }))).toThrow(
      /^invalid assistant message at message\.content/
    );
  });
});

describe("Claude tool input summaries", () => {
  it("summarizes file tools by path", () => {
    expect(extractToolInput("Edit", { file_path: "/src/main.ts", old_string: "a" })).toBe("/src/main.ts");
    expect(extractToolInput("MultiEdit", { file_path: "/src/util.ts" })).toBe("/src/util.ts");
    expect(extractToolInput("NotebookEdit", { notebook_path: "/nb/analysis.ipynb" })).toBe("/nb/analysis.ipynb");
  });

  it("truncates commands, patterns and queries", () => {
    expect(extractToolInput("Bash", { command: "a".repeat(70) })).toBe(`${"a".repeat(57)}...`);
    expect(extractToolInput("Bash", { description: "List files" })).toBe("List files");
    expect(extractToolInput("Grep", { pattern: "TODO" })).toBe("TODO");
    expect(extractToolInput("Task", { description: "d".repeat(45) })).toBe(`${"d".repeat(37)}...`);
    expect(extractToolInput("WebSearch", { query: "vitest config" })).toBe("vitest config");
    expect(extractToolInput("WebFetch", { url: "https://example.com/docs" })).toBe("https://example.com/docs");
  });

  it("returns an empty summary for unknown tools or malformed input", () => {
    expect(extractToolInput("Mystery", { file_path: "/x" })).toBe("");
    expect(extractToolInput("Read", "not an object")).toBe("");
    expect(extractToolInput("Read", { file_path: 42 })).toBe("");
  });
});
