import { z } from "zod";

import { AGENT_CODEX } from "./agents.js";
import { toTokenUsage, usageSchema } from "./content-blocks.js";
import { decodeJsonObject, decodeMessage, messageType, type StreamParser } from "./parser.js";
import {
  progressEvent,
  resultEvent,
  textEvent,
  todoEvent,
  toolEndEvent,
  toolStartEvent,
  unknownEvent,
  type AgentEvent,
  type TodoItem
} from "./types.js";

const CODEX_SHELL_TOOL_NAME = "Bash";

const todoListEntrySchema = z
  .object({
    text: z.string().nullish(),
    completed: z.boolean().nullish()
  })
  .passthrough();

const itemSchema = z
  .object({
    id: z.string().nullish(),
    type: z.string(),
    command: z.string().nullish(),
    aggregated_output: z.string().nullish(),
    exit_code: z.number().nullish(),
    status: z.string().nullish(),
    text: z.string().nullish(),
    items: z.array(todoListEntrySchema).nullish()
  })
  .passthrough();

const threadStartedSchema = z.object({ thread_id: z.string().nullish() }).passthrough();

const itemMessageSchema = z.object({ item: itemSchema.nullish() }).passthrough();

const turnCompletedSchema = z.object({ usage: usageSchema }).passthrough();

const turnFailedSchema = z
  .object({
    error: z.object({ message: z.string().nullish() }).passthrough().nullish()
  })
  .passthrough();

const errorMessageSchema = z.object({ message: z.string().nullish() }).passthrough();

type CodexItem = z.infer<typeof itemSchema>;

function todoListItems(item: CodexItem): TodoItem[] {
  return (item.items ?? []).map((entry, index): TodoItem => ({
    id: String(index + 1),
    content: entry.text ?? "",
    status: entry.completed ? "completed" : "pending"
  }));
}

/** Parser for `codex exec --json`. */
export class CodexParser implements StreamParser {
  readonly name = AGENT_CODEX;

  parse(line: string): AgentEvent[] {
    const raw = decodeJsonObject(line);
    const now = new Date();
    const type = messageType(raw);

    switch (type) {
      case "thread.started": {
        const message = decodeMessage(threadStartedSchema, raw, line);
        return [progressEvent(`thread: ${message.thread_id ?? ""}`, now)];
      }
      case "turn.started":
        return [];
      case "item.started": {
        const { item } = decodeMessage(itemMessageSchema, raw, line);
        if (!item || item.type !== "command_execution") return [];
        return [toolStartEvent(CODEX_SHELL_TOOL_NAME, item.id ?? "", item.command ?? "", now)];
      }
      case "item.completed": {
        const { item } = decodeMessage(itemMessageSchema, raw, line);
        if (!item) return [];
        return this.parseCompletedItem(item, now);
      }
      case "turn.completed": {
        const message = decodeMessage(turnCompletedSchema, raw, line);
        return [resultEvent({ isComplete: true, usage: toTokenUsage(message.usage) }, now)];
      }
      case "turn.failed": {
        const message = decodeMessage(turnFailedSchema, raw, line);
        const reason = message.error?.message || "turn failed";
        return [resultEvent({ isComplete: true, result: reason, toolError: reason }, now)];
      }
      case "error": {
        const message = decodeMessage(errorMessageSchema, raw, line);
        return [progressEvent(`error: ${message.message ?? ""}`, now)];
      }
      default:
        return [unknownEvent(`unknown message type: ${type}`, now)];
    }
  }

  private parseCompletedItem(item: CodexItem, now: Date): AgentEvent[] {
    switch (item.type) {
      case "command_execution": {
        const output = item.aggregated_output ?? "";
        const exitCode = item.exit_code;
        if (exitCode !== null && exitCode !== undefined && exitCode !== 0) {
          return [toolEndEvent(item.id ?? "", { error: `exit code ${exitCode}: ${output}` }, now)];
        }
        return [toolEndEvent(item.id ?? "", { output }, now)];
      }
      case "reasoning":
      case "agent_message":
        return item.text ? [textEvent(item.text, now)] : [];
      case "todo_list": {
        const items = todoListItems(item);
        return items.length > 0 ? [todoEvent(items, now)] : [];
      }
      default:
        return [unknownEvent(`unknown item type: ${item.type}`, now)];
    }
  }
}
