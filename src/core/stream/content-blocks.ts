import { z } from "zod";

import { isJsonObject } from "./parser.js";
import { truncate } from "./text.js";
import {
  textEvent,
  todoEvent,
  toolEndEvent,
  toolStartEvent,
  type AgentEvent,
  type TodoItem,
  type TodoStatus,
  type TokenUsage
} from "./types.js";

// Content-block model shared by the Claude and Amp dialects.

const textPartSchema = z
  .object({
    type: z.string().nullish(),
    text: z.string().nullish()
  })
  .passthrough();

const toolResultContentSchema = z.union([z.string(), z.array(textPartSchema)]).nullish();

const contentBlockSchema = z
  .object({
    type: z.string(),
    id: z.string().nullish(),
    tool_use_id: z.string().nullish(),
    name: z.string().nullish(),
    text: z.string().nullish(),
    content: toolResultContentSchema,
    input: z.unknown(),
    is_error: z.boolean().nullish(),
    error: z.string().nullish()
  })
  .passthrough();

export const conversationMessageSchema = z
  .object({
    type: z.string(),
    message: z
      .object({
        content: z.union([z.string(), z.array(contentBlockSchema)]).nullish()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export const usageSchema = z
  .object({
    input_tokens: z.number().nullish(),
    output_tokens: z.number().nullish(),
    cache_read_input_tokens: z.number().nullish(),
    cache_creation_input_tokens: z.number().nullish(),
    cached_input_tokens: z.number().nullish()
  })
  .passthrough()
  .nullish();

const todoEntrySchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    content: z.string().nullish(),
    subject: z.string().nullish(),
    status: z.string().nullish(),
    priority: z.string().nullish()
  })
  .passthrough();

export type ConversationMessage = z.infer<typeof conversationMessageSchema>;
type ContentBlock = z.infer<typeof contentBlockSchema>;
type ToolResultContent = z.infer<typeof toolResultContentSchema>;

export interface BlockDialect {
  summarizeInput: (toolName: string, input: unknown) => string;
  isTodoTool: (toolName: string) => boolean;
  /** Character cap applied to successful tool output; unset keeps it whole. */
  maxToolOutputChars?: number;
}

function contentBlocks(message: ConversationMessage): ContentBlock[] {
  const content = message.message?.content;
  return Array.isArray(content) ? content : [];
}

export function flattenToolResultContent(content: ToolResultContent): string {
  if (!content) return "";
  if (typeof content === "string") return content;
  return content
    .map((part) => part.text ?? "")
    .filter((text) => text.length > 0)
    .join("\n");
}

export function normalizeTodoStatus(value: string | null | undefined): TodoStatus {
  if (value === "completed" || value === "in_progress") return value;
  return "pending";
}

/** Returns null when the input carries no todos array at all. */
export function parseTodoItems(input: unknown): TodoItem[] | null {
  if (!isJsonObject(input) || !Array.isArray(input.todos)) return null;

  const items: TodoItem[] = [];
  for (const entry of input.todos) {
    const parsed = todoEntrySchema.safeParse(entry);
    if (!parsed.success) continue;
    const todo = parsed.data;
    items.push({
      id: todo.id === null || todo.id === undefined ? "" : String(todo.id),
      content: todo.content || todo.subject || "",
      status: normalizeTodoStatus(todo.status),
      ...(todo.priority ? { priority: todo.priority } : {})
    });
  }
  return items;
}

export function toTokenUsage(usage: z.infer<typeof usageSchema>): TokenUsage {
  return {
    inputTokens: usage?.input_tokens ?? 0,
    outputTokens: usage?.output_tokens ?? 0,
    cacheReadTokens: usage?.cache_read_input_tokens ?? usage?.cached_input_tokens ?? 0,
    cacheWriteTokens: usage?.cache_creation_input_tokens ?? 0
  };
}

export function assistantEvents(message: ConversationMessage, dialect: BlockDialect, now: Date): AgentEvent[] {
  const events: AgentEvent[] = [];
  for (const block of contentBlocks(message)) {
    if (block.type === "text") {
      if (block.text) events.push(textEvent(block.text, now));
      continue;
    }
    if (block.type !== "tool_use") continue;

    const toolName = block.name ?? "";
    if (dialect.isTodoTool(toolName)) {
      const items = parseTodoItems(block.input);
      if (items !== null) {
        if (items.length > 0) events.push(todoEvent(items, now));
        continue;
      }
    }
    events.push(toolStartEvent(toolName, block.id ?? "", dialect.summarizeInput(toolName, block.input), now));
  }
  return events;
}

export function toolResultEvents(message: ConversationMessage, dialect: BlockDialect, now: Date): AgentEvent[] {
  const events: AgentEvent[] = [];
  for (const block of contentBlocks(message)) {
    if (block.type !== "tool_result") continue;

    const toolId = block.tool_use_id ?? "";
    const content = flattenToolResultContent(block.content);
    if (block.is_error) {
      events.push(toolEndEvent(toolId, { error: block.error || content }, now));
      continue;
    }
    const output = dialect.maxToolOutputChars === undefined ? content : truncate(content, dialect.maxToolOutputChars);
    events.push(toolEndEvent(toolId, { output }, now));
  }
  return events;
}
