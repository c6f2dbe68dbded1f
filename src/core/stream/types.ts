export type EventType = "tool_start" | "tool_end" | "text" | "result" | "progress" | "todo" | "unknown";

export type TodoStatus = "pending" | "in_progress" | "completed";

export interface TodoItem {
  id: string;
  content: string;
  status: TodoStatus;
  priority?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
}

interface EventBase {
  /** When the line carrying this event was decoded. */
  timestamp: Date;
}

export interface ToolStartEvent extends EventBase {
  type: "tool_start";
  toolName: string;
  /** Correlation id shared with the matching tool_end; may be empty. */
  toolId: string;
  /** Short summary of the tool input (file path, command, pattern). */
  toolInput: string;
}

export interface ToolEndEvent extends EventBase {
  type: "tool_end";
  toolId: string;
  toolOutput: string;
  toolError: string;
}

export interface TextEvent extends EventBase {
  type: "text";
  text: string;
}

export interface ResultEvent extends EventBase {
  type: "result";
  result: string;
  isComplete: boolean;
  /** Cumulative session cost in USD. */
  cost: number;
  /** Cost added since the previous result of the same session. */
  costDelta: number;
  usage: TokenUsage;
  /** Set when the run ended in failure. */
  toolError: string;
}

export interface ProgressEvent extends EventBase {
  type: "progress";
  text: string;
}

export interface TodoEvent extends EventBase {
  type: "todo";
  items: TodoItem[];
}

export interface UnknownEvent extends EventBase {
  type: "unknown";
  text: string;
}

export type AgentEvent =
  | ToolStartEvent
  | ToolEndEvent
  | TextEvent
  | ResultEvent
  | ProgressEvent
  | TodoEvent
  | UnknownEvent;

const EVENT_TYPE_LABELS: Record<EventType, string> = {
  tool_start: "ToolStart",
  tool_end: "ToolEnd",
  text: "Text",
  result: "Result",
  progress: "Progress",
  todo: "Todo",
  unknown: "Unknown"
};

export function eventTypeLabel(type: EventType): string {
  return EVENT_TYPE_LABELS[type];
}

export function isErrorEvent(event: AgentEvent): boolean {
  if (event.type !== "tool_end" && event.type !== "result") return false;
  return event.toolError !== "";
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, cacheReadTokens: 0, cacheWriteTokens: 0 };
}

export function toolStartEvent(toolName: string, toolId: string, toolInput: string, timestamp = new Date()): ToolStartEvent {
  return { type: "tool_start", timestamp, toolName, toolId, toolInput };
}

export function toolEndEvent(
  toolId: string,
  outcome: { output?: string; error?: string },
  timestamp = new Date()
): ToolEndEvent {
  return { type: "tool_end", timestamp, toolId, toolOutput: outcome.output ?? "", toolError: outcome.error ?? "" };
}

export function textEvent(text: string, timestamp = new Date()): TextEvent {
  return { type: "text", timestamp, text };
}

export function resultEvent(fields: Partial<Omit<ResultEvent, "type" | "timestamp">>, timestamp = new Date()): ResultEvent {
  return {
    type: "result",
    timestamp,
    result: fields.result ?? "",
    isComplete: fields.isComplete ?? true,
    cost: fields.cost ?? 0,
    costDelta: fields.costDelta ?? 0,
    usage: fields.usage ?? emptyUsage(),
    toolError: fields.toolError ?? ""
  };
}

export function progressEvent(text: string, timestamp = new Date()): ProgressEvent {
  return { type: "progress", timestamp, text };
}

export function todoEvent(items: TodoItem[], timestamp = new Date()): TodoEvent {
  return { type: "todo", timestamp, items };
}

export function unknownEvent(text: string, timestamp = new Date()): UnknownEvent {
  return { type: "unknown", timestamp, text };
}
