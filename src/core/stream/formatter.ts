import { DEFAULT_MAX_OUTPUT_CHARS, DEFAULT_MAX_OUTPUT_LINES, defaultFormatterConfig, type FormatterConfig } from "../config.js";
import {
  countLinesChars,
  formatClock,
  formatPercent,
  formatRunDuration,
  formatTokenCount,
  formatToolDuration,
  truncateInput
} from "./text.js";
import {
  isErrorEvent,
  type AgentEvent,
  type ResultEvent,
  type TodoItem,
  type ToolEndEvent,
  type ToolStartEvent
} from "./types.js";

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  red: "\u001B[31m",
  green: "\u001B[32m",
  yellow: "\u001B[33m",
  cyan: "\u001B[36m",
  white: "\u001B[37m"
} as const;

const ICON = {
  toolStart: "⏺",
  success: "✅",
  error: "❌",
  continuation: "⎿",
  todoDone: "✅",
  todoActive: "🔄",
  todoPending: "⏸️",
  todoList: "📋",
  progress: "📊"
} as const;

const TOOL_INPUT_DISPLAY_CHARS = 80;
const TODO_CONTENT_DISPLAY_CHARS = 70;

type Style = (text: string) => string;

export type OutputWriter = (chunk: string) => void;

export interface StreamFormatterOptions {
  /** Clock in epoch milliseconds. */
  now?: (() => number) | undefined;
}

interface PendingTool {
  event: ToolStartEvent;
  startedAt: number;
}

export interface FormatterStats {
  toolCount: number;
  errorCount: number;
  startedAt: Date;
}

/**
 * Renders agent events as a live terminal transcript. Tool starts are kept
 * until their matching end arrives so results can name the tool they belong to
 * and, in verbose mode, how long it ran. Each event is written with a single
 * call to the output writer, so concurrent writers never split an event.
 */
export class StreamFormatter {
  readonly config: FormatterConfig;
  private readonly write: OutputWriter;
  private readonly now: () => number;
  private readonly pendingTools = new Map<string, PendingTool>();
  private readonly startedAt: number;
  private toolCount = 0;
  private errorCount = 0;

  constructor(write: OutputWriter, config: Partial<FormatterConfig> = {}, options: StreamFormatterOptions = {}) {
    const merged = { ...defaultFormatterConfig(config.agentName ?? ""), ...config };
    this.config = {
      ...merged,
      maxOutputLines: merged.maxOutputLines > 0 ? merged.maxOutputLines : DEFAULT_MAX_OUTPUT_LINES,
      maxOutputChars: merged.maxOutputChars > 0 ? merged.maxOutputChars : DEFAULT_MAX_OUTPUT_CHARS
    };
    this.write = write;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  formatEvent(event: AgentEvent | null | undefined): void {
    if (!event) return;

    switch (event.type) {
      case "tool_start":
        this.toolCount += 1;
        if (event.toolId) {
          this.pendingTools.set(event.toolId, { event, startedAt: this.now() });
        }
        this.displayToolStart(event);
        return;
      case "tool_end": {
        const pending = event.toolId ? this.pendingTools.get(event.toolId) : undefined;
        if (pending) this.pendingTools.delete(event.toolId);
        if (isErrorEvent(event)) this.errorCount += 1;
        this.displayToolResult(pending, event);
        return;
      }
      case "text":
        if (this.config.showText && event.text) this.displayText(event.text);
        return;
      case "result":
        this.displayCompletion(event);
        return;
      case "todo":
        this.displayTodo(event.items);
        return;
      case "progress":
      case "unknown":
        if (this.config.showProgress) this.displayProgress(event.text);
        return;
    }
  }

  stats(): FormatterStats {
    return { toolCount: this.toolCount, errorCount: this.errorCount, startedAt: new Date(this.startedAt) };
  }

  /** Ids of tool calls still waiting for their result. */
  pendingToolIds(): string[] {
    return [...this.pendingTools.keys()];
  }

  private displayToolStart(event: ToolStartEvent): void {
    let text = this.timestampPrefix();
    text += this.cyan(this.config.useEmoji ? `${ICON.toolStart} ` : "> ");
    text += this.yellow(event.toolName);
    if (event.toolInput) {
      text += this.dim("(");
      text += this.white(truncateInput(event.toolInput, TOOL_INPUT_DISPLAY_CHARS));
      text += this.dim(")");
    }
    this.write(`${text}\n`);
  }

  private displayToolResult(pending: PendingTool | undefined, event: ToolEndEvent): void {
    const isError = isErrorEvent(event);
    const output = isError ? event.toolError : event.toolOutput;
    if (!isError && !output && !this.config.verbose) return;

    let text = this.timestampPrefix();
    if (isError) {
      text += this.red(this.config.useEmoji ? `${ICON.error} ` : "[ERR] ");
      text += this.red("Error");
    } else {
      text += this.green(this.config.useEmoji ? `${ICON.success} ` : "[OK] ");
      text += this.green("Result");
    }

    if (pending?.event.toolName) {
      text += this.dim(` ← ${pending.event.toolName}`);
    }
    if (output) {
      const { lines, chars } = countLinesChars(output);
      text += this.dim(` (${lines} lines, ${chars} chars)`);
    }
    if (this.config.verbose && pending) {
      const elapsedMs = this.now() - pending.startedAt;
      if (elapsedMs > 0) text += this.dim(` [${formatToolDuration(elapsedMs)}]`);
    }
    text += "\n";

    if (output) {
      text += this.truncatedOutput(output, isError ? (value) => this.red(value) : (value) => this.dim(value));
    }
    this.write(text);
  }

  private displayText(value: string): void {
    let text = "";
    for (const line of value.split("\n")) {
      text += `${this.timestampPrefix()}${this.white(line)}\n`;
    }
    this.write(text);
  }

  private displayCompletion(event: ResultEvent): void {
    const elapsedMs = this.now() - this.startedAt;
    const failed = isErrorEvent(event);

    let text = this.timestampPrefix();
    if (failed) {
      text += this.red(this.config.useEmoji ? `${ICON.error} ` : "[ERR] ");
      text += this.red("Failed");
    } else {
      text += this.green(this.config.useEmoji ? `${ICON.success} ` : "[OK] ");
      text += this.green("Complete");
    }

    const stats: string[] = [];
    if (event.cost > 0) {
      stats.push(`cost: $${event.cost.toFixed(2)}`);
    }
    const { usage } = event;
    if (usage.inputTokens > 0 || usage.outputTokens > 0) {
      let tokens = `tokens: ${formatTokenCount(usage.inputTokens)} in`;
      if (usage.cacheReadTokens > 0) {
        tokens += ` (${formatTokenCount(usage.cacheReadTokens)} cached)`;
      }
      tokens += ` / ${formatTokenCount(usage.outputTokens)} out`;
      stats.push(tokens);
    }
    stats.push(`tools: ${this.toolCount}`);
    stats.push(`errors: ${this.errorCount}`);
    stats.push(`time: ${formatRunDuration(elapsedMs)}`);

    text += this.dim(` (${stats.join(", ")})`);
    text += "\n";
    if (failed) {
      text += this.truncatedOutput(event.toolError, (value) => this.red(value));
    }
    this.write(text);
  }

  private displayTodo(items: TodoItem[]): void {
    if (items.length === 0) return;

    let text = "";
    if (this.config.useEmoji) text += this.cyan(`${ICON.todoList} `);
    text += `${this.cyan("Todo List")}\n`;

    let completed = 0;
    let inProgress = 0;
    let pending = 0;
    for (const item of items) {
      let icon: string = ICON.todoPending;
      let marker = "[ ] ";
      let style: Style = (value) => this.dim(value);
      if (item.status === "completed") {
        icon = ICON.todoDone;
        marker = "[x] ";
        style = (value) => this.green(value);
        completed += 1;
      } else if (item.status === "in_progress") {
        icon = ICON.todoActive;
        marker = "[>] ";
        style = (value) => this.yellow(value);
        inProgress += 1;
      } else {
        pending += 1;
      }

      text += "  ";
      text += this.config.useEmoji ? `${icon} ` : marker;
      text += style(truncateInput(item.content, TODO_CONTENT_DISPLAY_CHARS));
      if (item.priority && item.priority !== "medium") {
        text += this.dim(` [${item.priority}]`);
      }
      if (item.status === "in_progress") {
        text += this.yellow(" ← ACTIVE");
      }
      text += "\n";
    }

    const total = items.length;
    const label = this.config.useEmoji ? `${ICON.progress} Progress` : "Progress";
    const summary = `${completed}/${total} (${formatPercent(completed, total)}) | ${inProgress} active, ${pending} pending`;
    text += `\n${this.dim(`  ${label}: ${summary}`)}\n`;
    this.write(text);
  }

  private displayProgress(value: string): void {
    this.write(`${this.timestampPrefix()}${this.dim(value)}\n`);
  }

  private truncatedOutput(output: string, style: Style): string {
    const lines = output.split("\n").filter((line) => line.trim().length > 0);
    if (lines.length === 0) return "";

    const marker = this.dim(this.config.useEmoji ? `${ICON.continuation}  ` : "|  ");
    const shown = lines.slice(0, this.config.maxOutputLines);
    let text = "";
    shown.forEach((line, index) => {
      const clipped = truncateInput(line, this.config.maxOutputChars);
      text += index === 0 ? `  ${marker}${style(clipped)}\n` : `      ${this.dim(clipped)}\n`;
    });

    const remaining = lines.length - shown.length;
    if (remaining > 0) {
      text += `  ${marker}${this.dim(`+${remaining} more lines`)}\n`;
    }
    return text;
  }

  private timestampPrefix(): string {
    if (!this.config.showTimestamp) return "";
    return this.dim(`[${formatClock(new Date(this.now()))}] `);
  }

  private paint(text: string, ...codes: string[]): string {
    if (!this.config.useColor || text.length === 0) return text;
    return `${codes.join("")}${text}${ANSI.reset}`;
  }

  private cyan(text: string): string {
    return this.paint(text, ANSI.cyan);
  }

  private yellow(text: string): string {
    return this.paint(text, ANSI.yellow);
  }

  private green(text: string): string {
    return this.paint(text, ANSI.green);
  }

  private red(text: string): string {
    return this.paint(text, ANSI.bold, ANSI.red);
  }

  private white(text: string): string {
    return this.paint(text, ANSI.white);
  }

  private dim(text: string): string {
    return this.paint(text, ANSI.dim);
  }
}
