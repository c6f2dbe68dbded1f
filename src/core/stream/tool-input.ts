import { getString } from "./parser.js";
import { truncate } from "./text.js";

function firstString(input: unknown, keys: readonly string[], max?: number): string {
  for (const key of keys) {
    const value = getString(input, key);
    if (value) return max === undefined ? value : truncate(value, max);
  }
  return "";
}

/** Summarizes a Claude tool_use input for display. */
export function extractToolInput(name: string, input: unknown): string {
  switch (name) {
    case "Read":
    case "Write":
    case "Edit":
    case "MultiEdit":
      return firstString(input, ["file_path"]);
    case "NotebookEdit":
      return firstString(input, ["notebook_path"]);
    case "Bash":
      return firstString(input, ["command", "description"], 60);
    case "Glob":
    case "Grep":
      return firstString(input, ["pattern"], 40);
    case "Task":
      return firstString(input, ["description"], 40);
    case "WebFetch":
    case "WebSearch":
      return firstString(input, ["url", "query"], 50);
    default:
      return "";
  }
}

/** Amp tool names are snake_case; Claude-style names are accepted too. */
export function extractAmpToolInput(name: string, input: unknown): string {
  switch (name.toLowerCase()) {
    case "read_file":
    case "read":
    case "create_file":
    case "edit_file":
    case "write":
    case "edit":
    case "undo_edit":
      return firstString(input, ["path", "file_path"]);
    case "bash":
    case "shell":
      return firstString(input, ["command"], 60);
    case "grep":
    case "glob":
      return firstString(input, ["pattern", "filePattern"], 40);
    case "search":
    case "web_search":
    case "codebase_search_agent":
      return firstString(input, ["query"], 50);
    case "read_web_page":
      return firstString(input, ["url"], 50);
    case "task":
      return firstString(input, ["description", "prompt"], 40);
    default:
      return "";
  }
}
