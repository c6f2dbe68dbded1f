import { join } from "node:path";

import { AGENT_AMP, AGENT_CLAUDE, AGENT_CODEX, normalizeAgentName } from "./agents.js";
import { AmpParser } from "./amp.js";
import { ClaudeParser } from "./claude.js";
import { CodexParser } from "./codex.js";
import type { StreamParser } from "./parser.js";

const STRUCTURED_OUTPUT_FLAGS: Record<string, readonly string[]> = {
  [AGENT_CLAUDE]: ["--output-format", "stream-json", "--verbose"],
  [AGENT_AMP]: ["--stream-json", "--dangerously-allow-all"],
  [AGENT_CODEX]: ["--json", "--full-auto"]
};

// Text mode drops JSON streaming but keeps each agent's autonomy flag.
const TEXT_MODE_FLAGS: Record<string, readonly string[]> = {
  [AGENT_CLAUDE]: ["--output-format", "text"],
  [AGENT_CODEX]: ["--full-auto"],
  [AGENT_AMP]: ["--dangerously-allow-all"]
};

const CODEX_OUTPUT_FILE = "codex_output.txt";

export interface OutputCapture {
  /** Path the agent writes its final message to instead of stdout. */
  file: string;
}

/** Returns a fresh parser for the agent, or null when it has no structured output dialect. */
export function parserFor(agentCommand: string): StreamParser | null {
  switch (normalizeAgentName(agentCommand)) {
    case AGENT_CLAUDE:
      return new ClaudeParser();
    case AGENT_CODEX:
      return new CodexParser();
    case AGENT_AMP:
      return new AmpParser();
    default:
      return null;
  }
}

export function outputFlags(agentCommand: string): readonly string[] | null {
  return STRUCTURED_OUTPUT_FLAGS[normalizeAgentName(agentCommand)] ?? null;
}

export function textModeFlags(agentCommand: string): readonly string[] | null {
  return TEXT_MODE_FLAGS[normalizeAgentName(agentCommand)] ?? null;
}

export function outputCaptureFor(agentCommand: string, baseDir: string): OutputCapture | null {
  if (normalizeAgentName(agentCommand) !== AGENT_CODEX) return null;
  return { file: join(baseDir, CODEX_OUTPUT_FILE) };
}
