import { ConfigError } from "../core/errors.js";
import { normalizeAgentName } from "../core/stream/agents.js";
import { outputFlags, textModeFlags } from "../core/stream/registry.js";
import type { FlagsCommandOptions } from "../core/types.js";
import type { OutputWriter } from "../core/stream/formatter.js";

export function resolveAgentFlags(agentCommand: string, options: FlagsCommandOptions = {}): readonly string[] {
  const flags = options.text ? textModeFlags(agentCommand) : outputFlags(agentCommand);
  if (!flags) {
    const mode = options.text ? "text-mode" : "structured output";
    throw new ConfigError(
      `Agent "${normalizeAgentName(agentCommand)}" has no ${mode} flags. Expected "claude", "codex" or "amp".`
    );
  }
  return flags;
}

/** Prints the agent's flag set one per line. */
export function runFlags(
  agentCommand: string,
  options: FlagsCommandOptions,
  write: OutputWriter = (chunk) => void process.stdout.write(chunk)
): void {
  const flags = resolveAgentFlags(agentCommand, options);
  write(flags.map((flag) => `${flag}\n`).join(""));
}
