export const AGENT_CLAUDE = "claude";
export const AGENT_CODEX = "codex";
export const AGENT_AMP = "amp";

export type AgentName = typeof AGENT_CLAUDE | typeof AGENT_CODEX | typeof AGENT_AMP;

export const SUPPORTED_AGENTS: readonly AgentName[] = [AGENT_CLAUDE, AGENT_CODEX, AGENT_AMP];

/** Reduces a command path such as `/usr/local/bin/Claude.exe` to `claude`. */
export function normalizeAgentName(agentCommand: string): string {
  const base = agentCommand.trim().split(/[\\/]/).pop() ?? "";
  const lower = base.toLowerCase();
  return lower.endsWith(".exe") ? lower.slice(0, -".exe".length) : lower;
}

export function isSupportedAgent(name: string): name is AgentName {
  return SUPPORTED_AGENTS.some((agent) => agent === name);
}
