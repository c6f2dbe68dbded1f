import { normalizeAgentName } from "./stream/agents.js";
import { ConfigError, UserInputError } from "./errors.js";
import { parserFor } from "./stream/registry.js";
import type { RenderCommandOptions } from "./types.js";

export interface FormatterConfig {
  /** Display name of the agent, e.g. "claude". */
  agentName: string;
  showText: boolean;
  /** Also render progress and unknown events. */
  showProgress: boolean;
  useColor: boolean;
  useEmoji: boolean;
  /** Show empty successful tool results and per-tool durations. */
  verbose: boolean;
  showTimestamp: boolean;
  maxOutputLines: number;
  maxOutputChars: number;
}

export type ColorEnv = Partial<Record<"NO_COLOR" | "FORCE_COLOR" | "TERM", string | undefined>>;

export const DEFAULT_MAX_OUTPUT_LINES = 3;
export const DEFAULT_MAX_OUTPUT_CHARS = 120;
const MIN_MAX_OUTPUT_LINES = 1;
const MAX_MAX_OUTPUT_LINES = 200;
const MIN_MAX_OUTPUT_CHARS = 20;
const MAX_MAX_OUTPUT_CHARS = 2000;

export function defaultColorize(env: ColorEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): boolean {
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") return true;
  return isTTY && env.NO_COLOR === undefined && env.TERM !== "dumb";
}

export function defaultFormatterConfig(agentName: string): FormatterConfig {
  return {
    agentName,
    showText: true,
    showProgress: false,
    useColor: defaultColorize(),
    useEmoji: true,
    verbose: false,
    showTimestamp: false,
    maxOutputLines: DEFAULT_MAX_OUTPUT_LINES,
    maxOutputChars: DEFAULT_MAX_OUTPUT_CHARS
  };
}

function normalizeBoundedInteger(
  flag: string,
  value: number | string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  if (value === undefined) return fallback;
  const parsed =
    typeof value === "number" && Number.isFinite(value)
      ? Math.floor(value)
      : typeof value === "string" && /^\s*\d+\s*$/.test(value)
        ? Number.parseInt(value, 10)
        : Number.NaN;
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new UserInputError(`Invalid ${flag} value "${String(value)}". Expected an integer between ${min} and ${max}.`);
  }
  return Math.min(max, Math.max(min, parsed));
}

export function normalizeAgentCommand(value: string | undefined): string {
  const command = value?.trim() ?? "";
  if (!command) {
    throw new UserInputError('Missing --agent value. Expected "claude", "codex" or "amp".');
  }
  if (!parserFor(command)) {
    throw new ConfigError(
      `Agent "${normalizeAgentName(command)}" has no structured output parser. Expected "claude", "codex" or "amp".`
    );
  }
  return command;
}

export function resolveFormatterConfig(options: RenderCommandOptions, env: ColorEnv = process.env): FormatterConfig {
  const agentCommand = normalizeAgentCommand(options.agent);
  const defaults = defaultFormatterConfig(normalizeAgentName(agentCommand));

  return {
    ...defaults,
    showText: options.text ?? defaults.showText,
    showProgress: options.progress ?? defaults.showProgress,
    useColor: options.color ?? defaultColorize(env),
    useEmoji: options.emoji ?? defaults.useEmoji,
    verbose: options.verbose ?? defaults.verbose,
    showTimestamp: options.timestamps ?? defaults.showTimestamp,
    maxOutputLines: normalizeBoundedInteger(
      "--max-lines",
      options.maxLines,
      DEFAULT_MAX_OUTPUT_LINES,
      MIN_MAX_OUTPUT_LINES,
      MAX_MAX_OUTPUT_LINES
    ),
    maxOutputChars: normalizeBoundedInteger(
      "--max-chars",
      options.maxChars,
      DEFAULT_MAX_OUTPUT_CHARS,
      MIN_MAX_OUTPUT_CHARS,
      MAX_MAX_OUTPUT_CHARS
    )
  };
}
