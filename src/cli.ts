import { readFileSync } from "node:fs";

import { log } from "@clack/prompts";
import { Command } from "commander";

import { runFlags } from "./commands/flags.js";
import { runRender } from "./commands/render.js";
import { normalizeError } from "./core/errors.js";
import type { FlagsCommandOptions, RenderCommandOptions } from "./core/types.js";

function readCliVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("agent-stream")
  .description("Decode Claude, Codex and Amp streaming JSON output into a live terminal transcript.")
  .version(readCliVersion());

program
  .command("render")
  .description("Render an agent NDJSON log, or standard input, as a terminal transcript.")
  .argument("[file]", 'NDJSON file to read (defaults to standard input, also "-")')
  .requiredOption("--agent <command>", "claude | codex | amp (a command path is accepted)")
  .option("--text", "Show assistant text", true)
  .option("--no-text", "Hide assistant text")
  .option("--progress", "Show progress and unknown events", false)
  .option("--color", "Force colored output")
  .option("--no-color", "Disable colored output")
  .option("--emoji", "Use emoji icons", true)
  .option("--no-emoji", "Use ASCII markers instead of emoji")
  .option("--verbose", "Show empty results, per-tool durations and stream stats", false)
  .option("--timestamps", "Prefix lines with the local time", false)
  .option("--max-lines <count>", "Tool output lines to show (1-200, default: 3)")
  .option("--max-chars <count>", "Characters per tool output line (20-2000, default: 120)")
  .option("--raw-log [path]", "Append every decoded line to a raw log (default: stream-json.log)")
  .option("--debug", "Report decode problems and stream stats", false)
  .action(async (fileArg: string | undefined, rawOptions: RenderCommandOptions) => {
    await runRender(fileArg, rawOptions);
  });

program
  .command("flags")
  .description("Print the command-line flags that switch an agent to structured output.")
  .argument("<agent>", "claude | codex | amp")
  .option("--text", "Print the plain text mode flags instead", false)
  .action((agent: string, rawOptions: FlagsCommandOptions) => {
    runFlags(agent, rawOptions);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    log.error(normalized.message);
    process.exitCode = normalized.exitCode;
  }
}

void main();
