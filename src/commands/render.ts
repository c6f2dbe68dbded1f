import { createReadStream } from "node:fs";
import { resolve } from "node:path";

import { log } from "@clack/prompts";

import { resolveFormatterConfig, type ColorEnv } from "../core/config.js";
import { ExecutionError, describeError } from "../core/errors.js";
import { StreamFormatter, type OutputWriter } from "../core/stream/formatter.js";
import { createStreamProcessor, type StreamStats } from "../core/stream/processor.js";
import { DEFAULT_RAW_LOG_FILE, openRawLog, type FileRawLog } from "../core/stream/raw-log.js";
import type { RenderCommandOptions } from "../core/types.js";

const STDIN_ARG = "-";

export interface RenderCommandRuntime {
  cwd?: string;
  env?: ColorEnv;
  stdin?: AsyncIterable<Uint8Array | string>;
  write?: OutputWriter;
  now?: () => number;
}

function resolveRawLogPath(value: string | boolean | undefined, cwd: string): string | null {
  if (value === undefined || value === false) return null;
  if (value === true) return resolve(cwd, DEFAULT_RAW_LOG_FILE);
  const trimmed = value.trim();
  return resolve(cwd, trimmed || DEFAULT_RAW_LOG_FILE);
}

function openInput(
  fileArg: string | undefined,
  cwd: string,
  stdin: AsyncIterable<Uint8Array | string>
): AsyncIterable<Uint8Array | string> {
  if (!fileArg || fileArg === STDIN_ARG) return stdin;
  return createReadStream(resolve(cwd, fileArg));
}

/** Streams a saved or piped agent NDJSON log through the processor and formatter. */
export async function runRender(
  fileArg: string | undefined,
  options: RenderCommandOptions,
  runtime: RenderCommandRuntime = {}
): Promise<StreamStats> {
  const cwd = runtime.cwd ?? process.cwd();
  const env = runtime.env ?? process.env;
  const write = runtime.write ?? ((chunk: string) => void process.stdout.write(chunk));
  const config = resolveFormatterConfig(options, env);
  const agentCommand = options.agent ?? config.agentName;

  const formatter = new StreamFormatter(write, config, { now: runtime.now });
  const rawLogPath = resolveRawLogPath(options.rawLog, cwd);
  let rawLog: FileRawLog | null = null;
  if (rawLogPath) {
    try {
      rawLog = await openRawLog(rawLogPath);
    } catch (error) {
      throw new ExecutionError(`Failed to open raw log ${rawLogPath}: ${describeError(error)}`, { cause: error });
    }
  }

  const processor = createStreamProcessor(agentCommand, formatter, {
    debugLog: options.debug ? (message) => log.warn(`[stream-debug] ${message}`) : undefined,
    rawLog: rawLog ?? undefined
  });
  if (!processor) {
    await rawLog?.close();
    throw new ExecutionError(`Agent "${config.agentName}" has no structured output flags.`);
  }

  try {
    for await (const chunk of openInput(fileArg, cwd, runtime.stdin ?? process.stdin)) {
      await processor.write(chunk);
    }
  } catch (error) {
    throw new ExecutionError(`Failed to read agent output: ${describeError(error)}`, { cause: error });
  } finally {
    await processor.close();
    await rawLog?.close();
  }

  const stats = processor.stats();
  if (options.verbose || options.debug) {
    log.info(`stream stats: ${stats.events} events, ${stats.errors} errors`);
  }
  return stats;
}
