import type { z } from "zod";

import { StreamDecodeError, describeError } from "../errors.js";
import type { AgentEvent } from "./types.js";

/**
 * Decodes one NDJSON line of an agent's structured output into zero or more
 * normalized events. Implementations keep their own per-session state, so a
 * parser instance must not be shared between subprocess runs.
 *
 * `parse` throws {@link StreamDecodeError} when the line is not a JSON object
 * or a message of a known type has an unexpected shape. Unknown message types
 * never throw; they come back as a single `unknown` event.
 */
export interface StreamParser {
  readonly name: string;
  parse(line: string): AgentEvent[];
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeJsonObject(line: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new StreamDecodeError(`json parse: ${describeError(error)}`, line, { cause: error });
  }
  if (!isJsonObject(parsed)) {
    throw new StreamDecodeError("json parse: expected an object", line);
  }
  return parsed;
}

export function messageType(raw: JsonObject): string {
  return typeof raw.type === "string" ? raw.type : "";
}

/** Validates a decoded message of a known type against its schema. */
export function decodeMessage<T>(schema: z.ZodType<T>, raw: JsonObject, line: string): T {
  const validated = schema.safeParse(raw);
  if (validated.success) return validated.data;
  const issue = validated.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw new StreamDecodeError(
    `invalid ${messageType(raw) || "untyped"} message${where}: ${issue?.message ?? "schema mismatch"}`,
    line,
    { cause: validated.error }
  );
}

export function getString(input: unknown, key: string): string {
  if (!isJsonObject(input)) return "";
  const value = input[key];
  return typeof value === "string" ? value : "";
}
