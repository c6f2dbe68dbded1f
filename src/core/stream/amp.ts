import { z } from "zod";

import { AGENT_AMP } from "./agents.js";
import {
  assistantEvents,
  conversationMessageSchema,
  toTokenUsage,
  toolResultEvents,
  usageSchema,
  type BlockDialect
} from "./content-blocks.js";
import { decodeJsonObject, decodeMessage, messageType, type StreamParser } from "./parser.js";
import { extractAmpToolInput } from "./tool-input.js";
import { progressEvent, resultEvent, unknownEvent, type AgentEvent } from "./types.js";

const resultMessageSchema = z
  .object({
    type: z.literal("result"),
    subtype: z.string().nullish(),
    result: z.string().nullish(),
    error: z.string().nullish(),
    is_error: z.boolean().nullish(),
    total_cost_usd: z.number().nullish(),
    usage: usageSchema
  })
  .passthrough();

const systemMessageSchema = z
  .object({
    type: z.literal("system"),
    session_id: z.string().nullish()
  })
  .passthrough();

const ampDialect: BlockDialect = {
  summarizeInput: extractAmpToolInput,
  isTodoTool: (toolName) => toolName === "todo_write" || toolName === "TodoWrite"
};

/** Parser for `amp --stream-json`, which follows Claude's content-block layout. */
export class AmpParser implements StreamParser {
  readonly name = AGENT_AMP;
  private cumulativeCost = 0;

  parse(line: string): AgentEvent[] {
    const raw = decodeJsonObject(line);
    const now = new Date();
    const type = messageType(raw);

    switch (type) {
      case "system": {
        const message = decodeMessage(systemMessageSchema, raw, line);
        return [progressEvent(`session: ${message.session_id ?? ""}`, now)];
      }
      case "assistant":
        return assistantEvents(decodeMessage(conversationMessageSchema, raw, line), ampDialect, now);
      case "user":
        return toolResultEvents(decodeMessage(conversationMessageSchema, raw, line), ampDialect, now);
      case "result": {
        const message = decodeMessage(resultMessageSchema, raw, line);
        const cost = message.total_cost_usd ?? this.cumulativeCost;
        const costDelta = cost - this.cumulativeCost;
        this.cumulativeCost = cost;

        const failed = message.is_error === true || (message.subtype ?? "success") !== "success";
        const usage = toTokenUsage(message.usage);
        if (failed) {
          const reason = message.error || message.result || message.subtype || "error";
          return [resultEvent({ isComplete: true, result: reason, toolError: reason, cost, costDelta, usage }, now)];
        }
        return [resultEvent({ isComplete: true, result: message.result ?? "", cost, costDelta, usage }, now)];
      }
      default:
        return [unknownEvent(`unknown message type: ${type}`, now)];
    }
  }
}
