import { z } from "zod";

import { AGENT_CLAUDE } from "./agents.js";
import {
  assistantEvents,
  conversationMessageSchema,
  toTokenUsage,
  toolResultEvents,
  usageSchema,
  type BlockDialect
} from "./content-blocks.js";
import { decodeJsonObject, decodeMessage, messageType, type StreamParser } from "./parser.js";
import { extractToolInput } from "./tool-input.js";
import { progressEvent, resultEvent, unknownEvent, type AgentEvent } from "./types.js";

const CLAUDE_TOOL_OUTPUT_CHARS = 100;

const resultMessageSchema = z
  .object({
    type: z.literal("result"),
    subtype: z.string().nullish(),
    result: z.string().nullish(),
    total_cost_usd: z.number().nullish(),
    usage: usageSchema
  })
  .passthrough();

const systemMessageSchema = z
  .object({
    type: z.literal("system"),
    subtype: z.string().nullish(),
    session_id: z.string().nullish()
  })
  .passthrough();

const claudeDialect: BlockDialect = {
  summarizeInput: extractToolInput,
  isTodoTool: (toolName) => toolName === "TodoWrite",
  maxToolOutputChars: CLAUDE_TOOL_OUTPUT_CHARS
};

/** Parser for `claude --output-format stream-json --verbose`. */
export class ClaudeParser implements StreamParser {
  readonly name = AGENT_CLAUDE;
  private cumulativeCost = 0;

  parse(line: string): AgentEvent[] {
    const raw = decodeJsonObject(line);
    const now = new Date();
    const type = messageType(raw);

    switch (type) {
      case "assistant":
        return assistantEvents(decodeMessage(conversationMessageSchema, raw, line), claudeDialect, now);
      case "user":
        return toolResultEvents(decodeMessage(conversationMessageSchema, raw, line), claudeDialect, now);
      case "result": {
        const message = decodeMessage(resultMessageSchema, raw, line);
        const cost = message.total_cost_usd ?? 0;
        const costDelta = cost - this.cumulativeCost;
        this.cumulativeCost = cost;
        return [
          resultEvent(
            {
              result: message.result ?? "",
              isComplete: true,
              cost,
              costDelta,
              usage: toTokenUsage(message.usage)
            },
            now
          )
        ];
      }
      case "system": {
        const message = decodeMessage(systemMessageSchema, raw, line);
        return [progressEvent(`session: ${message.session_id ?? ""}`, now)];
      }
      default:
        return [unknownEvent(`unknown message type: ${type}`, now)];
    }
  }
}
