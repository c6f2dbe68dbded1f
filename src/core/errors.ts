const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;
const DECODE_PREVIEW_CHARS = 100;

interface AgentStreamErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class AgentStreamError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: AgentStreamErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends AgentStreamError {
  constructor(message: string, options: AgentStreamErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ConfigError extends AgentStreamError {
  constructor(message: string, options: AgentStreamErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends AgentStreamError {
  constructor(message: string, options: AgentStreamErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/**
 * Raised by stream parsers when a line is not valid JSON, is not a JSON object,
 * or does not fit the shape of a message type the parser knows.
 */
export class StreamDecodeError extends AgentStreamError {
  readonly preview: string;

  constructor(message: string, line: string, options: AgentStreamErrorOptions = {}) {
    const preview = line.length > DECODE_PREVIEW_CHARS ? `${line.slice(0, DECODE_PREVIEW_CHARS - 3)}...` : line;
    super(message, "DECODE", EXIT_CODE_OPERATIONAL_FAILURE, {
      ...options,
      details: { ...options.details, preview }
    });
    this.preview = preview;
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): AgentStreamError {
  if (error instanceof AgentStreamError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
