import { RequestConfig } from "./types.js";

export const PROTOCOL_VERSION = "v1";

export type SessionRequest = {
  version: string;
  run_id: string;
  query: string;
  config: RequestConfig;
};

export type ClarifyingQuestion = {
  label: string;
  question: string;
};

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type InterruptCommand = "stop" | "pause" | "force_write";

export type StatusEvent = { type: "status"; message: string };
export type TraceEvent = { type: "trace"; trace_id: string; trace_url: string };
export type ClarifyingQuestionsEvent = {
  type: "clarifying_questions";
  questions: ClarifyingQuestion[];
};
export type PromptEvent = {
  type: "prompt";
  agent: string;
  sequence: number;
  content: string;
};
export type RawResponseEvent = {
  type: "raw_response";
  agent: string;
  sequence: number;
  content: string;
  token_usage?: TokenUsage;
};
export type DecisionEvent = {
  type: "decision";
  action: string;
  reason: string;
  remaining_searches: number;
  remaining_iterations: number;
};
export type ReportEvent = {
  type: "report";
  short_summary: string;
  markdown_report: string;
  follow_up_questions: string[];
};
export type MetadataEvent = {
  type: "metadata";
  model: string;
  total_tokens?: number;
  duration_ms: number;
};
export type ErrorEvent = { type: "error"; message: string; code?: string };
export type DoneEvent = { type: "done"; success: boolean };

export type WorkerEvent =
  | StatusEvent
  | TraceEvent
  | ClarifyingQuestionsEvent
  | PromptEvent
  | RawResponseEvent
  | DecisionEvent
  | ReportEvent
  | MetadataEvent
  | ErrorEvent
  | DoneEvent;

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

export function createRequest(
  runId: string,
  query: string,
  config: RequestConfig
): SessionRequest {
  return { version: PROTOCOL_VERSION, run_id: runId, query, config };
}

/** The request with its wire key order fixed. */
export function requestPayload(request: SessionRequest): SessionRequest {
  const { config } = request;
  return {
    version: request.version,
    run_id: request.run_id,
    query: request.query,
    config: {
      model: config.model,
      search_count: config.search_count,
      max_iterations: config.max_iterations,
      max_searches: config.max_searches,
      auto_decide: config.auto_decide,
    },
  };
}

export function encodeRequest(request: SessionRequest): string {
  return line(requestPayload(request));
}

export function encodeClarifyingAnswers(answers: readonly string[]): string {
  return line({ answers: [...answers] });
}

export function encodeInterrupt(command: InterruptCommand): string {
  return line({ type: "interrupt", command });
}

function line(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}

// ---------------------------------------------------------------------------
// Inbound
// ---------------------------------------------------------------------------

type Fields = Record<string, unknown>;

class FieldError extends Error {}

export function decodeWorkerLine(raw: string): DecodeResult<WorkerEvent> {
  const parsed = parseObject(raw);
  if (!parsed.ok) {
    return parsed;
  }
  try {
    return { ok: true, value: toWorkerEvent(parsed.value) };
  } catch (error) {
    if (error instanceof FieldError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

export function decodeRequest(raw: string): DecodeResult<SessionRequest> {
  const parsed = parseObject(raw);
  if (!parsed.ok) {
    return parsed;
  }
  try {
    const data = parsed.value;
    const config = data.config;
    if (!isObject(config)) {
      throw new FieldError("missing field `config`");
    }
    return {
      ok: true,
      value: {
        version: str(data, "version"),
        run_id: str(data, "run_id"),
        query: str(data, "query"),
        config: {
          model: str(config, "model"),
          search_count: uint(config, "search_count"),
          max_iterations: uint(config, "max_iterations"),
          max_searches: uint(config, "max_searches"),
          auto_decide: bool(config, "auto_decide"),
        },
      },
    };
  } catch (error) {
    if (error instanceof FieldError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

function parseObject(raw: string): DecodeResult<Fields> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
  if (!isObject(value)) {
    return { ok: false, error: "expected a JSON object" };
  }
  return { ok: true, value };
}

function toWorkerEvent(data: Fields): WorkerEvent {
  const type = str(data, "type");
  switch (type) {
    case "status":
      return { type, message: str(data, "message") };
    case "trace":
      return {
        type,
        trace_id: str(data, "trace_id"),
        trace_url: str(data, "trace_url"),
      };
    case "clarifying_questions":
      return {
        type,
        questions: list(data, "questions").map((item, index) => {
          if (!isObject(item)) {
            throw new FieldError(`questions[${index}] must be an object`);
          }
          return { label: str(item, "label"), question: str(item, "question") };
        }),
      };
    case "prompt":
      return {
        type,
        agent: str(data, "agent"),
        sequence: uint(data, "sequence"),
        content: str(data, "content"),
      };
    case "raw_response": {
      const event: RawResponseEvent = {
        type,
        agent: str(data, "agent"),
        sequence: uint(data, "sequence"),
        content: str(data, "content"),
      };
      const usage = data.token_usage;
      if (usage !== undefined && usage !== null) {
        if (!isObject(usage)) {
          throw new FieldError("token_usage must be an object");
        }
        event.token_usage = {
          prompt_tokens: uint(usage, "prompt_tokens"),
          completion_tokens: uint(usage, "completion_tokens"),
          total_tokens: uint(usage, "total_tokens"),
        };
      }
      return event;
    }
    case "decision":
      return {
        type,
        action: str(data, "action"),
        reason: str(data, "reason"),
        remaining_searches: uint(data, "remaining_searches"),
        remaining_iterations: uint(data, "remaining_iterations"),
      };
    case "report":
      return {
        type,
        short_summary: str(data, "short_summary"),
        markdown_report: str(data, "markdown_report"),
        follow_up_questions: list(data, "follow_up_questions").map((item, index) => {
          if (typeof item !== "string") {
            throw new FieldError(`follow_up_questions[${index}] must be a string`);
          }
          return item;
        }),
      };
    case "metadata": {
      const event: MetadataEvent = {
        type,
        model: str(data, "model"),
        duration_ms: uint(data, "duration_ms"),
      };
      if (data.total_tokens !== undefined && data.total_tokens !== null) {
        event.total_tokens = uint(data, "total_tokens");
      }
      return event;
    }
    case "error": {
      const event: ErrorEvent = { type, message: str(data, "message") };
      if (data.code !== undefined && data.code !== null) {
        event.code = str(data, "code");
      }
      return event;
    }
    case "done":
      return { type, success: bool(data, "success") };
    default:
      throw new FieldError(`unknown variant \`${type}\``);
  }
}

function isObject(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(data: Fields, key: string): string {
  const value = data[key];
  if (typeof value !== "string") {
    throw new FieldError(missingOrInvalid(data, key, "a string"));
  }
  return value;
}

function uint(data: Fields, key: string): number {
  const value = data[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new FieldError(missingOrInvalid(data, key, "a non-negative integer"));
  }
  return value;
}

function bool(data: Fields, key: string): boolean {
  const value = data[key];
  if (typeof value !== "boolean") {
    throw new FieldError(missingOrInvalid(data, key, "a boolean"));
  }
  return value;
}

function list(data: Fields, key: string): unknown[] {
  const value = data[key];
  if (!Array.isArray(value)) {
    throw new FieldError(missingOrInvalid(data, key, "an array"));
  }
  return value;
}

function missingOrInvalid(data: Fields, key: string, expected: string): string {
  return key in data
    ? `field \`${key}\` must be ${expected}`
    : `missing field \`${key}\``;
}
