import { ArtifactSink } from "./artifacts.js";
import { errorMessage } from "./errors.js";
import { ClarifyingQuestion, decodeWorkerLine, WorkerEvent } from "./protocol.js";
import { truncateText } from "./utils.js";

export type RouterDeps = {
  sink: ArtifactSink;
  /** Receives a private copy of every decoded event, in arrival order. */
  emit: (event: WorkerEvent) => void;
  warn: (message: string) => void;
  /**
   * Called for the first `clarifying_questions` of the run. Reading stops
   * until the returned promise settles; a rejection ends routing.
   */
  clarify: (questions: ClarifyingQuestion[]) => Promise<void>;
};

export type RouteResult = {
  /** Last `done.success` seen, or null when the worker never sent one. */
  done: boolean | null;
  events: number;
  malformed: number;
};

const MAX_LOGGED_LINE = 200;

export async function routeWorkerEvents(
  lines: AsyncIterable<string>,
  deps: RouterDeps
): Promise<RouteResult> {
  const result: RouteResult = { done: null, events: 0, malformed: 0 };
  let clarified = false;

  for await (const line of lines) {
    const decoded = decodeWorkerLine(line);
    if (!decoded.ok) {
      result.malformed += 1;
      deps.warn(
        `failed to parse response: ${decoded.error} (line: ${truncateText(line, MAX_LOGGED_LINE)})`
      );
      continue;
    }

    const event = decoded.value;
    result.events += 1;
    deps.emit(structuredClone(event));
    persist(event, deps);

    if (event.type === "clarifying_questions") {
      if (!clarified) {
        clarified = true;
        await deps.clarify(event.questions);
      }
    } else if (event.type === "done") {
      result.done = event.success;
    }
  }

  return result;
}

function persist(event: WorkerEvent, deps: RouterDeps): void {
  const { sink } = deps;
  try {
    switch (event.type) {
      case "prompt":
        sink.writePrompt(event.agent, event.sequence, event.content);
        break;
      case "raw_response":
        sink.writeRawResponse(event.agent, event.sequence, event.content, event.token_usage);
        break;
      case "trace":
        sink.recordTrace(event);
        break;
      case "report":
        sink.recordReport(event);
        break;
      case "metadata":
        sink.recordMetadata(event);
        break;
      default:
        break;
    }
  } catch (error) {
    deps.warn(`failed to write ${event.type}: ${errorMessage(error)}`);
  }
}
