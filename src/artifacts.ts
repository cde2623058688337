import path from "path";
import {
  MetadataEvent,
  ReportEvent,
  requestPayload,
  SessionRequest,
  TokenUsage,
  TraceEvent,
} from "./protocol.js";
import { writeJson, writeText } from "./utils.js";

export type RunMetadata = {
  run_id: string;
  model: string | null;
  total_tokens: number | null;
  duration_ms: number;
  trace_id: string | null;
  trace_url: string | null;
};

type RawResponseFile = {
  agent: string;
  sequence: number;
  content: string;
  token_usage?: TokenUsage;
};

export function artifactName(agent: string, sequence: number, ext: string): string {
  const slug = agent.toLowerCase().replace(/[\\/]/g, "-");
  return `${String(sequence).padStart(3, "0")}-${slug}.${ext}`;
}

/**
 * Writes one run's files under `<runsDir>/<runId>/`. Individual writes throw;
 * callers decide whether a failure matters. Trace, report and metadata events
 * are held in memory until `writeOutput` and `writeMetadata`.
 */
export class ArtifactSink {
  readonly runId: string;
  readonly runDir: string;
  private readonly now: () => number;
  private readonly startedAt: number;
  private traceId: string | null = null;
  private traceUrl: string | null = null;
  private model: string | null = null;
  private totalTokens: number | null = null;
  private markdownReport: string | null = null;

  constructor(runsDir: string, runId: string, now: () => number = Date.now) {
    this.runId = runId;
    this.runDir = path.resolve(runsDir, runId);
    this.now = now;
    this.startedAt = now();
  }

  get promptsDir(): string {
    return path.join(this.runDir, "prompts");
  }

  get responsesDir(): string {
    return path.join(this.runDir, "raw_responses");
  }

  get hasReport(): boolean {
    return this.markdownReport !== null;
  }

  writeRequest(request: SessionRequest): void {
    writeJson(path.join(this.runDir, "request.json"), requestPayload(request));
  }

  writePrompt(agent: string, sequence: number, content: string): void {
    writeText(path.join(this.promptsDir, artifactName(agent, sequence, "txt")), content);
  }

  writeRawResponse(
    agent: string,
    sequence: number,
    content: string,
    tokenUsage?: TokenUsage
  ): void {
    const data: RawResponseFile = { agent, sequence, content };
    if (tokenUsage) {
      data.token_usage = tokenUsage;
    }
    writeJson(path.join(this.responsesDir, artifactName(agent, sequence, "json")), data);
  }

  recordTrace(event: TraceEvent): void {
    this.traceId = event.trace_id;
    this.traceUrl = event.trace_url;
  }

  recordReport(event: ReportEvent): void {
    this.markdownReport = event.markdown_report;
  }

  recordMetadata(event: MetadataEvent): void {
    this.model = event.model;
    this.totalTokens = event.total_tokens ?? null;
  }

  metadata(): RunMetadata {
    return {
      run_id: this.runId,
      model: this.model,
      total_tokens: this.totalTokens,
      duration_ms: Math.max(0, this.now() - this.startedAt),
      trace_id: this.traceId,
      trace_url: this.traceUrl,
    };
  }

  writeOutput(): void {
    if (this.markdownReport !== null) {
      writeText(path.join(this.runDir, "output.md"), this.markdownReport);
    }
  }

  writeMetadata(): void {
    writeJson(path.join(this.runDir, "metadata.json"), this.metadata());
  }
}
