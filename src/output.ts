import { PROTOCOL_VERSION, WorkerEvent } from "./protocol.js";
import { OutputMode, RequestConfig } from "./types.js";

export type OutputStreams = {
  out: NodeJS.WritableStream;
  err: NodeJS.WritableStream;
  color?: boolean;
};

/**
 * Console output for single-shot runs. Human mode narrates on stderr and prints
 * the report on stdout; quiet mode keeps only the report and errors; JSON mode
 * writes one object per line on stdout.
 */
export class Output {
  readonly mode: OutputMode;
  private readonly out: NodeJS.WritableStream;
  private readonly err: NodeJS.WritableStream;
  private readonly useColor: boolean;

  constructor(
    mode: OutputMode,
    streams: OutputStreams = { out: process.stdout, err: process.stderr }
  ) {
    this.mode = mode;
    this.out = streams.out;
    this.err = streams.err;
    this.useColor =
      streams.color ?? (Boolean(process.stderr.isTTY) && !process.env.NO_COLOR);
  }

  start(runId: string, artifactsDir: string, config: RequestConfig): void {
    if (this.mode === "json") {
      this.json({
        type: "start",
        version: PROTOCOL_VERSION,
        run_id: runId,
        artifacts_dir: artifactsDir,
        model: config.model,
        search_count: config.search_count,
        max_iterations: config.max_iterations,
        max_searches: config.max_searches,
        auto_decide: config.auto_decide,
      });
      return;
    }
    this.progress(`Starting research run: ${runId}`);
    this.progress(
      `Model: ${config.model}, Searches: ${config.search_count} (max: ${config.max_searches}), Iterations: ${config.max_iterations}`
    );
    this.progress(`Artifacts: ${artifactsDir}`);
  }

  event(event: WorkerEvent): void {
    switch (event.type) {
      case "status":
        this.status(event.message);
        return;
      case "trace":
        if (this.mode === "json") {
          this.json({ type: "trace", trace_id: event.trace_id, trace_url: event.trace_url });
        } else {
          this.progress(`${this.faint("Trace")} [${event.trace_id.slice(0, 8)}]: ${event.trace_url}`);
        }
        return;
      case "clarifying_questions":
        if (this.mode === "json") {
          this.json({ type: "clarifying_questions", questions: event.questions });
        } else {
          this.progress(`Clarifying questions: ${event.questions.length}`);
        }
        return;
      case "prompt":
        if (this.mode === "json") {
          this.json({ type: "prompt", agent: event.agent, sequence: event.sequence });
        } else {
          this.progress(`Prompt: ${event.agent} (${event.sequence})`);
        }
        return;
      case "raw_response":
        if (this.mode === "json") {
          this.json({ type: "response", agent: event.agent, sequence: event.sequence });
        } else {
          this.progress(`Response: ${event.agent} (${event.sequence})`);
        }
        return;
      case "decision":
        if (this.mode === "json") {
          this.json({
            type: "decision",
            action: event.action,
            reason: event.reason,
            remaining_searches: event.remaining_searches,
            remaining_iterations: event.remaining_iterations,
          });
        } else {
          this.progress(
            `${this.yellow("Decision")}: ${event.action} (searches: ${event.remaining_searches}, iterations: ${event.remaining_iterations})`
          );
          this.progress(`   Reason: ${event.reason}`);
        }
        return;
      case "report":
        this.report(event.short_summary, event.markdown_report, event.follow_up_questions);
        return;
      case "error":
        this.error(event.code, event.message);
        return;
      case "metadata":
      case "done":
        return;
    }
  }

  status(message: string): void {
    if (this.mode === "json") {
      this.json({ type: "status", message });
    } else {
      this.progress(`→ ${message}`);
    }
  }

  report(shortSummary: string, markdownReport: string, followUps: readonly string[]): void {
    if (this.mode === "json") {
      this.json({
        type: "report",
        short_summary: shortSummary,
        markdown_report: markdownReport,
        follow_up_questions: followUps,
      });
      return;
    }
    const lines = [
      "",
      "=".repeat(60),
      "",
      `SUMMARY: ${shortSummary}`,
      "",
      markdownReport,
    ];
    if (followUps.length > 0) {
      lines.push("", "Follow-up questions:", ...followUps.map((q) => `  - ${q}`));
    }
    this.out.write(`${lines.join("\n")}\n`);
  }

  error(code: string | undefined, message: string): void {
    if (this.mode === "json") {
      this.json(code ? { type: "error", code, message } : { type: "error", message });
      return;
    }
    const text = code ? `Error [${code}]: ${message}` : `Error: ${message}`;
    this.err.write(`${this.red(text)}\n`);
  }

  warning(message: string): void {
    if (this.mode === "json") {
      this.json({ type: "warning", message });
    } else {
      this.progress(`${this.yellow("Warning")}: ${message}`);
    }
  }

  complete(success: boolean, runId: string, artifactsDir: string): void {
    if (this.mode === "json") {
      this.json({ type: "complete", success, run_id: runId, artifacts_dir: artifactsDir });
    } else {
      this.progress(`Run complete. Artifacts saved to: ${artifactsDir}`);
    }
  }

  private progress(line: string): void {
    if (this.mode === "human") {
      this.err.write(`${line}\n`);
    }
  }

  private json(value: Record<string, unknown>): void {
    this.out.write(`${JSON.stringify(value)}\n`);
  }

  private color(code: string, text: string): string {
    return this.useColor ? `${code}${text}\x1b[0m` : text;
  }

  private red(text: string): string {
    return this.color("\x1b[31m", text);
  }

  private yellow(text: string): string {
    return this.color("\x1b[33m", text);
  }

  private faint(text: string): string {
    return this.color("\x1b[90m", text);
  }
}
