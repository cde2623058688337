import { randomUUID } from "crypto";
import path from "path";
import { setTimeout as delay } from "timers/promises";
import { AppEvent, ControllerCommand } from "./controller.js";
import { errorMessage, SounderError } from "./errors.js";
import { Launcher } from "./exec.js";
import { createRequest } from "./protocol.js";
import { RunScope } from "./run-scope.js";
import { runSession } from "./session.js";
import { Config } from "./types.js";

export const SHUTDOWN_GRACE_MS = 2_000;

export type EventSink = {
  push(event: AppEvent): unknown;
};

export type OrchestratorOptions = {
  config: Config;
  events: EventSink;
  cwd?: string;
  launch?: Launcher;
  createRunId?: () => string;
};

type ActiveRun = {
  scope: RunScope;
  done: Promise<void>;
};

/**
 * Consumes the Controller's command channel and owns the one active run.
 * Interrupts and answers only ever reach the scope of the run that is live
 * when they arrive; with no run live they are dropped.
 */
export class SessionOrchestrator {
  private readonly options: OrchestratorOptions;
  private active: ActiveRun | null = null;

  constructor(options: OrchestratorOptions) {
    this.options = options;
  }

  get activeRunId(): string | null {
    return this.active?.scope.runId ?? null;
  }

  /** Settles when the active run (if any) has finished. */
  idle(): Promise<void> {
    return this.active?.done ?? Promise.resolve();
  }

  async consume(commands: AsyncIterable<ControllerCommand>): Promise<void> {
    for await (const command of commands) {
      this.handle(command);
      if (command.type === "quit") {
        return;
      }
    }
  }

  handle(command: ControllerCommand): void {
    switch (command.type) {
      case "submit_query":
        this.start(command.query);
        return;
      case "submit_answers":
        if (!this.active?.scope.submitAnswers(command.answers)) {
          this.warn("no clarifying round is waiting for answers");
        }
        return;
      case "cancel_answers":
        this.active?.scope.cancelAnswers();
        return;
      case "interrupt":
        this.active?.scope.interrupt(command.command);
        return;
      case "quit":
        return;
    }
  }

  /**
   * Sends `stop` to a live worker and waits a bounded time for it to exit,
   * then kills it. Never waits longer than twice `graceMs`.
   */
  async shutdown(graceMs = SHUTDOWN_GRACE_MS): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }
    active.scope.interrupt("stop");
    active.scope.dispose("shutting down");
    if (await settledWithin(active.done, graceMs)) {
      return;
    }
    active.scope.abort();
    await settledWithin(active.done, graceMs);
  }

  private start(query: string): void {
    if (this.active) {
      this.warn("a research run is already active");
      return;
    }
    const { config, events } = this.options;
    const runId = (this.options.createRunId ?? randomUUID)();
    const scope = new RunScope(runId);
    const request = createRequest(runId, query, config.request);

    events.push({ kind: "run_started", runId, runDir: path.resolve(config.runsDir, runId) });

    const finish = () => {
      scope.dispose();
      if (this.active?.scope === scope) {
        this.active = null;
      }
    };

    const done = runSession({
      request,
      scope,
      worker: config.worker,
      runsDir: config.runsDir,
      stderr: "ignore",
      cwd: this.options.cwd,
      launch: this.options.launch,
      onEvent: (event) => events.push({ kind: "worker", event }),
      warn: (message) => this.warn(message),
      onClarification: (questions) => events.push({ kind: "clarification_opened", questions }),
    }).then(
      (outcome) => {
        finish();
        events.push({
          kind: "run_complete",
          runId,
          success: outcome.success,
          cancelled: outcome.cancelled,
        });
      },
      (error: unknown) => {
        finish();
        events.push({
          kind: "run_failed",
          message: errorMessage(error),
          code: error instanceof SounderError ? error.code : undefined,
        });
      }
    );

    this.active = { scope, done };
  }

  private warn(message: string): void {
    this.options.events.push({ kind: "warning", message });
  }
}

async function settledWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  const timeout = delay(ms, false, { ref: false });
  return Promise.race([promise.then(() => true), timeout]);
}
