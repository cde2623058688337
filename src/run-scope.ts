import { AsyncQueue } from "./channel.js";
import { AnswerHandoff } from "./handoff.js";
import { InterruptCommand } from "./protocol.js";

/**
 * Everything that belongs to exactly one run: its interrupt channel, its
 * (at most one) clarifying handoff and an abort signal that tears the worker
 * down. Created when the run starts, disposed as a unit when it ends.
 */
export class RunScope {
  readonly runId: string;
  readonly interrupts = new AsyncQueue<InterruptCommand>();
  private readonly controller = new AbortController();
  private handoff: AnswerHandoff | null = null;
  private clarificationOpened = false;
  private disposed = false;

  constructor(runId: string) {
    this.runId = runId;
  }

  get active(): boolean {
    return !this.disposed;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get awaitingAnswers(): boolean {
    return this.handoff !== null && !this.handoff.settled;
  }

  /**
   * Opens the run's clarifying round. Returns null when a round was already
   * opened for this run or the scope is gone.
   */
  openClarification(): AnswerHandoff | null {
    if (this.disposed || this.clarificationOpened) {
      return null;
    }
    this.clarificationOpened = true;
    this.handoff = new AnswerHandoff();
    return this.handoff;
  }

  submitAnswers(answers: readonly string[]): boolean {
    return this.handoff?.fulfill(answers) ?? false;
  }

  cancelAnswers(): boolean {
    return this.handoff?.cancel() ?? false;
  }

  abandonAnswers(reason: string): boolean {
    return this.handoff?.abandon(reason) ?? false;
  }

  interrupt(command: InterruptCommand): boolean {
    if (this.disposed) {
      return false;
    }
    return this.interrupts.push(command);
  }

  /** Kills the worker; the session notices through `signal`. */
  abort(): void {
    this.controller.abort();
  }

  dispose(reason = "run ended"): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.abandonAnswers(reason);
    this.interrupts.close();
  }
}
