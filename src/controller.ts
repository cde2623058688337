import {
  ClarifyingQuestion,
  InterruptCommand,
  ReportEvent,
  WorkerEvent,
} from "./protocol.js";
import { shortId } from "./utils.js";

export type Phase =
  | "idle"
  | "awaiting_clarification"
  | "clarifying"
  | "confirming"
  | "researching"
  | "completed"
  | "error";

export type MessageRole = "user" | "assistant" | "system";

export type ChatMessage = {
  role: MessageRole;
  content: string;
};

export type Key =
  | { name: "char"; char: string }
  | { name: "enter" }
  | { name: "backspace" }
  | { name: "escape" }
  | { name: "up" }
  | { name: "down" }
  | { name: "interrupt" };

/** Everything the orchestrator tells the Controller, drained once per tick. */
export type AppEvent =
  | { kind: "worker"; event: WorkerEvent }
  | { kind: "run_started"; runId: string; runDir: string }
  /** The session opened the run's clarifying round and is waiting on its handoff. */
  | { kind: "clarification_opened"; questions: ClarifyingQuestion[] }
  | { kind: "run_complete"; runId: string; success: boolean; cancelled: boolean }
  | { kind: "run_failed"; message: string; code?: string }
  | { kind: "warning"; message: string };

/** Work the Controller asks for without waiting on it. */
export type ControllerCommand =
  | { type: "submit_query"; query: string }
  | { type: "submit_answers"; answers: string[] }
  | { type: "cancel_answers" }
  | { type: "interrupt"; command: InterruptCommand }
  | { type: "quit" };

export type CommandSink = {
  push(command: ControllerCommand): unknown;
};

export type ClarifyingRound = {
  questions: ClarifyingQuestion[];
  index: number;
  answers: string[];
};

export type ConfirmationDecision = "confirm" | "cancel" | "unknown";

const CONFIRM_TOKENS = new Set(["", "y", "yes", "confirm", "continue", "proceed"]);
const CANCEL_TOKENS = new Set(["n", "no", "cancel", "stop", "quit"]);

const SCROLL_STEP = 3;

export function parseConfirmation(input: string): ConfirmationDecision {
  const normalized = input.trim().toLowerCase();
  if (CONFIRM_TOKENS.has(normalized)) {
    return "confirm";
  }
  if (CANCEL_TOKENS.has(normalized)) {
    return "cancel";
  }
  return "unknown";
}

export function formatWorkerError(message: string, code?: string): string {
  return code ? `Error [${code}]: ${message}` : `Error: ${message}`;
}

export function formatRunFailure(message: string, code?: string): string {
  return code ? `Run failed [${code}]: ${message}` : `Run failed: ${message}`;
}

export function formatReport(event: ReportEvent): string {
  const parts = [`**${event.short_summary}**`, event.markdown_report];
  if (event.follow_up_questions.length > 0) {
    parts.push(
      ["Follow-up questions:", ...event.follow_up_questions.map((q) => `  - ${q}`)].join("\n")
    );
  }
  return parts.join("\n\n");
}

/**
 * Phase state machine behind the interactive terminal. It never blocks and
 * never performs I/O: key presses and drained events go in, chat lines, a
 * status line and commands on the command channel come out.
 */
export class Controller {
  readonly messages: ChatMessage[] = [];
  private readonly commands: CommandSink;
  private readonly autoDecide: boolean;
  private currentPhase: Phase = "idle";
  private currentInput = "";
  private currentStatus: string | null = null;
  private processing = false;
  private quitRequested = false;
  private offset = 0;
  private round: ClarifyingRound | null = null;
  private roundResolved = false;
  private heldAnswers: string[] | null = null;

  constructor(commands: CommandSink, options: { autoDecide: boolean }) {
    this.commands = commands;
    this.autoDecide = options.autoDecide;
  }

  get phase(): Phase {
    return this.currentPhase;
  }

  get input(): string {
    return this.currentInput;
  }

  get status(): string | null {
    return this.currentStatus;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  get shouldQuit(): boolean {
    return this.quitRequested;
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get clarifyingRound(): Readonly<ClarifyingRound> | null {
    return this.round;
  }

  get acceptsInput(): boolean {
    switch (this.currentPhase) {
      case "clarifying":
      case "confirming":
        return true;
      case "idle":
      case "completed":
      case "error":
        return !this.processing;
      default:
        return false;
    }
  }

  /** Hint shown in the input box title. */
  get prompt(): string {
    switch (this.currentPhase) {
      case "clarifying":
        return "Answer";
      case "confirming":
        return "Proceed? [Y/n]";
      case "awaiting_clarification":
      case "researching":
        return "Esc to stop";
      default:
        return this.processing ? "Finishing run" : "Query";
    }
  }

  applyEvents(events: readonly AppEvent[]): void {
    for (const event of events) {
      this.apply(event);
    }
  }

  apply(event: AppEvent): void {
    switch (event.kind) {
      case "worker":
        this.applyWorkerEvent(event.event);
        return;
      case "run_started":
        this.addMessage("system", `Run ${shortId(event.runId)} started. Artifacts: ${event.runDir}`);
        return;
      case "clarification_opened":
        this.beginRound(event.questions);
        return;
      case "run_complete":
        this.endRun();
        if (event.cancelled) {
          this.currentPhase = "completed";
          this.addMessage("system", `Research cancelled (${shortId(event.runId)})`);
        } else if (event.success) {
          this.currentPhase = "completed";
          this.addMessage("system", `Research complete (${shortId(event.runId)})`);
        } else {
          this.currentPhase = "error";
          this.addMessage("system", "Research failed");
        }
        return;
      case "run_failed":
        this.endRun();
        this.currentPhase = "error";
        this.addMessage("system", formatRunFailure(event.message, event.code));
        return;
      case "warning":
        this.addMessage("system", `Warning: ${event.message}`);
        return;
    }
  }

  handleKey(key: Key): void {
    switch (key.name) {
      case "interrupt":
        this.quit();
        return;
      case "escape":
        this.escape();
        return;
      case "enter":
        this.enter();
        return;
      case "backspace":
        if (this.acceptsInput) {
          this.currentInput = this.currentInput.slice(0, -1);
        }
        return;
      case "char":
        if (this.acceptsInput) {
          this.currentInput += key.char;
        }
        return;
      case "up":
        this.offset += SCROLL_STEP;
        return;
      case "down":
        this.offset = Math.max(0, this.offset - SCROLL_STEP);
        return;
    }
  }

  clampScroll(maxOffset: number): void {
    this.offset = Math.max(0, Math.min(this.offset, maxOffset));
  }

  private applyWorkerEvent(event: WorkerEvent): void {
    switch (event.type) {
      case "status":
        this.currentStatus = event.message;
        return;
      case "trace":
        this.addMessage("system", `Trace: ${event.trace_url}`);
        return;
      case "clarifying_questions":
        // The round opens on `clarification_opened`, once the session holds a handoff.
        return;
      case "prompt":
        this.progress();
        this.currentStatus = `Running ${event.agent} (step ${event.sequence})`;
        return;
      case "raw_response":
        this.progress();
        this.currentStatus = `Received ${event.agent} response (step ${event.sequence})`;
        return;
      case "decision":
        // A decision never moves the phase while the user is answering.
        this.progress();
        this.currentStatus = `Decision: ${event.action} (searches: ${event.remaining_searches}, iterations: ${event.remaining_iterations})`;
        return;
      case "report":
        this.currentStatus = null;
        this.addMessage("assistant", formatReport(event));
        return;
      case "metadata":
        return;
      case "error":
        this.addMessage("system", formatWorkerError(event.message, event.code));
        if (
          this.currentPhase === "researching" ||
          this.currentPhase === "awaiting_clarification"
        ) {
          this.currentPhase = "error";
        }
        return;
      case "done":
        return;
    }
  }

  private progress(): void {
    if (this.currentPhase === "awaiting_clarification") {
      this.currentPhase = "researching";
    }
  }

  private beginRound(questions: ClarifyingQuestion[]): void {
    // Any phase: a non-fatal worker error may have come first.
    if (!this.processing || this.roundResolved || this.round) {
      return;
    }
    if (questions.length === 0) {
      this.roundResolved = true;
      this.sendAnswers([]);
      return;
    }
    this.round = { questions: [...questions], index: 0, answers: [] };
    this.currentPhase = "clarifying";
    this.currentStatus = "Waiting for your answers";
    this.addMessage(
      "system",
      `The researcher has ${questions.length} clarifying question${questions.length === 1 ? "" : "s"}.`
    );
    this.askCurrentQuestion();
  }

  private askCurrentQuestion(): void {
    if (!this.round) {
      return;
    }
    const { questions, index } = this.round;
    const current = questions[index];
    this.addMessage(
      "assistant",
      `[${index + 1}/${questions.length}] ${current.label}: ${current.question}`
    );
  }

  private enter(): void {
    switch (this.currentPhase) {
      case "clarifying":
        this.answerCurrentQuestion();
        return;
      case "confirming":
        this.confirm();
        return;
      case "idle":
      case "completed":
      case "error":
        this.submitQuery();
        return;
      default:
        return;
    }
  }

  private submitQuery(): void {
    const query = this.currentInput.trim();
    if (!query || this.processing) {
      return;
    }
    this.currentInput = "";
    this.addMessage("user", query);
    this.processing = true;
    this.round = null;
    this.roundResolved = false;
    this.heldAnswers = null;
    this.currentPhase = "awaiting_clarification";
    this.currentStatus = "Starting research...";
    this.commands.push({ type: "submit_query", query });
  }

  private answerCurrentQuestion(): void {
    const round = this.round;
    if (!round) {
      return;
    }
    const answer = this.currentInput.trim();
    this.currentInput = "";
    round.answers.push(answer);
    round.index += 1;
    this.addMessage("user", answer || "(no answer)");

    if (round.index < round.questions.length) {
      this.askCurrentQuestion();
      return;
    }

    this.round = null;
    this.roundResolved = true;
    if (this.autoDecide) {
      this.sendAnswers(round.answers);
      return;
    }
    this.heldAnswers = [...round.answers];
    this.currentPhase = "confirming";
    this.currentStatus = "Confirm your answers";
    this.addMessage("system", "Proceed with these answers? [Y/n]");
  }

  private confirm(): void {
    const raw = this.currentInput;
    this.currentInput = "";
    if (raw.trim()) {
      this.addMessage("user", raw.trim());
    }
    switch (parseConfirmation(raw)) {
      case "confirm":
        this.sendAnswers(this.heldAnswers ?? []);
        this.heldAnswers = null;
        return;
      case "cancel":
        this.cancelRound();
        return;
      case "unknown":
        this.addMessage("system", "Please answer yes or no. Proceed with these answers? [Y/n]");
        return;
    }
  }

  private sendAnswers(answers: readonly string[]): void {
    this.commands.push({ type: "submit_answers", answers: [...answers] });
    this.currentPhase = "researching";
    this.currentStatus = "Researching...";
  }

  private cancelRound(): void {
    this.round = null;
    this.roundResolved = true;
    this.heldAnswers = null;
    this.commands.push({ type: "cancel_answers" });
    this.currentPhase = "completed";
    this.currentStatus = "Cancelling...";
    this.addMessage("system", "Clarification cancelled; stopping the researcher.");
  }

  private escape(): void {
    if (this.currentPhase === "clarifying" || this.currentPhase === "confirming") {
      this.cancelRound();
      return;
    }
    if (this.processing) {
      this.commands.push({ type: "interrupt", command: "stop" });
      this.currentStatus = "Stopping research...";
      this.addMessage("system", "Stop requested");
      return;
    }
    this.quit();
  }

  private quit(): void {
    if (this.quitRequested) {
      return;
    }
    this.quitRequested = true;
    this.commands.push({ type: "quit" });
  }

  private endRun(): void {
    this.processing = false;
    this.currentStatus = null;
    this.round = null;
    this.heldAnswers = null;
  }

  private addMessage(role: MessageRole, content: string): void {
    this.messages.push({ role, content });
    this.offset = 0;
  }
}
