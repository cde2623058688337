import { randomUUID } from "crypto";
import { EventEmitter } from "events";
import path from "path";
import readline from "readline/promises";
import { parseConfirmation } from "./controller.js";
import { errorMessage, SounderError } from "./errors.js";
import { Launcher } from "./exec.js";
import { Output } from "./output.js";
import { ClarifyingQuestion, createRequest } from "./protocol.js";
import { RunScope } from "./run-scope.js";
import { describeExit, runSession, SessionOutcome } from "./session.js";
import { Config, OutputMode } from "./types.js";

/** Resolves with one answer per question, or null when the user declines to continue. */
export type AnswerCollector = (
  questions: readonly ClarifyingQuestion[],
  signal: AbortSignal
) => Promise<string[] | null>;

export type Prompter = {
  ask(question: string, signal: AbortSignal): Promise<string>;
  close(): void;
};

export type SingleShotOptions = {
  mode: OutputMode;
  output?: Output;
  launch?: Launcher;
  cwd?: string;
  createRunId?: () => string;
  answer?: AnswerCollector;
  /** Where SIGINT is observed; the process by default. */
  signals?: EventEmitter;
};

export function createPrompter(
  onInterrupt: () => void,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Prompter {
  const rl = readline.createInterface({ input, output });
  // readline owns Ctrl+C while a question is open.
  rl.on("SIGINT", onInterrupt);

  return {
    ask: (question, signal) =>
      new Promise<string>((resolve, reject) => {
        const onClose = () => reject(new Error("input closed before an answer was given"));
        rl.once("close", onClose);
        void rl.question(question, { signal }).then(
          (answer) => {
            rl.off("close", onClose);
            resolve(answer);
          },
          (error: unknown) => {
            rl.off("close", onClose);
            reject(error);
          }
        );
      }),
    close: () => rl.close(),
  };
}

/** Asks each question in turn, then asks for confirmation unless `autoDecide`. */
export async function askClarifyingQuestions(
  questions: readonly ClarifyingQuestion[],
  prompter: Prompter,
  options: { autoDecide: boolean; signal: AbortSignal; write: (text: string) => void }
): Promise<string[] | null> {
  const answers: string[] = [];
  for (const [index, question] of questions.entries()) {
    const answer = await prompter.ask(
      `[${index + 1}/${questions.length}] ${question.label}: ${question.question}\n> `,
      options.signal
    );
    answers.push(answer.trim());
  }
  if (options.autoDecide) {
    return answers;
  }
  while (true) {
    const reply = await prompter.ask("Proceed with these answers? [Y/n] ", options.signal);
    switch (parseConfirmation(reply)) {
      case "confirm":
        return answers;
      case "cancel":
        return null;
      case "unknown":
        options.write("Please answer yes or no.\n");
        break;
    }
  }
}

function defaultCollector(autoDecide: boolean, onInterrupt: () => void): AnswerCollector {
  if (!process.stdin.isTTY) {
    // Nobody can answer; the worker gets empty answers and carries on.
    return async (questions) => questions.map(() => "");
  }
  return async (questions, signal) => {
    const prompter = createPrompter(onInterrupt);
    try {
      return await askClarifyingQuestions(questions, prompter, {
        autoDecide,
        signal,
        write: (text) => process.stderr.write(text),
      });
    } finally {
      prompter.close();
    }
  };
}

/**
 * Runs one query to completion without the interactive UI. The first Ctrl+C
 * asks the worker to stop (or cancels an open clarifying round); a second one
 * kills it. Returns the process exit code.
 */
export async function runSingleShot(
  query: string,
  config: Config,
  options: SingleShotOptions
): Promise<number> {
  const output = options.output ?? new Output(options.mode);
  const signals: EventEmitter = options.signals ?? process;
  const runId = (options.createRunId ?? randomUUID)();
  const scope = new RunScope(runId);
  const request = createRequest(runId, query, config.request);
  const prompts = new AbortController();

  let interrupts = 0;
  const onInterrupt = () => {
    interrupts += 1;
    if (interrupts > 1) {
      output.warning("Killing the research worker");
      scope.abort();
      return;
    }
    output.warning("Interrupt received; stopping research (press Ctrl+C again to kill the worker)");
    if (!scope.cancelAnswers()) {
      scope.interrupt("stop");
    }
  };
  signals.on("SIGINT", onInterrupt);

  const collect = options.answer ?? defaultCollector(config.request.auto_decide, onInterrupt);
  output.start(runId, path.resolve(config.runsDir, runId), config.request);

  try {
    const outcome = await runSession({
      request,
      scope,
      worker: config.worker,
      runsDir: config.runsDir,
      stderr: "inherit",
      cwd: options.cwd,
      launch: options.launch,
      onEvent: (event) => output.event(event),
      warn: (message) => output.warning(message),
      onClarification: (questions, handoff) => {
        if (questions.length === 0) {
          handoff.fulfill([]);
          return;
        }
        void collect(questions, prompts.signal).then(
          (answers) => {
            if (answers) {
              handoff.fulfill(answers);
            } else {
              handoff.cancel();
            }
          },
          (error: unknown) => {
            handoff.abandon(`could not read answers: ${errorMessage(error)}`);
          }
        );
      },
    });
    reportOutcome(output, outcome);
    output.complete(outcome.success, runId, outcome.runDir);
    return outcome.success ? 0 : 1;
  } catch (error) {
    output.error(error instanceof SounderError ? error.code : undefined, errorMessage(error));
    return 1;
  } finally {
    prompts.abort();
    signals.off("SIGINT", onInterrupt);
  }
}

function reportOutcome(output: Output, outcome: SessionOutcome): void {
  if (outcome.cancelled) {
    output.warning("Research cancelled");
    return;
  }
  if (!outcome.exit.success) {
    output.error(undefined, `research worker failed (${describeExit(outcome.exit)})`);
    return;
  }
  if (outcome.done === null) {
    output.error(undefined, "research worker exited without reporting completion");
  }
}
