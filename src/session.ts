import { ArtifactSink } from "./artifacts.js";
import { errorMessage, HandoffError, LaunchError } from "./errors.js";
import { Launcher, spawnWorker, WorkerExit, WorkerHandle } from "./exec.js";
import { AnswerHandoff, AnswerOutcome } from "./handoff.js";
import {
  ClarifyingQuestion,
  encodeClarifyingAnswers,
  encodeInterrupt,
  encodeRequest,
  SessionRequest,
  WorkerEvent,
} from "./protocol.js";
import { routeWorkerEvents, RouteResult } from "./router.js";
import { RunScope } from "./run-scope.js";
import { WorkerConfig } from "./types.js";

export type SessionOptions = {
  request: SessionRequest;
  scope: RunScope;
  worker: WorkerConfig;
  runsDir: string;
  stderr: "inherit" | "ignore";
  onEvent: (event: WorkerEvent) => void;
  warn: (message: string) => void;
  /** Called once the run's clarifying round has opened, with its handoff. */
  onClarification?: (questions: ClarifyingQuestion[], handoff: AnswerHandoff) => void;
  cwd?: string;
  launch?: Launcher;
};

export type SessionOutcome = {
  runId: string;
  runDir: string;
  /** `done.success` and a zero exit code, and the run was not cancelled. */
  success: boolean;
  done: boolean | null;
  exit: WorkerExit;
  cancelled: boolean;
  hasReport: boolean;
};

/**
 * Drives one run from request to exit. Rejects only with `LaunchError` when the
 * worker cannot be started and `HandoffError` when a clarifying round is
 * abandoned; every other problem is reported through `warn` and the outcome.
 */
export async function runSession(options: SessionOptions): Promise<SessionOutcome> {
  const { request, scope, warn } = options;
  const sink = new ArtifactSink(options.runsDir, request.run_id);

  try {
    sink.writeRequest(request);
  } catch (error) {
    warn(`failed to write request.json: ${errorMessage(error)}`);
  }

  let handle: WorkerHandle;
  try {
    handle = await (options.launch ?? spawnWorker)({
      command: options.worker.command,
      args: options.worker.args,
      env: options.worker.env,
      cwd: options.cwd,
      stderr: options.stderr,
      initialLine: encodeRequest(request),
    });
  } catch (error) {
    scope.dispose("launch failed");
    throw error instanceof LaunchError
      ? error
      : new LaunchError(`failed to start worker: ${errorMessage(error)}`, { cause: error });
  }

  const exited = handle.wait();
  const kill = () => handle.kill();
  if (scope.signal.aborted) {
    kill();
  } else {
    scope.signal.addEventListener("abort", kill, { once: true });
  }

  const forwarding = forwardInterrupts(scope, handle, warn);
  let cancelled = false;

  const clarify = async (questions: ClarifyingQuestion[]): Promise<void> => {
    const handoff = scope.openClarification();
    if (!handoff) {
      return;
    }
    options.onClarification?.(questions, handoff);
    const outcome = await Promise.race([
      handoff.wait(),
      exited.then(
        (exit): AnswerOutcome => ({
          kind: "abandoned",
          reason: `worker exited (${describeExit(exit)}) while ${questions.length} clarifying question(s) were unanswered`,
        })
      ),
    ]);

    switch (outcome.kind) {
      case "answered":
        try {
          await handle.send(encodeClarifyingAnswers(outcome.answers));
        } catch (error) {
          warn(`failed to send clarifying answers: ${errorMessage(error)}`);
        }
        return;
      case "cancelled":
        cancelled = true;
        await cancelWorker(handle, warn);
        return;
      case "abandoned":
        handoff.abandon(outcome.reason);
        throw new HandoffError(`answer handoff abandoned: ${outcome.reason}`);
    }
  };

  let routed: RouteResult | null = null;
  let failure: unknown = null;
  try {
    routed = await routeWorkerEvents(handle.lines, {
      sink,
      emit: options.onEvent,
      warn,
      clarify,
    });
  } catch (error) {
    failure = error;
    handle.kill();
  }

  scope.dispose(failure ? "run failed" : "run ended");
  await forwarding;
  await handle.endInput();
  const exit = await exited;
  scope.signal.removeEventListener("abort", kill);

  try {
    sink.writeOutput();
  } catch (error) {
    warn(`failed to write output.md: ${errorMessage(error)}`);
  }
  try {
    sink.writeMetadata();
  } catch (error) {
    warn(`failed to write metadata.json: ${errorMessage(error)}`);
  }

  if (failure !== null || !routed) {
    throw failure;
  }

  return {
    runId: request.run_id,
    runDir: sink.runDir,
    success: routed.done === true && exit.success && !cancelled,
    done: routed.done,
    exit,
    cancelled,
    hasReport: sink.hasReport,
  };
}

async function forwardInterrupts(
  scope: RunScope,
  handle: WorkerHandle,
  warn: (message: string) => void
): Promise<void> {
  for await (const command of scope.interrupts) {
    try {
      await handle.send(encodeInterrupt(command));
    } catch (error) {
      warn(`failed to send interrupt \`${command}\`: ${errorMessage(error)}`);
    }
  }
}

async function cancelWorker(
  handle: WorkerHandle,
  warn: (message: string) => void
): Promise<void> {
  try {
    await handle.send(encodeInterrupt("stop"));
  } catch (error) {
    warn(`failed to send interrupt \`stop\`: ${errorMessage(error)}`);
  }
  await handle.endInput();
  handle.kill();
}

export function describeExit(exit: WorkerExit): string {
  if (exit.signal) {
    return `signal ${exit.signal}`;
  }
  return `exit code ${exit.exitCode ?? "unknown"}`;
}
