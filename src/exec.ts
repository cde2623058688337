import { spawn } from "child_process";
import readline from "readline";
import { Readable, Writable } from "stream";
import { AsyncQueue } from "./channel.js";
import { errorMessage, LaunchError } from "./errors.js";

export type WorkerExit = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  success: boolean;
};

export type WorkerHandle = {
  readonly pid?: number;
  /** Worker stdout, one item per line. */
  readonly lines: AsyncIterable<string>;
  /** Queues one complete line on stdin; writes never interleave. */
  send(line: string): Promise<void>;
  /** Closes stdin once every queued write has gone out. */
  endInput(): Promise<void>;
  wait(): Promise<WorkerExit>;
  kill(signal?: NodeJS.Signals): void;
};

export type LaunchOptions = {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  stderr: "inherit" | "ignore";
  /** Written before the handle is returned, so it is always the first line. */
  initialLine: string;
};

export type Launcher = (options: LaunchOptions) => Promise<WorkerHandle>;

export type WorkerIo = {
  stdin: Writable;
  stdout: Readable;
  exited: Promise<WorkerExit>;
  kill: (signal?: NodeJS.Signals) => void;
  pid?: number;
};

export function createWorkerHandle(io: WorkerIo): WorkerHandle {
  let tail: Promise<void> = Promise.resolve();
  let inputClosed = false;
  let inputError: Error | null = null;

  // EPIPE after the worker exits surfaces here and through the write callback.
  io.stdin.on("error", (error: Error) => {
    inputError = error;
  });

  const writeLine = (line: string) =>
    new Promise<void>((resolve, reject) => {
      if (inputClosed) {
        reject(new Error("worker input is closed"));
        return;
      }
      if (inputError) {
        reject(inputError);
        return;
      }
      io.stdin.write(line, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

  const closeInput = () =>
    new Promise<void>((resolve) => {
      if (inputClosed) {
        resolve();
        return;
      }
      inputClosed = true;
      if (io.stdin.destroyed || io.stdin.writableEnded) {
        resolve();
        return;
      }
      io.stdin.end(() => resolve());
    });

  // Lines are buffered from the start, before anyone iterates.
  const lines = new AsyncQueue<string>();
  const reader = readline.createInterface({ input: io.stdout, crlfDelay: Infinity });
  reader.on("line", (line) => lines.push(line));
  reader.on("close", () => lines.close());

  const enqueue = (task: () => Promise<void>): Promise<void> => {
    const next = tail.then(task);
    tail = next.catch(() => undefined);
    return next;
  };

  return {
    pid: io.pid,
    lines,
    send: (line) => enqueue(() => writeLine(line.endsWith("\n") ? line : `${line}\n`)),
    endInput: () => enqueue(closeInput),
    wait: () => io.exited,
    kill: (signal) => io.kill(signal),
  };
}

export function spawnWorker(options: LaunchOptions): Promise<WorkerHandle> {
  return new Promise((resolve, reject) => {
    const child = spawn(options.command, options.args, {
      cwd: options.cwd,
      env: {
        ...process.env,
        ...options.env,
      },
      stdio: ["pipe", "pipe", options.stderr],
    });

    const exited = new Promise<WorkerExit>((resolveExit) => {
      child.once("close", (code, signal) => {
        resolveExit({ exitCode: code, signal, success: code === 0 });
      });
    });

    child.on("error", (error) => {
      reject(
        new LaunchError(
          `failed to start worker \`${options.command}\`: ${error.message}`,
          { cause: error }
        )
      );
    });

    child.once("spawn", () => {
      const { stdin, stdout } = child;
      if (!stdin || !stdout) {
        child.kill();
        reject(new LaunchError("worker started without stdio pipes"));
        return;
      }
      const handle = createWorkerHandle({
        stdin,
        stdout,
        exited,
        pid: child.pid,
        kill: (signal) => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill(signal);
          }
        },
      });
      handle.send(options.initialLine).then(
        () => resolve(handle),
        (error: unknown) => {
          child.kill();
          reject(
            new LaunchError(`failed to send request to worker: ${errorMessage(error)}`, {
              cause: error,
            })
          );
        }
      );
    });
  });
}
