import { PassThrough, Writable } from "node:stream";

import { AsyncQueue } from "../../channel.js";
import { createWorkerHandle, LaunchOptions, WorkerExit, WorkerHandle } from "../../exec.js";

/**
 * In-process stand-in for a research worker. Tests drive its stdout with
 * `emit` and read what the session wrote to its stdin with `nextLine`.
 */
export class FakeWorker {
  readonly stdout = new PassThrough();
  readonly written: string[] = [];
  readonly handle: WorkerHandle;
  killed = false;
  inputEnded = false;
  private readonly incoming = new AsyncQueue<string>();
  private pending = "";
  private resolveExit: (exit: WorkerExit) => void = () => undefined;
  private exited = false;

  constructor() {
    const stdin = new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        this.receive(chunk.toString("utf8"));
        callback();
      },
      final: (callback) => {
        this.inputEnded = true;
        this.incoming.close();
        callback();
      },
    });
    const exited = new Promise<WorkerExit>((resolve) => {
      this.resolveExit = resolve;
    });
    this.handle = createWorkerHandle({
      stdin,
      stdout: this.stdout,
      exited,
      pid: 4242,
      kill: () => {
        this.killed = true;
        this.finish({ exitCode: null, signal: "SIGTERM", success: false });
      },
    });
  }

  /** Next complete line written to stdin, or undefined once stdin is closed. */
  async nextLine(): Promise<string | undefined> {
    const result = await this.incoming.next();
    return result.done ? undefined : result.value;
  }

  emit(event: Record<string, unknown>): void {
    this.stdout.write(`${JSON.stringify(event)}\n`);
  }

  emitRaw(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  /** Closes stdout and exits with `code`. */
  end(code = 0): void {
    this.finish({ exitCode: code, signal: null, success: code === 0 });
  }

  private finish(exit: WorkerExit): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.stdout.end();
    this.resolveExit(exit);
  }

  private receive(text: string): void {
    this.pending += text;
    let index = this.pending.indexOf("\n");
    while (index !== -1) {
      const line = this.pending.slice(0, index);
      this.pending = this.pending.slice(index + 1);
      this.written.push(line);
      this.incoming.push(line);
      index = this.pending.indexOf("\n");
    }
  }
}

/** A launcher that hands out prepared fake workers and records what it was asked to start. */
export function fakeLauncher(...workers: FakeWorker[]): {
  launch: (options: LaunchOptions) => Promise<WorkerHandle>;
  launches: LaunchOptions[];
} {
  const launches: LaunchOptions[] = [];
  const queue = [...workers];
  return {
    launches,
    launch: async (options) => {
      launches.push(options);
      const worker = queue.shift();
      if (!worker) {
        throw new Error("no fake worker left to launch");
      }
      await worker.handle.send(options.initialLine);
      return worker.handle;
    },
  };
}
