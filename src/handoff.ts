export type AnswerOutcome =
  | { kind: "answered"; answers: string[] }
  | { kind: "cancelled" }
  | { kind: "abandoned"; reason: string };

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Single-use rendezvous between whoever collects clarifying answers and the
 * session that writes them to the worker. The first settle call wins; later
 * calls return false and change nothing.
 */
export class AnswerHandoff {
  private readonly deferred = createDeferred<AnswerOutcome>();
  private outcome: AnswerOutcome | null = null;

  get settled(): boolean {
    return this.outcome !== null;
  }

  wait(): Promise<AnswerOutcome> {
    return this.deferred.promise;
  }

  fulfill(answers: readonly string[]): boolean {
    return this.settle({ kind: "answered", answers: [...answers] });
  }

  cancel(): boolean {
    return this.settle({ kind: "cancelled" });
  }

  abandon(reason: string): boolean {
    return this.settle({ kind: "abandoned", reason });
  }

  private settle(outcome: AnswerOutcome): boolean {
    if (this.outcome) {
      return false;
    }
    this.outcome = outcome;
    this.deferred.resolve(outcome);
    return true;
  }
}
