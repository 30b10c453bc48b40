import type { StreamClientError } from "../errors.js";
import type { PublishCallback, PublishMeta } from "../types/index.js";

export type PublishFutureState = "pending" | "succeeded" | "failed";

/**
 * Deferred result of one broker send. It settles once; later calls to
 * `succeed` or `fail` return false and leave the result untouched. The
 * callback, when given, runs on the settling transition only.
 */
export class PublishFuture {
  readonly promise: Promise<PublishMeta>;
  private resolveFn: (meta: PublishMeta) => void = () => undefined;
  private rejectFn: (error: StreamClientError) => void = () => undefined;
  private currentState: PublishFutureState = "pending";

  constructor(private readonly callback?: PublishCallback) {
    this.promise = new Promise<PublishMeta>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
    // callers may observe the outcome through the callback alone
    this.promise.catch(() => undefined);
  }

  get state(): PublishFutureState {
    return this.currentState;
  }

  get settled(): boolean {
    return this.currentState !== "pending";
  }

  succeed(meta: PublishMeta): boolean {
    if (this.currentState !== "pending") {
      return false;
    }
    this.currentState = "succeeded";
    this.resolveFn(meta);
    this.callback?.success?.(meta);
    return true;
  }

  fail(error: StreamClientError): boolean {
    if (this.currentState !== "pending") {
      return false;
    }
    this.currentState = "failed";
    this.rejectFn(error);
    this.callback?.error?.(error);
    return true;
  }
}
