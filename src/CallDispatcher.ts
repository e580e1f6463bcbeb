// File: src/CallDispatcher.ts

import type {
  DetachedPolicy,
  ExecutionPolicy,
  FireAndForget,
  Joined,
  JoiningPolicy,
  Returning,
  ReturningPolicy,
  ThreadIdentity,
  UncaughtErrorHook,
  WrappedFunction,
} from "../types/offthread";
import { ConfigurationError, Policies } from "./ExecutionPolicy";
import { logger } from "./logger";
import { ThreadHandle } from "./ThreadHandle";

/**
 * Reports the failure of a call nobody waits for on the error log and lets
 * the process carry on.
 */
export function defaultExcepthook(error: unknown, thread: ThreadIdentity): void {
  logger.error(
    { err: error, thread: thread.name },
    `Exception in thread ${thread.name}`
  );
}

/**
 * Turns a function plus an `ExecutionPolicy` into a wrapper with the same
 * parameters that runs every call on a thread of its own.
 *
 * Usage:
 * const save = CallDispatcher.wrap(writeRecord, Policies.THREAD_JOIN);
 * await save(record);
 */
export class CallDispatcher {
  /**
   * Called with the error of any detached call whose target throws.
   * Replace it to route those failures elsewhere.
   */
  static excepthook: UncaughtErrorHook = defaultExcepthook;

  /**
   * Starts one call of `fn` under `policy`:
   * 1. Creates a fresh handle for this call only.
   * 2. Marks it as daemon if the policy says so.
   * 3. Arms its (optionally delayed) start.
   * Failures of detached calls go to `excepthook`; joined calls keep them in
   * the handle for the caller.
   */
  static spawn<T extends unknown[], R>(
    fn: WrappedFunction<T, R>,
    args: T,
    policy: ExecutionPolicy
  ): ThreadHandle<T, R> {
    const handle = new ThreadHandle(fn, args, {
      daemon: policy.daemon,
      delay: policy.delay,
      onUncaughtError: policy.join
        ? undefined
        : (error, thread) => this.excepthook(error, thread),
    });
    handle.start();
    return handle;
  }

  /**
   * Validates `fn` and `policy` up front, so a bad configuration fails at
   * decoration time before anything is spawned. The wrapper then returns
   * - nothing, for detached policies;
   * - a promise settling on termination (rejecting with the target's
   *   error), for joining policies;
   * - a promise of the target's return value, for `captureReturn`.
   */
  static wrap<T extends unknown[], R>(
    fn: WrappedFunction<T, R>,
    policy: ReturningPolicy
  ): Returning<T, R>;
  static wrap<T extends unknown[], R>(
    fn: WrappedFunction<T, R>,
    policy: JoiningPolicy
  ): Joined<T>;
  static wrap<T extends unknown[], R>(
    fn: WrappedFunction<T, R>,
    policy: DetachedPolicy
  ): FireAndForget<T>;
  static wrap<T extends unknown[], R>(
    fn: WrappedFunction<T, R>,
    policy: ExecutionPolicy
  ): Returning<T, R> | Joined<T> | FireAndForget<T>;
  static wrap<T extends unknown[], R>(
    fn: WrappedFunction<T, R>,
    options: ExecutionPolicy
  ): Returning<T, R> | Joined<T> | FireAndForget<T> {
    if (typeof fn !== "function") {
      throw new ConfigurationError(
        `Expected a function to dispatch, received ${typeof fn}`
      );
    }
    const policy = Policies.parse(options);

    if (policy.captureReturn) {
      return (...args: T): Promise<Awaited<R>> =>
        this.spawn(fn, args, policy).result();
    }
    if (policy.join) {
      return async (...args: T): Promise<void> => {
        await this.spawn(fn, args, policy).result();
      };
    }
    return (...args: T): void => {
      this.spawn(fn, args, policy);
    };
  }
}

export default CallDispatcher;
