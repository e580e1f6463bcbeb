// File: src/ThreadHandle.ts

import { AsyncLocalStorage } from "node:async_hooks";
import type {
  CallOutcome,
  ThreadIdentity,
  UncaughtErrorHook,
  WrappedFunction,
} from "../types/offthread";
import { DispatchError } from "./ExecutionPolicy";
import { HandoffSlot } from "./HandoffSlot";
import { logger } from "./logger";

export class ThreadStateError extends DispatchError {
  constructor(message: string) {
    super(message);
    this.name = "ThreadStateError";
  }
}

export type ThreadState = "created" | "waiting" | "running" | "finished";

export interface ThreadOptions {
  daemon: boolean;
  /** Seconds to sleep before the target runs; `null` starts it on the next turn. */
  delay: number | null;
  /** Receives the target's failure when nobody is going to take the result. */
  onUncaughtError?: UncaughtErrorHook;
}

/**
 * Owns one dispatched call: the timer that starts it, its identity and the
 * private slot its outcome is handed back through.
 */
export class ThreadHandle<T extends unknown[], R> implements ThreadIdentity {
  private static counter: number = 0;
  private static readonly context = new AsyncLocalStorage<ThreadIdentity>();

  public readonly ident: number;
  public readonly name: string;
  public readonly daemon: boolean;
  /** Frozen copy of the identity; targets and hooks never see the handle itself. */
  public readonly identity: ThreadIdentity;

  private state: ThreadState = "created";
  private timer: NodeJS.Timeout | null = null;
  private deadline: number = 0;
  private readonly slot = new HandoffSlot<Awaited<R>>();

  constructor(
    private readonly target: WrappedFunction<T, R>,
    private readonly args: T,
    private readonly options: ThreadOptions
  ) {
    ThreadHandle.counter += 1;
    this.ident = ThreadHandle.counter;
    this.name = `Thread-${this.ident} (${target.name || "anonymous"})`;
    this.daemon = options.daemon;
    this.identity = Object.freeze({
      ident: this.ident,
      name: this.name,
      daemon: this.daemon,
    });
  }

  /**
   * Identity of the thread whose target is currently executing, or
   * `undefined` outside any dispatched call.
   */
  static current(): ThreadIdentity | undefined {
    return this.context.getStore();
  }

  public getState(): ThreadState {
    return this.state;
  }

  public start(): void {
    if (this.state !== "created") {
      throw new ThreadStateError(`${this.name} can only be started once`);
    }
    this.state = "waiting";
    const ms = this.options.delay === null ? 0 : this.options.delay * 1000;
    this.deadline = performance.now() + ms;
    this.arm(ms);
  }

  /**
   * Timers only take whole milliseconds and may fire a little early, so the
   * callback re-arms for whatever is left until the deadline has passed.
   */
  private arm(ms: number): void {
    this.timer = setTimeout(() => {
      const remaining = this.deadline - performance.now();
      if (remaining > 0) {
        this.arm(remaining);
        return;
      }
      void this.run();
    }, Math.ceil(ms));
    if (this.daemon) this.timer.unref();
  }

  public isAlive(): boolean {
    return this.state === "waiting" || this.state === "running";
  }

  /**
   * Whether the pending start timer holds the process open. Daemon threads
   * never do; no thread does once its target has begun.
   */
  public keepsProcessAlive(): boolean {
    return (
      this.state === "waiting" && this.timer !== null && this.timer.hasRef()
    );
  }

  /**
   * Resolves once the thread has terminated, whether the target returned or
   * threw.
   */
  public async join(): Promise<void> {
    if (this.state === "created") {
      throw new ThreadStateError(`Cannot join ${this.name} before it is started`);
    }
    await this.slot.settled();
  }

  /**
   * Joins, then hands back the target's return value or rethrows its error.
   */
  public async result(): Promise<Awaited<R>> {
    await this.join();
    return this.slot.take();
  }

  private async run(): Promise<void> {
    this.state = "running";
    this.timer = null;

    let outcome: CallOutcome<Awaited<R>>;
    try {
      const value = await ThreadHandle.context.run(this.identity, () =>
        this.target(...this.args)
      );
      outcome = { ok: true, value };
    } catch (error) {
      outcome = { ok: false, error };
    }

    this.state = "finished";
    this.slot.fill(outcome);
    if (!outcome.ok) this.report(outcome.error);
  }

  private report(error: unknown): void {
    const hook = this.options.onUncaughtError;
    if (!hook) return;
    try {
      hook(error, this.identity);
    } catch (hookError) {
      logger.error(
        { err: hookError, thread: this.name },
        `Uncaught error hook failed for ${this.name}`
      );
    }
  }
}

export default ThreadHandle;
