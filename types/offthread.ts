export type WrappedFunction<T extends unknown[], R> = (...args: T) => R; // Generic type for wrapped functions

/**
 * How a dispatched call is run: whether it holds the process open, whether the
 * caller waits for it, how long it sleeps before starting (in seconds) and
 * whether its return value is handed back.
 */
export interface ExecutionPolicy {
  daemon: boolean;
  join: boolean;
  delay: number | null;
  captureReturn: boolean;
}

export type DetachedPolicy = ExecutionPolicy & {
  join: false;
  captureReturn: false;
};
export type JoiningPolicy = ExecutionPolicy & {
  join: true;
  captureReturn: false;
};
export type ReturningPolicy = ExecutionPolicy & {
  join: true;
  captureReturn: true;
};

/**
 * What a thread leaves in its handoff slot once it terminates.
 */
export type CallOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export interface ThreadIdentity {
  readonly ident: number;
  readonly name: string;
  readonly daemon: boolean;
}

export type UncaughtErrorHook = (error: unknown, thread: ThreadIdentity) => void;

export type FireAndForget<T extends unknown[]> = (...args: T) => void;
export type Joined<T extends unknown[]> = (...args: T) => Promise<void>;
export type Returning<T extends unknown[], R> = (...args: T) => Promise<Awaited<R>>;
