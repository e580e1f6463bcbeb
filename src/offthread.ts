// File: src/offthread.ts

import type {
  FireAndForget,
  Joined,
  Returning,
  ThreadIdentity,
  WrappedFunction,
} from "../types/offthread";
import { CallDispatcher } from "./CallDispatcher";
import { Policies } from "./ExecutionPolicy";
import { ThreadHandle } from "./ThreadHandle";

export type FireAndForgetDecorator = <T extends unknown[], R>(
  fn: WrappedFunction<T, R>
) => FireAndForget<T>;
export type JoinedDecorator = <T extends unknown[], R>(
  fn: WrappedFunction<T, R>
) => Joined<T>;
export type ReturningDecorator = <T extends unknown[], R>(
  fn: WrappedFunction<T, R>
) => Returning<T, R>;

/**
 * Run `fn` on a separate thread. Fire-and-forget: the caller gets nothing
 * back, and a failure only reaches `CallDispatcher.excepthook`.
 */
export function thread<T extends unknown[], R>(
  fn: WrappedFunction<T, R>
): FireAndForget<T> {
  return CallDispatcher.wrap(fn, Policies.THREAD);
}

/** Run `fn` on a separate thread and wait for it to terminate. */
export function threadJoin<T extends unknown[], R>(
  fn: WrappedFunction<T, R>
): Joined<T> {
  return CallDispatcher.wrap(fn, Policies.THREAD_JOIN);
}

/**
 * Run `fn` on a separate daemon thread, which does not keep the process
 * alive while it waits to start. Fire-and-forget.
 */
export function threadDaemon<T extends unknown[], R>(
  fn: WrappedFunction<T, R>
): FireAndForget<T> {
  return CallDispatcher.wrap(fn, Policies.THREAD_DAEMON);
}

/** Run `fn` on a separate thread and resolve with its return value. */
export function threadWithReturnValue<T extends unknown[], R>(
  fn: WrappedFunction<T, R>
): Returning<T, R> {
  return CallDispatcher.wrap(fn, Policies.THREAD_WITH_RETURN_VALUE);
}

/** Wait `seconds` before calling the function. Fire-and-forget. */
export function delay(seconds: number): FireAndForgetDecorator {
  const policy = Policies.withDelay(Policies.THREAD, seconds);
  return (fn) => CallDispatcher.wrap(fn, policy);
}

export function delayJoin(seconds: number): JoinedDecorator {
  const policy = Policies.withDelay(Policies.THREAD_JOIN, seconds);
  return (fn) => CallDispatcher.wrap(fn, policy);
}

export function delayDaemon(seconds: number): FireAndForgetDecorator {
  const policy = Policies.withDelay(Policies.THREAD_DAEMON, seconds);
  return (fn) => CallDispatcher.wrap(fn, policy);
}

/**
 * Wait `seconds` before calling the function, and resolve with its return
 * value.
 */
export function delayWithReturnValue(seconds: number): ReturningDecorator {
  const policy = Policies.withDelay(Policies.THREAD_WITH_RETURN_VALUE, seconds);
  return (fn) => CallDispatcher.wrap(fn, policy);
}

export function currentThread(): ThreadIdentity | undefined {
  return ThreadHandle.current();
}
