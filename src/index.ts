export {
  thread,
  threadJoin,
  threadDaemon,
  threadWithReturnValue,
  delay,
  delayJoin,
  delayDaemon,
  delayWithReturnValue,
  currentThread,
} from "./offthread";
export type {
  FireAndForgetDecorator,
  JoinedDecorator,
  ReturningDecorator,
} from "./offthread";
export { CallDispatcher, defaultExcepthook } from "./CallDispatcher";
export {
  Policies,
  DispatchError,
  ConfigurationError,
  MAX_DELAY_SECONDS,
} from "./ExecutionPolicy";
export type { ExecutionPolicyOptions } from "./ExecutionPolicy";
export { HandoffSlot, HandoffSlotError } from "./HandoffSlot";
export { ThreadHandle, ThreadStateError } from "./ThreadHandle";
export type { ThreadOptions, ThreadState } from "./ThreadHandle";
export type {
  WrappedFunction,
  ExecutionPolicy,
  DetachedPolicy,
  JoiningPolicy,
  ReturningPolicy,
  CallOutcome,
  ThreadIdentity,
  UncaughtErrorHook,
  FireAndForget,
  Joined,
  Returning,
} from "../types/offthread";
