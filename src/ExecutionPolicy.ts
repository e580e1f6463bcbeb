// File: src/ExecutionPolicy.ts

import { z } from "zod";
import type {
  DetachedPolicy,
  ExecutionPolicy,
  JoiningPolicy,
  ReturningPolicy,
} from "../types/offthread";

export class DispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DispatchError";
  }
}

export class ConfigurationError extends DispatchError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Longest delay Node.js arms as given; anything above 2^31 - 1 ms is
 * clamped to 1 ms by the timer implementation.
 */
export const MAX_DELAY_SECONDS = 2147483647 / 1000;

const delaySchema = z.number().finite().nonnegative().max(MAX_DELAY_SECONDS);

const executionPolicySchema = z
  .object({
    daemon: z.boolean().default(false),
    join: z.boolean().default(false),
    delay: delaySchema.nullable().default(null),
    captureReturn: z.boolean().default(false),
  })
  .strict()
  .transform(
    (policy): ExecutionPolicy => ({
      ...policy,
      join: policy.join || policy.captureReturn,
    })
  );

export type ExecutionPolicyOptions = z.input<typeof executionPolicySchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

/**
 * The preset policies behind the public decorators, plus validation for
 * hand-built ones.
 */
export class Policies {
  static readonly THREAD: DetachedPolicy = {
    daemon: false,
    join: false,
    delay: null,
    captureReturn: false,
  };

  static readonly THREAD_JOIN: JoiningPolicy = {
    daemon: false,
    join: true,
    delay: null,
    captureReturn: false,
  };

  static readonly THREAD_DAEMON: DetachedPolicy = {
    daemon: true,
    join: false,
    delay: null,
    captureReturn: false,
  };

  static readonly THREAD_WITH_RETURN_VALUE: ReturningPolicy = {
    daemon: false,
    join: true,
    delay: null,
    captureReturn: true,
  };

  /**
   * Validates a (partial) policy record and fills in the defaults.
   * `captureReturn` forces `join`, since the value only exists once the
   * thread has terminated.
   */
  static parse(options: ExecutionPolicyOptions): ExecutionPolicy {
    const parsed = executionPolicySchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid execution policy: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }

  static parseDelay(seconds: number): number {
    const parsed = delaySchema.safeParse(seconds);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid delay ${String(seconds)}: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }

  static withDelay<P extends ExecutionPolicy>(policy: P, seconds: number): P {
    return { ...policy, delay: this.parseDelay(seconds) };
  }
}

export default Policies;
