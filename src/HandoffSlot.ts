// File: src/HandoffSlot.ts

import type { CallOutcome } from "../types/offthread";
import { DispatchError } from "./ExecutionPolicy";

export class HandoffSlotError extends DispatchError {
  constructor(message: string) {
    super(message);
    this.name = "HandoffSlotError";
  }
}

/**
 * A single-use cell passing one outcome (value or error) from the thread
 * that produced it to the caller waiting on it.
 *
 * `settled()` never rejects: a failure sits in the slot until someone calls
 * `take()`, so an abandoned slot cannot surface as an unhandled rejection.
 */
export class HandoffSlot<T> {
  private outcome: CallOutcome<T> | null = null;
  private taken: boolean = false;
  private readonly waiters: Array<() => void> = [];

  public fill(outcome: CallOutcome<T>): void {
    if (this.outcome) {
      throw new HandoffSlotError("Handoff slot can only be filled once");
    }
    this.outcome = outcome;
    for (const wake of this.waiters.splice(0)) wake();
  }

  public isFilled(): boolean {
    return this.outcome !== null;
  }

  public settled(): Promise<void> {
    if (this.outcome) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /**
   * Returns the stored value, or throws the stored error as it was thrown.
   */
  public take(): T {
    const outcome = this.outcome;
    if (!outcome) {
      throw new HandoffSlotError("Handoff slot is empty");
    }
    if (this.taken) {
      throw new HandoffSlotError("Handoff slot has already been taken");
    }
    this.taken = true;
    if (outcome.ok) return outcome.value;
    throw outcome.error;
  }
}

export default HandoffSlot;
