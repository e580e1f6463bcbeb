// File: tests/offthread.test.ts

import type { ThreadIdentity } from "../types/offthread";
import { CallDispatcher } from "../src/CallDispatcher";
import { ConfigurationError } from "../src/ExecutionPolicy";
import {
  currentThread,
  delay,
  delayDaemon,
  delayJoin,
  delayWithReturnValue,
  thread,
  threadDaemon,
  threadJoin,
  threadWithReturnValue,
} from "../src/offthread";

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("offthread decorators", () => {
  const originalHook = CallDispatcher.excepthook;

  beforeEach(() => {
    CallDispatcher.excepthook = jest.fn();
  });

  afterEach(() => {
    CallDispatcher.excepthook = originalHook;
  });

  function nextReport(): Promise<[unknown, ThreadIdentity]> {
    return new Promise((resolve) => {
      CallDispatcher.excepthook = (error, identity) => resolve([error, identity]);
    });
  }

  describe("thread", () => {
    test("returns immediately and runs the target later", async () => {
      const calls: number[] = [];
      const record = thread((n: number) => {
        calls.push(n);
      });

      expect(record(1)).toBeUndefined();
      expect(calls).toEqual([]);

      await sleep(20);
      expect(calls).toEqual([1]);
    });

    test("two sleeping calls do not block the caller", async () => {
      const shared: string[] = [];
      const append = thread(async (item: string) => {
        await sleep(200);
        shared.push(item);
      });

      const started = Date.now();
      append("a");
      append("b");
      expect(Date.now() - started).toBeLessThan(50);
      expect(shared).toEqual([]);

      await sleep(100);
      expect(shared).toEqual([]);

      await sleep(200);
      expect([...shared].sort()).toEqual(["a", "b"]);
    });

    test("a failure never reaches the call site", async () => {
      const failure = new Error("fire and forget");
      const reported = nextReport();
      const explode = thread(function explode() {
        throw failure;
      });

      expect(() => explode()).not.toThrow();

      const [error, identity] = await reported;
      expect(error).toBe(failure);
      expect(identity.name).toMatch(/^Thread-\d+ \(explode\)$/);
    });
  });

  describe("threadJoin", () => {
    test("resolves once the target has run", async () => {
      const calls: string[] = [];
      const record = threadJoin((item: string) => {
        calls.push(item);
      });

      await expect(record("x")).resolves.toBeUndefined();
      expect(calls).toEqual(["x"]);
    });

    test("rejects with the target's failure", async () => {
      const failure = new Error("joined");
      const fail = threadJoin(() => {
        throw failure;
      });

      await expect(fail()).rejects.toBe(failure);
      expect(CallDispatcher.excepthook).not.toHaveBeenCalled();
    });
  });

  describe("threadDaemon", () => {
    test("returns immediately and still runs while the process lives", async () => {
      const calls: number[] = [];
      const record = threadDaemon((n: number) => {
        calls.push(n);
      });

      expect(record(5)).toBeUndefined();
      expect(calls).toEqual([]);

      await sleep(20);
      expect(calls).toEqual([5]);
    });
  });

  describe("threadWithReturnValue", () => {
    test("returns what a direct call returns", async () => {
      const add = (a: number, b: number) => a + b;

      await expect(threadWithReturnValue(add)(2, 3)).resolves.toBe(add(2, 3));
    });

    test("unwraps async targets", async () => {
      const greet = threadWithReturnValue(async (name: string) => {
        await sleep(5);
        return `hi ${name}`;
      });

      await expect(greet("ada")).resolves.toBe("hi ada");
    });

    test("rethrows what the target throws", async () => {
      const failure = new TypeError("bad input");
      const parse = threadWithReturnValue((input: string) => {
        if (input === "") throw failure;
        return input.length;
      });

      await expect(parse("")).rejects.toBe(failure);
      await expect(parse("abc")).resolves.toBe(3);
    });

    test("concurrent calls each get their own result", async () => {
      const double = threadWithReturnValue(async (n: number) => {
        await sleep((10 - n) * 3);
        return n * 2;
      });
      const inputs = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

      const results = await Promise.all(inputs.map((n) => double(n)));

      expect(results).toEqual([0, 2, 4, 6, 8, 10, 12, 14, 16, 18]);
    });

    test("each call runs on a thread of its own", async () => {
      const identify = threadWithReturnValue(function whoAmI() {
        return currentThread();
      });

      const [first, second] = await Promise.all([identify(), identify()]);

      expect(first?.name).toMatch(/^Thread-\d+ \(whoAmI\)$/);
      expect(second?.ident).not.toBe(first?.ident);
      expect(currentThread()).toBeUndefined();
    });
  });

  describe("delay", () => {
    test("runs the target only after the delay", async () => {
      const calls: number[] = [];
      const record = delay(0.05)((n: number) => {
        calls.push(n);
      });

      expect(record(3)).toBeUndefined();
      await sleep(10);
      expect(calls).toEqual([]);

      await sleep(100);
      expect(calls).toEqual([3]);
    });

    test("rejects a negative delay at decoration time", () => {
      expect(() => delay(-1)).toThrow(ConfigurationError);
    });
  });

  describe("delayJoin", () => {
    test("waits at least the delay and runs the target after it", async () => {
      const ranAt: number[] = [];
      const stamp = delayJoin(0.1)(() => {
        ranAt.push(Date.now());
      });

      const started = Date.now();
      await stamp();
      const elapsed = Date.now() - started;

      expect(elapsed).toBeGreaterThanOrEqual(95);
      expect(ranAt).toHaveLength(1);
      expect(ranAt[0] - started).toBeGreaterThanOrEqual(95);
    });

    test("rejects with the target's failure", async () => {
      const failure = new Error("late failure");
      const fail = delayJoin(0.01)(() => {
        throw failure;
      });

      await expect(fail()).rejects.toBe(failure);
    });
  });

  describe("delayDaemon", () => {
    test("runs the target after the delay without blocking", async () => {
      const calls: string[] = [];
      const record = delayDaemon(0.03)((item: string) => {
        calls.push(item);
      });

      expect(record("d")).toBeUndefined();
      expect(calls).toEqual([]);

      await sleep(80);
      expect(calls).toEqual(["d"]);
    });

    test("rejects an infinite delay", () => {
      expect(() => delayDaemon(Infinity)).toThrow(ConfigurationError);
    });
  });

  describe("delayWithReturnValue", () => {
    test("indexes a list after half a second", async () => {
      const numbers = [0, 1, 2, 3];
      const get = delayWithReturnValue(0.5)((i: number) => numbers[i]);

      const started = Date.now();
      const value = await get(2);

      expect(value).toBe(2);
      expect(Date.now() - started).toBeGreaterThanOrEqual(495);
    });

    test("rejects NaN at decoration time", () => {
      expect(() => delayWithReturnValue(NaN)).toThrow(ConfigurationError);
    });

    test("rethrows non-error values unchanged", async () => {
      const fail = delayWithReturnValue(0)(() => {
        throw "plain failure";
      });

      await expect(fail()).rejects.toBe("plain failure");
    });
  });
});
