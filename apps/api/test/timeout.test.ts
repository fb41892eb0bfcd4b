import { describe, it, expect } from "vitest";
import { callWithTimeout } from "../src/services/timeout";
import { CancelledError, TimeoutError } from "../src/services/errors";
import { delay } from "./helpers/stubs";

describe("callWithTimeout", () => {
  it("returns the call's value", async () => {
    await expect(callWithTimeout(async () => 42, { ms: 100, label: "answer" })).resolves.toBe(42);
  });

  it("rejects with TimeoutError and aborts the call's signal", async () => {
    let seen: AbortSignal | undefined;
    const call = callWithTimeout(
      (signal) => {
        seen = signal;
        return new Promise<never>(() => undefined);
      },
      { ms: 10, label: "slow call" }
    );

    await expect(call).rejects.toThrow(new TimeoutError("slow call", 10).message);
    await expect(call).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it("rejects with CancelledError when the parent aborts", async () => {
    const parent = new AbortController();
    const call = callWithTimeout(() => delay(50), { ms: 5_000, label: "call", signal: parent.signal });
    parent.abort();

    await expect(call).rejects.toBeInstanceOf(CancelledError);
  });

  it("does not start when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    await expect(
      callWithTimeout(
        async () => {
          started = true;
        },
        { ms: 100, label: "call", signal: parent.signal }
      )
    ).rejects.toBeInstanceOf(CancelledError);
    expect(started).toBe(false);
  });

  it("passes the call's own error through", async () => {
    await expect(
      callWithTimeout(
        async () => {
          throw new Error("provider said no");
        },
        { ms: 100, label: "call" }
      )
    ).rejects.toThrow("provider said no");
  });
});
